import { commandOutcome, retrySequentially, type AttemptOutcome } from "../../src/utils/retry";

describe("retry", () => {
  describe("commandOutcome", () => {
    it("should treat exit code 0 as success", () => {
      expect(commandOutcome({ code: 0, stdout: "", stderr: "" })).toEqual({ success: true });
    });

    it("should carry stderr on failure", () => {
      expect(commandOutcome({ code: 1, stdout: "", stderr: " iptables-restore: line 3 failed\n" })).toEqual({
        success: false,
        detail: "iptables-restore: line 3 failed",
      });
    });

    it("should fall back to the exit code when stderr is empty", () => {
      expect(commandOutcome({ code: 4, stdout: "", stderr: "" })).toEqual({ success: false, detail: "exit code 4" });
    });
  });

  describe("retrySequentially", () => {
    it("should stop at the first success", async () => {
      const sleep = jest.fn(async () => {});
      const operation = jest.fn(async (): Promise<AttemptOutcome> => ({ success: true }));

      await expect(retrySequentially(operation, { attempts: 3, delayMs: 1000, sleep })).resolves.toBe(true);

      expect(operation).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it("should pause between attempts but not after the last", async () => {
      const sleep = jest.fn(async () => {});
      const seen: Array<[number, AttemptOutcome]> = [];

      const result = await retrySequentially(async () => ({ success: false, detail: "busy" }), {
        attempts: 3,
        delayMs: 1000,
        sleep,
        onAttempt: (attempt, outcome) => seen.push([attempt, outcome]),
      });

      expect(result).toBe(false);
      expect(sleep).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledWith(1000);
      expect(seen.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    });

    it("should count a thrown error as a failed attempt", async () => {
      const seen: AttemptOutcome[] = [];
      let calls = 0;

      const result = await retrySequentially(
        async () => {
          calls++;
          if (calls === 1) throw new Error("EAGAIN");
          return { success: true };
        },
        { attempts: 3, delayMs: 0, sleep: async () => {}, onAttempt: (_attempt, outcome) => seen.push(outcome) },
      );

      expect(result).toBe(true);
      expect(seen).toEqual([{ success: false, detail: "EAGAIN" }, { success: true }]);
    });

    it("should run attempts strictly one after another", async () => {
      let running = 0;
      let maxRunning = 0;

      await retrySequentially(
        async () => {
          running++;
          maxRunning = Math.max(maxRunning, running);
          await Promise.resolve();
          running--;
          return { success: false };
        },
        { attempts: 3, delayMs: 0, sleep: async () => {} },
      );

      expect(maxRunning).toBe(1);
    });
  });
});
