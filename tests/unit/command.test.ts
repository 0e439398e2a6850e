import { EventEmitter } from "events";

jest.mock("child_process", () => ({
  spawn: jest.fn(),
  execFileSync: jest.fn(),
}));

import { spawn, execFileSync } from "child_process";
import { commandEnv, commandExists, describeFailure, runCommand } from "../../src/utils/command";

const mockedSpawn = spawn as jest.MockedFunction<typeof spawn>;
const mockedExecFileSync = execFileSync as jest.MockedFunction<typeof execFileSync>;

type MockStream = EventEmitter & { setEncoding: jest.Mock };

interface MockProcess extends EventEmitter {
  stdout: MockStream;
  stderr: MockStream;
  stdin: EventEmitter & { end: jest.Mock };
  kill: jest.Mock;
}

function createMockProcess(): MockProcess {
  const stdin = Object.assign(new EventEmitter(), { end: jest.fn() });
  return Object.assign(new EventEmitter(), {
    stdout: Object.assign(new EventEmitter(), { setEncoding: jest.fn() }),
    stderr: Object.assign(new EventEmitter(), { setEncoding: jest.fn() }),
    stdin,
    kill: jest.fn(),
  });
}

function spawnReturning(cp: MockProcess): void {
  mockedSpawn.mockReturnValue(cp as unknown as ReturnType<typeof spawn>);
}

describe("command", () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe("commandExists", () => {
    it("should return true when which finds the binary", () => {
      mockedExecFileSync.mockReturnValue(Buffer.from("/usr/sbin/iptables\n"));
      expect(commandExists("iptables")).toBe(true);
      expect(mockedExecFileSync).toHaveBeenCalledWith("which", ["iptables"], { stdio: "pipe" });
    });

    it("should return false when which fails", () => {
      mockedExecFileSync.mockImplementation(() => {
        throw new Error("exit 1");
      });
      expect(commandExists("netfilter-persistent")).toBe(false);
    });
  });

  describe("commandEnv", () => {
    it("should force the C locale", () => {
      expect(commandEnv().LC_ALL).toBe("C");
    });
  });

  describe("runCommand", () => {
    it("should collect stdout and the exit code", async () => {
      const cp = createMockProcess();
      spawnReturning(cp);

      const pending = runCommand("iptables", ["-S", "INPUT"]);
      cp.stdout.emit("data", "-P INPUT ACCEPT\n");
      cp.emit("close", 0);

      await expect(pending).resolves.toEqual({ code: 0, stdout: "-P INPUT ACCEPT\n", stderr: "" });
      expect(mockedSpawn).toHaveBeenCalledWith(
        "iptables",
        ["-S", "INPUT"],
        expect.objectContaining({ stdio: ["pipe", "pipe", "pipe"] }),
      );
    });

    it("should decode output as UTF-8 on the streams", async () => {
      const cp = createMockProcess();
      spawnReturning(cp);

      const pending = runCommand("iptables", ["-S", "INPUT"]);
      cp.stdout.emit("data", '-A INPUT -m comment --comment "caf');
      cp.stdout.emit("data", 'é" -j ACCEPT\n');
      cp.emit("close", 0);

      expect(cp.stdout.setEncoding).toHaveBeenCalledWith("utf8");
      expect(cp.stderr.setEncoding).toHaveBeenCalledWith("utf8");
      await expect(pending).resolves.toEqual({
        code: 0,
        stdout: '-A INPUT -m comment --comment "café" -j ACCEPT\n',
        stderr: "",
      });
    });

    it("should fail instead of truncating output past the limit", async () => {
      const cp = createMockProcess();
      spawnReturning(cp);

      const pending = runCommand("iptables-save", [], { maxOutputBytes: 16 });
      cp.stdout.emit("data", "*filter\n");
      cp.stdout.emit("data", ":INPUT ACCEPT [0:0]\n");
      cp.stdout.emit("data", "COMMIT\n");
      cp.emit("close", 0);

      await expect(pending).resolves.toEqual({
        code: 1,
        stdout: "*filter\n",
        stderr: "iptables-save output exceeded 16 bytes",
      });
      expect(cp.kill).toHaveBeenCalledWith("SIGTERM");
    });

    it("should write input to stdin and close it", async () => {
      const cp = createMockProcess();
      spawnReturning(cp);

      const pending = runCommand("iptables-restore", [], { input: "*filter\nCOMMIT\n" });
      cp.emit("close", 0);
      await pending;

      expect(cp.stdin.end).toHaveBeenCalledWith("*filter\nCOMMIT\n");
    });

    it("should report stderr and a non-zero code", async () => {
      const cp = createMockProcess();
      spawnReturning(cp);

      const pending = runCommand("iptables", ["-D", "INPUT"]);
      cp.stderr.emit("data", "iptables: Bad rule\n");
      cp.emit("close", 1);

      await expect(pending).resolves.toEqual({ code: 1, stdout: "", stderr: "iptables: Bad rule\n" });
    });

    it("should resolve a spawn error instead of rejecting", async () => {
      const cp = createMockProcess();
      spawnReturning(cp);

      const pending = runCommand("ip6tables", ["-S", "INPUT"]);
      cp.emit("error", new Error("spawn ip6tables ENOENT"));

      await expect(pending).resolves.toEqual({ code: 1, stdout: "", stderr: "spawn ip6tables ENOENT" });
    });

    it("should keep a stdin write error as the reason", async () => {
      const cp = createMockProcess();
      spawnReturning(cp);

      const pending = runCommand("iptables-restore", [], { input: "*filter\n" });
      cp.stdin.emit("error", new Error("write EPIPE"));
      cp.emit("close", 2);

      await expect(pending).resolves.toEqual({ code: 2, stdout: "", stderr: "write EPIPE" });
    });

    it("should treat a null exit code as failure", async () => {
      const cp = createMockProcess();
      spawnReturning(cp);

      const pending = runCommand("iptables", ["-F", "INPUT"]);
      cp.emit("close", null);

      await expect(pending).resolves.toEqual({ code: 1, stdout: "", stderr: "" });
    });

    describe("timeout", () => {
      beforeEach(() => {
        jest.useFakeTimers();
      });

      afterEach(() => {
        jest.useRealTimers();
      });

      it("should kill the child and resolve after the timeout", async () => {
        const cp = createMockProcess();
        spawnReturning(cp);

        const pending = runCommand("iptables-save", [], { timeoutMs: 5000 });
        jest.advanceTimersByTime(5000);

        await expect(pending).resolves.toEqual({ code: 1, stdout: "", stderr: "iptables-save timed out after 5s" });
        expect(cp.kill).toHaveBeenCalledWith("SIGTERM");

        jest.advanceTimersByTime(2000);
        expect(cp.kill).toHaveBeenCalledWith("SIGKILL");
      });
    });
  });

  describe("describeFailure", () => {
    it("should prefer trimmed stderr", () => {
      expect(describeFailure({ code: 1, stdout: "", stderr: "  lock held \n" })).toBe("lock held");
    });

    it("should fall back to the exit code", () => {
      expect(describeFailure({ code: 3, stdout: "", stderr: "" })).toBe("exit code 3");
    });
  });
});
