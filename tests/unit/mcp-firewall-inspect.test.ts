import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { getSnapshotPaths } from "../../src/core/backup";
import { handleFirewallInspect, type FirewallInspectDeps } from "../../src/mcp/tools/firewallInspect";
import { createFakeBackends, ruleSpec, type FakeFirewall } from "../helpers/fakeFirewall";

const VMWARE = join(__dirname, "..", "..", "changesets", "vmware.yml");

function payload(result: { content: Array<{ type: "text"; text: string }> }): unknown {
  return JSON.parse(result.content[0].text);
}

describe("handleFirewallInspect", () => {
  let dir: string;
  let backends: { ipv4: FakeFirewall; ipv6: FakeFirewall };
  let deps: FirewallInspectDeps;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "portguard-mcp-"));
    backends = createFakeBackends({ rules: [ruleSpec("tcp", 902)] });
    deps = { backends, backupDir: dir, chain: "INPUT" };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("chains", () => {
    it("returns both parsed chains", async () => {
      backends.ipv6.extraListing.push("-A INPUT -i lo -j ACCEPT");

      const result = await handleFirewallInspect({ action: "chains" }, deps);

      expect(result.isError).toBeUndefined();
      expect(payload(result)).toEqual({
        chain: "INPUT",
        ipv4: { policy: "ACCEPT", rules: [{ ordinal: 1, protocol: "tcp", port: 902, target: "DROP" }], untracked: [] },
        ipv6: {
          policy: "ACCEPT",
          rules: [{ ordinal: 1, protocol: "tcp", port: 902, target: "DROP" }],
          untracked: ["-A INPUT -i lo -j ACCEPT"],
        },
      });
    });

    it("returns an error when a chain cannot be listed", async () => {
      backends.ipv4.fail("listChain", 1, "Permission denied");

      const result = await handleFirewallInspect({ action: "chains" }, deps);

      expect(result.isError).toBe(true);
      expect(payload(result)).toEqual({
        error: "ipv4: iptables -S INPUT failed: Permission denied",
        hint: "Listing chains needs root and the iptables tools",
        suggested_actions: [{ command: "portguard doctor", reason: "Check privileges and required commands" }],
      });
    });

    it("never changes the firewall", async () => {
      await handleFirewallInspect({ action: "chains" }, deps);
      await handleFirewallInspect({ action: "check", port: 902 }, deps);

      expect(new Set([...backends.ipv4.ops(), ...backends.ipv6.ops()])).toEqual(new Set(["listChain"]));
    });
  });

  describe("check", () => {
    it("evaluates a single port, defaulting to tcp", async () => {
      const result = await handleFirewallInspect({ action: "check", port: 902 }, deps);

      expect(payload(result)).toEqual({
        results: [
          {
            protocol: "tcp",
            port: 902,
            description: "Block tcp/902",
            blocked: true,
            ipv4: "Blocked by rule #1 (DROP)",
            ipv6: "Blocked by rule #1 (DROP)",
          },
        ],
        summary: { total: 1, blocked: 1, notBlocked: 0 },
        suggested_actions: [],
      });
    });

    it("evaluates a change set file and suggests fixes", async () => {
      const result = await handleFirewallInspect({ action: "check", changeset: VMWARE }, deps);

      const body = payload(result);
      expect(body).toMatchObject({ summary: { total: 5, blocked: 1, notBlocked: 4 } });
      expect(body).toMatchObject({
        results: expect.arrayContaining([
          expect.objectContaining({
            protocol: "udp",
            port: 902,
            blocked: false,
            fix: ["sudo iptables -A INPUT -p udp --dport 902 -j DROP", "sudo ip6tables -A INPUT -p udp --dport 902 -j DROP"],
          }),
        ]),
      });
    });

    it("requires a change set or a port", async () => {
      const result = await handleFirewallInspect({ action: "check" }, deps);

      expect(result.isError).toBe(true);
      expect(payload(result)).toEqual({ error: "Either 'changeset' or 'port' is required for the 'check' action" });
      expect(backends.ipv4.calls).toEqual([]);
    });

    it("reports an invalid change set", async () => {
      const path = join(dir, "bad.yml");
      writeFileSync(path, "rules: []\n");

      const result = await handleFirewallInspect({ action: "check", changeset: path }, deps);

      expect(payload(result)).toEqual({ error: "Invalid change set: rules: rules must list at least one port" });
    });
  });

  describe("snapshot", () => {
    it("reports no pending snapshot", async () => {
      const result = await handleFirewallInspect({ action: "snapshot" }, deps);

      expect(payload(result)).toEqual({ backupDir: dir, pending: false, files: [], suggested_actions: [] });
    });

    it("reports pending snapshot files", async () => {
      const paths = getSnapshotPaths(dir);
      writeFileSync(paths.ipv4, "*filter\nCOMMIT\n");
      writeFileSync(paths.ipv6, "*filter\nCOMMIT\n");

      const result = await handleFirewallInspect({ action: "snapshot" }, deps);

      expect(payload(result)).toEqual({
        backupDir: dir,
        pending: true,
        files: [paths.ipv4, paths.ipv6],
        suggested_actions: [
          { command: "sudo portguard recover", reason: "A guarded apply did not finish; restore the saved rules" },
        ],
      });
    });
  });
});
