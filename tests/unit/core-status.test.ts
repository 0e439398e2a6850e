import { parseChain } from "../../src/core/inspector";
import {
  buildFixCommands,
  evaluateChangeSet,
  readChain,
  readChains,
  unblockedFamilies,
} from "../../src/core/status";
import type { ChangeItem } from "../../src/types/index";
import { createFakeBackends, ruleSpec } from "../helpers/fakeFirewall";

const block = (protocol: "tcp" | "udp", port: number): ChangeItem => ({
  protocol,
  port,
  action: "block",
  description: `Block ${protocol}/${port}`,
});

describe("core/status", () => {
  describe("readChain", () => {
    it("should parse the listing", async () => {
      const { ipv4 } = createFakeBackends({ rules: [ruleSpec("tcp", 902)] });

      const result = await readChain(ipv4, "INPUT");

      expect(result.success && result.chain.rules.map((rule) => rule.port)).toEqual([902]);
    });

    it("should report a failed listing with a hint", async () => {
      const { ipv6 } = createFakeBackends();
      ipv6.fail("listChain", 1, "ip6tables: Permission denied (you must be root)");

      expect(await readChain(ipv6, "INPUT")).toEqual({
        success: false,
        error: "ip6tables -S INPUT failed: ip6tables: Permission denied (you must be root)",
        hint: "Permission denied. Run portguard with sudo.",
      });
    });

    it("should report a parse failure instead of throwing", async () => {
      const { ipv4 } = createFakeBackends();
      ipv4.extraListing.push("-P INPUT DROP");

      expect(await readChain(ipv4, "INPUT")).toEqual({
        success: false,
        error: 'iptables: unexpected policy declaration after the first line: "-P INPUT DROP"',
      });
    });

    it("should read both families", async () => {
      const results = await readChains(createFakeBackends({ policy: "DROP" }), "INPUT");
      expect(results.ipv4.success && results.ipv4.chain.policy).toBe("DROP");
      expect(results.ipv6.success && results.ipv6.chain.policy).toBe("DROP");
    });
  });

  describe("evaluateChangeSet", () => {
    it("should require both families to block an item", () => {
      const chains = {
        ipv4: parseChain("-P INPUT ACCEPT\n-A INPUT -p tcp -m tcp --dport 902 -j DROP"),
        ipv6: parseChain("-P INPUT ACCEPT"),
      };

      const [status] = evaluateChangeSet(chains, [block("tcp", 902)]);

      expect(status.blocked).toBe(false);
      expect(status.verdicts.ipv4.reason).toBe("Blocked by rule #1 (DROP)");
      expect(status.verdicts.ipv6.reason).toBe("No DROP/REJECT rule found for this port");
      expect(unblockedFamilies(status)).toEqual(["ipv6"]);
    });

    it("should count a DROP policy as blocked on that family", () => {
      const chains = { ipv4: parseChain("-P INPUT DROP"), ipv6: parseChain("-P INPUT DROP") };
      expect(evaluateChangeSet(chains, [block("udp", 902)])[0].blocked).toBe(true);
    });
  });

  describe("buildFixCommands", () => {
    it("should suggest one append per family", () => {
      expect(buildFixCommands(block("udp", 902), "INPUT")).toEqual([
        "sudo iptables -A INPUT -p udp --dport 902 -j DROP",
        "sudo ip6tables -A INPUT -p udp --dport 902 -j DROP",
      ]);
    });

    it("should limit suggestions to the given families", () => {
      expect(buildFixCommands(block("tcp", 8333), "INPUT", ["ipv6"])).toEqual([
        "sudo ip6tables -A INPUT -p tcp --dport 8333 -j DROP",
      ]);
    });
  });
});
