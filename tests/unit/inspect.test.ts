import { join } from "path";
import { createFakeBackends, ruleSpec, type FakeFirewall } from "../helpers/fakeFirewall";

jest.mock("../../src/utils/iptables", () => {
  const actual = jest.requireActual<typeof import("../../src/utils/iptables")>("../../src/utils/iptables");
  return { ...actual, createIptablesBackends: jest.fn() };
});

import { createIptablesBackends } from "../../src/utils/iptables";
import { describeChain, inspectCommand } from "../../src/commands/inspect";
import { parseChain } from "../../src/core/inspector";

const mockedCreateBackends = createIptablesBackends as jest.MockedFunction<typeof createIptablesBackends>;

const VMWARE = join(__dirname, "..", "..", "changesets", "vmware.yml");
const VMWARE_RULES = [
  ruleSpec("tcp", 902),
  ruleSpec("udp", 902),
  ruleSpec("tcp", 912),
  ruleSpec("tcp", 8222),
  ruleSpec("tcp", 8333),
];

describe("inspect command", () => {
  let consoleSpy: jest.SpyInstance;
  let backends: { ipv4: FakeFirewall; ipv6: FakeFirewall };

  const logged = (): string[] => consoleSpy.mock.calls.map((call: unknown[]) => call.join(" "));

  beforeEach(() => {
    consoleSpy = jest.spyOn(console, "log").mockImplementation();
    jest.clearAllMocks();
    backends = createFakeBackends({ rules: VMWARE_RULES });
    mockedCreateBackends.mockReturnValue(backends);
  });

  afterEach(() => {
    consoleSpy.mockRestore();
    process.exitCode = undefined;
  });

  describe("describeChain", () => {
    it("should summarize the policy, rules and untracked lines", () => {
      const chain = parseChain(
        "-P INPUT ACCEPT\n-A INPUT -p tcp -m tcp --dport 902 -j DROP\n-A INPUT -i lo -j ACCEPT",
      );
      expect(describeChain(chain)).toEqual([
        "policy ACCEPT, 1 port rule(s), 1 other rule(s)",
        "#1 tcp/902 → DROP",
        "(not evaluated) -A INPUT -i lo -j ACCEPT",
      ]);
    });
  });

  it("should list both chains without a change set", async () => {
    await inspectCommand();

    expect(logged()).toContain("→ policy ACCEPT, 5 port rule(s), 0 other rule(s)");
    expect(process.exitCode).toBeUndefined();
  });

  it("should pass when every port is blocked on both families", async () => {
    await inspectCommand(VMWARE);

    expect(logged()).toContain("✔ All 5 port(s) blocked on IPv4 and IPv6.");
    expect(process.exitCode).toBeUndefined();
  });

  it("should explain and suggest a fix for a port open on one family", async () => {
    backends.ipv6.rules = [ruleSpec("udp", 902, "ACCEPT"), ...VMWARE_RULES];

    await inspectCommand(VMWARE);

    const output = logged();
    expect(output).toContain("✖ Port 902/udp is NOT fully blocked!");
    expect(output).toContain("  IPv6: ACCEPTED by rule #1 BEFORE any DROP/REJECT");
    expect(output).toContain("    sudo ip6tables -A INPUT -p udp --dport 902 -j DROP");
    expect(output).not.toContain("    sudo iptables -A INPUT -p udp --dport 902 -j DROP");
    expect(output).toContain("✖ 1 of 5 port(s) not fully blocked.");
    expect(process.exitCode).toBe(1);
  });

  it("should fail when a chain cannot be read", async () => {
    backends.ipv4.fail("listChain", 1, "iptables: Permission denied (you must be root)");

    await inspectCommand(VMWARE);

    expect(logged()).toContain("✖ iptables -S INPUT failed: iptables: Permission denied (you must be root)");
    expect(logged()).not.toContain("✔ All 5 port(s) blocked on IPv4 and IPv6.");
    expect(process.exitCode).toBe(1);
  });

  it("should fail for an invalid change set before reading any chain", async () => {
    await inspectCommand(join(__dirname, "does-not-exist.yml"));

    expect(process.exitCode).toBe(1);
    expect(backends.ipv4.calls).toEqual([]);
  });
});
