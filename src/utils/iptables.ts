import { GUARDED_CHAIN, IPTABLES_TOOLS, PERSIST_COMMAND } from "../constants.js";
import { runCommand } from "./command.js";
import type {
  AddressFamily,
  CommandResult,
  FirewallBackend,
  FirewallBackends,
  Protocol,
} from "../types/index.js";

// ─── Pure Functions ─────────────────────────────────────────────────────────

export function buildBlockRuleArgs(
  operation: "-A" | "-D",
  protocol: Protocol,
  port: number,
  chain: string = GUARDED_CHAIN,
): string[] {
  return [operation, chain, "-p", protocol, "--dport", String(port), "-j", "DROP"];
}

export function buildListArgs(chain: string = GUARDED_CHAIN): string[] {
  return ["-S", chain];
}

export function buildFlushArgs(chain: string = GUARDED_CHAIN): string[] {
  return ["-F", chain];
}

export function formatCommand(bin: string, args: string[]): string {
  return [bin, ...args].join(" ");
}

// ─── Backend ────────────────────────────────────────────────────────────────

export interface IptablesBackendOptions {
  chain?: string;
}

export class IptablesBackend implements FirewallBackend {
  readonly family: AddressFamily;
  readonly label: string;
  private readonly chain: string;

  constructor(family: AddressFamily, options: IptablesBackendOptions = {}) {
    this.family = family;
    this.label = IPTABLES_TOOLS[family].cli;
    this.chain = options.chain ?? GUARDED_CHAIN;
  }

  dumpRules(): Promise<CommandResult> {
    return runCommand(IPTABLES_TOOLS[this.family].save, []);
  }

  restoreRules(payload: string): Promise<CommandResult> {
    return runCommand(IPTABLES_TOOLS[this.family].restore, [], { input: payload });
  }

  appendBlockRule(protocol: Protocol, port: number): Promise<CommandResult> {
    return runCommand(this.label, buildBlockRuleArgs("-A", protocol, port, this.chain));
  }

  deleteBlockRule(protocol: Protocol, port: number): Promise<CommandResult> {
    return runCommand(this.label, buildBlockRuleArgs("-D", protocol, port, this.chain));
  }

  flushChain(): Promise<CommandResult> {
    return runCommand(this.label, buildFlushArgs(this.chain));
  }

  listChain(): Promise<CommandResult> {
    return runCommand(this.label, buildListArgs(this.chain));
  }
}

export function createIptablesBackends(chain: string = GUARDED_CHAIN): FirewallBackends {
  return {
    ipv4: new IptablesBackend("ipv4", { chain }),
    ipv6: new IptablesBackend("ipv6", { chain }),
  };
}

/** Save the live rules of both families to the files loaded at boot. */
export function persistRules(): Promise<CommandResult> {
  return runCommand(PERSIST_COMMAND.bin, [...PERSIST_COMMAND.args]);
}
