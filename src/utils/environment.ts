import { REQUIRED_COMMANDS } from "../constants.js";
import { commandExists } from "./command.js";
import type { EnvironmentReport } from "../types/index.js";

export function isRoot(): boolean {
  return typeof process.getuid === "function" && process.getuid() === 0;
}

export function missingCommands(commands: readonly string[] = REQUIRED_COMMANDS): string[] {
  return commands.filter((bin) => !commandExists(bin));
}

export function installHint(bin: string): string {
  if (bin === "netfilter-persistent") {
    return "Install with: sudo apt install iptables-persistent";
  }
  return "Install with: sudo apt install iptables";
}

/** Privilege and tool presence, folded into the single "environment ready" precondition. */
export function checkEnvironment(): EnvironmentReport {
  const problems: string[] = [];

  if (!isRoot()) {
    problems.push("portguard must be run as root (sudo)");
  }
  for (const bin of missingCommands()) {
    problems.push(`Required command '${bin}' not found. ${installHint(bin)}`);
  }

  return { ready: problems.length === 0, problems };
}
