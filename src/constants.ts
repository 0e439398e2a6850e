import type { AddressFamily, ChainPolicy } from "./types/index.js";

export const FAMILIES: readonly AddressFamily[] = ["ipv4", "ipv6"];

export const GUARDED_CHAIN = "INPUT";
export const EXPECTED_POLICY: ChainPolicy = "ACCEPT";

/** Confirmation window before an automatic rollback */
export const ROLLBACK_TIMEOUT_SECONDS = 300;
export const MIN_TIMEOUT_SECONDS = 30;
export const MAX_TIMEOUT_SECONDS = 3600;

/** Wait-loop poll interval */
export const TICK_MS = 1000;

export const RETRY_ATTEMPTS = 3;
export const RETRY_DELAY_MS = 1000;

export const CONFIRM_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export const IPTABLES_TOOLS: Record<AddressFamily, { cli: string; save: string; restore: string }> = {
  ipv4: { cli: "iptables", save: "iptables-save", restore: "iptables-restore" },
  ipv6: { cli: "ip6tables", save: "ip6tables-save", restore: "ip6tables-restore" },
};

/** Writes /etc/iptables/rules.v4 and rules.v6 from the live rules */
export const PERSIST_COMMAND = { bin: "netfilter-persistent", args: ["save"] } as const;

export const REQUIRED_COMMANDS = [
  "iptables",
  "ip6tables",
  "iptables-save",
  "ip6tables-save",
  "iptables-restore",
  "ip6tables-restore",
  "netfilter-persistent",
];
