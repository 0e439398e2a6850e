import { homedir } from "os";
import { join, resolve } from "path";
import {
  EXPECTED_POLICY,
  GUARDED_CHAIN,
  MAX_TIMEOUT_SECONDS,
  MIN_TIMEOUT_SECONDS,
  ROLLBACK_TIMEOUT_SECONDS,
} from "../constants.js";
import type { AddressFamily, ChainPolicy } from "../types/index.js";

export const DEFAULT_BACKUP_DIR = join(homedir(), "iptables-backups");

/** Files `netfilter-persistent save` writes and the boot service loads */
export const PERSIST_PATHS: Record<AddressFamily, string> = {
  ipv4: "/etc/iptables/rules.v4",
  ipv6: "/etc/iptables/rules.v6",
};

export interface GuardConfig {
  backupDir: string;
  timeoutSeconds: number;
  chain: string;
  expectedPolicy: ChainPolicy;
  persistPaths: Record<AddressFamily, string>;
}

export interface GuardCliOptions {
  timeout?: string;
  backupDir?: string;
}

export interface ConfigLoadResult {
  config: GuardConfig;
  warnings: string[];
}

export function parseTimeout(value: string): number | undefined {
  if (!/^\d+$/.test(value.trim())) return undefined;
  const seconds = Number(value.trim());
  if (seconds < MIN_TIMEOUT_SECONDS || seconds > MAX_TIMEOUT_SECONDS) return undefined;
  return seconds;
}

/**
 * Defaults, then environment (PORTGUARD_BACKUP_DIR, PORTGUARD_TIMEOUT), then
 * CLI flags. Invalid values are reported and the previous layer is kept.
 */
export function resolveGuardConfig(
  options: GuardCliOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): ConfigLoadResult {
  const warnings: string[] = [];
  const config: GuardConfig = {
    backupDir: DEFAULT_BACKUP_DIR,
    timeoutSeconds: ROLLBACK_TIMEOUT_SECONDS,
    chain: GUARDED_CHAIN,
    expectedPolicy: EXPECTED_POLICY,
    persistPaths: { ...PERSIST_PATHS },
  };

  const layers = [
    {
      backupDir: { label: "PORTGUARD_BACKUP_DIR", value: env.PORTGUARD_BACKUP_DIR },
      timeout: { label: "PORTGUARD_TIMEOUT", value: env.PORTGUARD_TIMEOUT },
    },
    {
      backupDir: { label: "--backup-dir", value: options.backupDir },
      timeout: { label: "--timeout", value: options.timeout },
    },
  ];

  for (const { backupDir, timeout } of layers) {
    if (backupDir.value !== undefined) {
      if (backupDir.value.trim().length === 0) {
        warnings.push(`Ignoring empty ${backupDir.label}`);
      } else {
        config.backupDir = resolve(backupDir.value.trim());
      }
    }

    if (timeout.value !== undefined) {
      const seconds = parseTimeout(timeout.value);
      if (seconds === undefined) {
        warnings.push(
          `Invalid ${timeout.label}: "${timeout.value}". Must be a whole number of seconds between ${MIN_TIMEOUT_SECONDS} and ${MAX_TIMEOUT_SECONDS}. Using ${config.timeoutSeconds}s.`,
        );
      } else {
        config.timeoutSeconds = seconds;
      }
    }
  }

  return { config, warnings };
}
