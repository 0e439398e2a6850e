import { existsSync, mkdirSync, readFileSync, unlinkSync, writeFileSync } from "fs";
import { join } from "path";
import { FAMILIES, RETRY_ATTEMPTS, RETRY_DELAY_MS } from "../constants.js";
import { BackupError } from "./errors.js";
import { describeFailure } from "../utils/command.js";
import { getErrorMessage, mapCommandError, mapFileSystemError } from "../utils/errorMapper.js";
import { commandOutcome, retrySequentially, type Sleep } from "../utils/retry.js";
import type {
  AddressFamily,
  FirewallBackends,
  GuardEventHandler,
} from "../types/index.js";

// ─── Pure Functions ─────────────────────────────────────────────────────────

export const SNAPSHOT_FILE_NAMES: Record<AddressFamily, string> = {
  ipv4: "iptables-before-portguard.rules",
  ipv6: "ip6tables-before-portguard.rules",
};

export function getSnapshotPaths(dir: string): Record<AddressFamily, string> {
  return {
    ipv4: join(dir, SNAPSHOT_FILE_NAMES.ipv4),
    ipv6: join(dir, SNAPSHOT_FILE_NAMES.ipv6),
  };
}

// ─── Types ──────────────────────────────────────────────────────────────────

export interface Snapshot {
  paths: Record<AddressFamily, string>;
  createdAt: string;
}

export interface DiscardResult {
  removed: string[];
  failed: Array<{ path: string; error: string }>;
}

export interface BackupManagerOptions {
  dir: string;
  backends: FirewallBackends;
  retryAttempts?: number;
  retryDelayMs?: number;
  sleep?: Sleep;
  onEvent?: GuardEventHandler;
}

// ─── Backup Manager ─────────────────────────────────────────────────────────

/**
 * Owns the snapshot file pair. The files double as the "a run is in flight"
 * marker: they exist from the backup phase until a verified commit or rollback.
 */
export class BackupManager {
  readonly dir: string;
  readonly paths: Record<AddressFamily, string>;
  private readonly backends: FirewallBackends;
  private readonly retryAttempts: number;
  private readonly retryDelayMs: number;
  private readonly sleep?: Sleep;
  private onEvent: GuardEventHandler;

  constructor(options: BackupManagerOptions) {
    this.dir = options.dir;
    this.paths = getSnapshotPaths(options.dir);
    this.backends = options.backends;
    this.retryAttempts = options.retryAttempts ?? RETRY_ATTEMPTS;
    this.retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS;
    this.sleep = options.sleep;
    this.onEvent = options.onEvent ?? (() => {});
  }

  /** Route restore/discard reports to the current run's listener. */
  setEventHandler(handler: GuardEventHandler): void {
    this.onEvent = handler;
  }

  existingSnapshotFiles(): string[] {
    return FAMILIES.map((family) => this.paths[family]).filter((path) => existsSync(path));
  }

  snapshotExists(): boolean {
    return this.existingSnapshotFiles().length > 0;
  }

  async createSnapshot(): Promise<Snapshot> {
    try {
      mkdirSync(this.dir, { recursive: true, mode: 0o700 });
    } catch (error: unknown) {
      throw new BackupError(
        `Could not create backup directory ${this.dir}: ${getErrorMessage(error)}`,
        mapFileSystemError(error) || undefined,
      );
    }

    for (const family of FAMILIES) {
      const backend = this.backends[family];
      const dump = await backend.dumpRules();
      if (dump.code !== 0) {
        throw new BackupError(
          `${backend.label}-save failed: ${describeFailure(dump)}`,
          mapCommandError(dump.stderr, `${backend.label}-save`) || undefined,
        );
      }

      const path = this.paths[family];
      try {
        writeFileSync(path, dump.stdout, { mode: 0o600 });
      } catch (error: unknown) {
        throw new BackupError(
          `Could not write ${path}: ${getErrorMessage(error)}`,
          mapFileSystemError(error) || undefined,
        );
      }
      this.onEvent({ type: "snapshot", family, path });
    }

    return { paths: { ...this.paths }, createdAt: new Date().toISOString() };
  }

  async restore(family: AddressFamily): Promise<boolean> {
    const path = this.paths[family];
    if (!existsSync(path)) {
      this.onEvent({ type: "snapshot-missing", family, path });
      return false;
    }

    const backend = this.backends[family];
    return retrySequentially(
      async () => {
        const payload = readFileSync(path, "utf-8");
        return commandOutcome(await backend.restoreRules(payload));
      },
      {
        attempts: this.retryAttempts,
        delayMs: this.retryDelayMs,
        sleep: this.sleep,
        onAttempt: (attempt, outcome) =>
          this.onEvent({
            type: "attempt",
            family,
            strategy: "restore",
            attempt,
            maxAttempts: this.retryAttempts,
            success: outcome.success,
            ...(outcome.detail ? { detail: outcome.detail } : {}),
          }),
      },
    );
  }

  /** Best-effort: failures are reported, never thrown. */
  discard(): DiscardResult {
    const result: DiscardResult = { removed: [], failed: [] };

    for (const path of this.existingSnapshotFiles()) {
      try {
        unlinkSync(path);
        result.removed.push(path);
        this.onEvent({ type: "discard", path, success: true });
      } catch (error: unknown) {
        const message = getErrorMessage(error);
        result.failed.push({ path, error: message });
        this.onEvent({ type: "discard", path, success: false, detail: message });
      }
    }

    return result;
  }
}
