import {
  CONFIRM_SIGNALS,
  EXPECTED_POLICY,
  FAMILIES,
  GUARDED_CHAIN,
  RETRY_ATTEMPTS,
  RETRY_DELAY_MS,
  ROLLBACK_TIMEOUT_SECONDS,
  TICK_MS,
} from "../constants.js";
import { BackupError } from "./errors.js";
import { verifyPreconditions } from "./preconditions.js";
import { runRollback } from "./rollback.js";
import type { BackupManager, Snapshot } from "./backup.js";
import { describeFailure } from "../utils/command.js";
import { getErrorMessage, mapCommandError } from "../utils/errorMapper.js";
import { sleep as realSleep, type Sleep } from "../utils/retry.js";
import type {
  AddressFamily,
  ChainPolicy,
  ChangeItem,
  CommandResult,
  EnvironmentReport,
  FirewallBackends,
  GuardEventHandler,
  GuardFailure,
  GuardPhase,
  OrchestrationState,
  PreconditionCheck,
  RollbackReport,
  TerminalPhase,
} from "../types/index.js";

// ─── Types ──────────────────────────────────────────────────────────────────

export type ConfirmListener = (signal: NodeJS.Signals) => void;

/** Anything that delivers process signals; `process` in production. */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: ConfirmListener): unknown;
  removeListener(event: NodeJS.Signals, listener: ConfirmListener): unknown;
}

export interface GuardOptions {
  changes: readonly ChangeItem[];
  backends: FirewallBackends;
  backup: BackupManager;
  checkEnvironment: () => EnvironmentReport | Promise<EnvironmentReport>;
  /** Saves the live rules of both families for the next boot */
  persistRulesPermanently: () => Promise<CommandResult>;
  chain?: string;
  expectedPolicy?: ChainPolicy;
  timeoutSeconds?: number;
  tickMs?: number;
  retryAttempts?: number;
  retryDelayMs?: number;
  signals?: SignalSource;
  now?: () => number;
  sleep?: Sleep;
  onEvent?: GuardEventHandler;
}

export interface GuardResult {
  phase: TerminalPhase;
  state: OrchestrationState;
  checks: PreconditionCheck[];
  failure?: GuardFailure;
  snapshot?: Snapshot;
  rollback?: RollbackReport;
  persisted?: boolean;
  /** Snapshot files left on disk for manual recovery */
  retainedSnapshots: string[];
}

type ApplyOutcome =
  | { ok: true }
  | { ok: false; family: AddressFamily; item: ChangeItem; message: string; hint?: string };

type WaitOutcome = "confirmed" | "timeout" | "wait-error";

// ─── Pure Functions ─────────────────────────────────────────────────────────

export function exitCodeFor(result: Pick<GuardResult, "phase">): number {
  if (result.phase === "COMMITTED") return 0;
  if (result.phase === "ROLLBACK_PARTIAL") return 2;
  return 1;
}

/** Countdown cadence: every 30 seconds, then every second under 10. */
export function shouldReportRemaining(remainingSeconds: number): boolean {
  return remainingSeconds % 30 === 0 || remainingSeconds < 10;
}

// ─── Orchestrator ───────────────────────────────────────────────────────────

/**
 * Apply a change set with a dead man's switch:
 *
 * INIT → VERIFIED → BACKED_UP → APPLIED → AWAITING_CONFIRMATION
 *   → COMMITTED | ROLLED_BACK | ROLLBACK_PARTIAL
 *
 * Failures before BACKED_UP end in ABORTED with nothing changed. An apply
 * failure, a timeout or an error during the wait all take the rollback path.
 */
export async function runGuardedChange(options: GuardOptions): Promise<GuardResult> {
  const chain = options.chain ?? GUARDED_CHAIN;
  const timeoutSeconds = options.timeoutSeconds ?? ROLLBACK_TIMEOUT_SECONDS;
  const tickMs = options.tickMs ?? TICK_MS;
  const retryAttempts = options.retryAttempts ?? RETRY_ATTEMPTS;
  const retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS;
  const signals: SignalSource = options.signals ?? process;
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? realSleep;
  const emit: GuardEventHandler = options.onEvent ?? (() => {});
  const { backends, backup, changes } = options;

  backup.setEventHandler(emit);

  const state: OrchestrationState = {
    phase: "INIT",
    backupCreated: false,
    changesApplied: false,
    confirmed: false,
  };
  const enter = (phase: GuardPhase) => {
    state.phase = phase;
    emit({ type: "phase", phase });
  };
  const applied: Record<AddressFamily, ChangeItem[]> = { ipv4: [], ipv6: [] };

  emit({ type: "phase", phase: "INIT" });

  // ── INIT → VERIFIED ──
  const preconditions = await verifyPreconditions({
    backends,
    backup,
    checkEnvironment: options.checkEnvironment,
    chain,
    expectedPolicy: options.expectedPolicy ?? EXPECTED_POLICY,
    onCheck: (check) => emit({ type: "check", check }),
  });
  const checks = preconditions.checks;

  if (!preconditions.passed) {
    const failed = checks.find((check) => !check.passed);
    enter("ABORTED");
    return {
      phase: "ABORTED",
      state,
      checks,
      failure: {
        kind: "precondition",
        message: failed ? failed.detail : "Preconditions not met",
        ...(failed?.hint ? { hint: failed.hint } : {}),
      },
      retainedSnapshots: [],
    };
  }
  enter("VERIFIED");

  // ── VERIFIED → BACKED_UP ──
  let snapshot: Snapshot;
  try {
    snapshot = await backup.createSnapshot();
  } catch (error: unknown) {
    enter("ABORTED");
    return {
      phase: "ABORTED",
      state,
      checks,
      failure: {
        kind: "backup",
        message: getErrorMessage(error),
        ...(error instanceof BackupError && error.hint ? { hint: error.hint } : {}),
      },
      retainedSnapshots: backup.existingSnapshotFiles(),
    };
  }
  state.backupCreated = true;
  enter("BACKED_UP");

  const rollBack = async (failure: GuardFailure): Promise<GuardResult> => {
    const rollback = await runRollback({
      backends,
      backup,
      changes,
      applied,
      chain,
      retryAttempts,
      retryDelayMs,
      sleep,
      emit,
    });
    enter(rollback.outcome);

    let retainedSnapshots: string[] = [];
    if (rollback.outcome === "ROLLED_BACK") {
      backup.discard();
    } else {
      retainedSnapshots = backup.existingSnapshotFiles();
    }
    return { phase: rollback.outcome, state, checks, failure, snapshot, rollback, retainedSnapshots };
  };

  // ── BACKED_UP → APPLIED ──
  const applyOutcome = await applyChanges(backends, changes, applied, emit);
  if (!applyOutcome.ok) {
    return rollBack({
      kind: "apply",
      message: `Failed to block ${applyOutcome.item.protocol}/${applyOutcome.item.port} (${applyOutcome.family}): ${applyOutcome.message}`,
      ...(applyOutcome.hint ? { hint: applyOutcome.hint } : {}),
    });
  }
  state.changesApplied = true;
  enter("APPLIED");
  await reportListings(backends, emit);

  // ── APPLIED → AWAITING_CONFIRMATION ──
  // The listener only flips the flag; commit/rollback run on this path.
  const onSignal: ConfirmListener = () => {
    state.confirmed = true;
  };
  for (const signal of CONFIRM_SIGNALS) {
    signals.on(signal, onSignal);
  }

  try {
    enter("AWAITING_CONFIRMATION");
    const outcome = await awaitConfirmation(state, { timeoutSeconds, tickMs, now, sleep, emit });

    if (outcome === "confirmed") {
      const persisted = await persistRules(options.persistRulesPermanently, emit);
      backup.discard();
      enter("COMMITTED");
      return {
        phase: "COMMITTED",
        state,
        checks,
        snapshot,
        persisted,
        retainedSnapshots: backup.existingSnapshotFiles(),
      };
    }

    return rollBack(
      outcome === "timeout"
        ? { kind: "timeout", message: `No confirmation received within ${timeoutSeconds} seconds` }
        : { kind: "wait-error", message: "Unexpected error while waiting for confirmation" },
    );
  } finally {
    for (const signal of CONFIRM_SIGNALS) {
      signals.removeListener(signal, onSignal);
    }
  }
}

// ─── Phases ─────────────────────────────────────────────────────────────────

/** Abort on the first failed command; a half-applied change set is never kept. */
async function applyChanges(
  backends: FirewallBackends,
  changes: readonly ChangeItem[],
  applied: Record<AddressFamily, ChangeItem[]>,
  emit: GuardEventHandler,
): Promise<ApplyOutcome> {
  for (const item of changes) {
    for (const family of FAMILIES) {
      const backend = backends[family];
      let message: string | undefined;
      let hint = "";
      try {
        const result = await backend.appendBlockRule(item.protocol, item.port);
        if (result.code !== 0) {
          message = describeFailure(result);
          hint = mapCommandError(result.stderr, backend.label);
        }
      } catch (error: unknown) {
        message = getErrorMessage(error);
      }

      if (message !== undefined) {
        emit({ type: "apply", family, item, success: false, detail: message });
        return { ok: false, family, item, message, ...(hint ? { hint } : {}) };
      }
      applied[family].push(item);
      emit({ type: "apply", family, item, success: true });
    }
  }
  return { ok: true };
}

async function reportListings(backends: FirewallBackends, emit: GuardEventHandler): Promise<void> {
  for (const family of FAMILIES) {
    try {
      const listing = await backends[family].listChain();
      const lines = listing.code === 0
        ? listing.stdout.split("\n").map((line) => line.trim()).filter((line) => line.length > 0)
        : [`(listing failed: ${describeFailure(listing)})`];
      emit({ type: "listing", family, lines });
    } catch (error: unknown) {
      emit({ type: "listing", family, lines: [`(listing failed: ${getErrorMessage(error)})`] });
    }
  }
}

interface WaitOptions {
  timeoutSeconds: number;
  tickMs: number;
  now: () => number;
  sleep: Sleep;
  emit: GuardEventHandler;
}

async function awaitConfirmation(state: OrchestrationState, options: WaitOptions): Promise<WaitOutcome> {
  const start = options.now();
  try {
    for (;;) {
      if (state.confirmed) {
        options.emit({ type: "confirmed" });
        return "confirmed";
      }

      const elapsedSeconds = (options.now() - start) / 1000;
      const remaining = options.timeoutSeconds - elapsedSeconds;
      if (remaining <= 0) {
        options.emit({ type: "timeout", timeoutSeconds: options.timeoutSeconds });
        return "timeout";
      }

      const whole = Math.floor(remaining);
      if (shouldReportRemaining(whole)) {
        options.emit({ type: "countdown", remainingSeconds: whole });
      }
      await options.sleep(options.tickMs);
    }
  } catch (error: unknown) {
    options.emit({ type: "wait-error", detail: getErrorMessage(error) });
    return "wait-error";
  }
}

/** Persistence failures are warnings: the rules stay active until reboot. */
async function persistRules(persist: () => Promise<CommandResult>, emit: GuardEventHandler): Promise<boolean> {
  try {
    const result = await persist();
    const success = result.code === 0;
    emit({ type: "persist", success, ...(success ? {} : { detail: describeFailure(result) }) });
    return success;
  } catch (error: unknown) {
    emit({ type: "persist", success: false, detail: getErrorMessage(error) });
    return false;
  }
}
