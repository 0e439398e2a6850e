import { FAMILIES } from "../constants.js";
import { findBlockingRule } from "./inspector.js";
import { readChain } from "./status.js";
import type { BackupManager } from "./backup.js";
import { describeFailure } from "../utils/command.js";
import { getErrorMessage } from "../utils/errorMapper.js";
import { commandOutcome, retrySequentially, type Sleep } from "../utils/retry.js";
import type {
  AddressFamily,
  ChangeItem,
  FamilyRollback,
  FirewallBackends,
  GuardEventHandler,
  RecoveryStrategyName,
  ResidualRule,
  RollbackReport,
} from "../types/index.js";

export interface RollbackContext {
  backends: FirewallBackends;
  backup: BackupManager;
  /** Whole change set, checked for leftovers after the attempts */
  changes: readonly ChangeItem[];
  /** Items that made it into each family's chain, in application order */
  applied: Record<AddressFamily, readonly ChangeItem[]>;
  chain: string;
  retryAttempts: number;
  retryDelayMs: number;
  sleep: Sleep;
  emit: GuardEventHandler;
}

export interface RecoveryStrategy {
  name: RecoveryStrategyName;
  run(family: AddressFamily): Promise<boolean>;
}

// ─── Strategies ─────────────────────────────────────────────────────────────

function restoreFromSnapshot(ctx: RollbackContext): RecoveryStrategy {
  return { name: "restore", run: (family) => ctx.backup.restore(family) };
}

function flushChain(ctx: RollbackContext): RecoveryStrategy {
  return {
    name: "flush",
    run: (family) =>
      retrySequentially(async () => commandOutcome(await ctx.backends[family].flushChain()), {
        attempts: ctx.retryAttempts,
        delayMs: ctx.retryDelayMs,
        sleep: ctx.sleep,
        onAttempt: (attempt, outcome) =>
          ctx.emit({
            type: "attempt",
            family,
            strategy: "flush",
            attempt,
            maxAttempts: ctx.retryAttempts,
            success: outcome.success,
            ...(outcome.detail ? { detail: outcome.detail } : {}),
          }),
      }),
  };
}

/** Last resort: undo each applied rule, newest first, one try each. */
function deleteAppliedRules(ctx: RollbackContext): RecoveryStrategy {
  return {
    name: "delete-rules",
    run: async (family) => {
      const items = [...ctx.applied[family]].reverse();
      let allDeleted = true;

      for (const [index, item] of items.entries()) {
        let success = false;
        let detail: string;
        try {
          const result = await ctx.backends[family].deleteBlockRule(item.protocol, item.port);
          success = result.code === 0;
          detail = success
            ? `Deleted ${item.protocol}/${item.port}`
            : `${item.protocol}/${item.port}: ${describeFailure(result)}`;
        } catch (error: unknown) {
          detail = `${item.protocol}/${item.port}: ${getErrorMessage(error)}`;
        }
        ctx.emit({
          type: "attempt",
          family,
          strategy: "delete-rules",
          attempt: index + 1,
          maxAttempts: items.length,
          success,
          detail,
        });
        if (!success) allDeleted = false;
      }

      return allDeleted;
    },
  };
}

export function buildRecoveryStrategies(ctx: RollbackContext): RecoveryStrategy[] {
  return [restoreFromSnapshot(ctx), flushChain(ctx), deleteAppliedRules(ctx)];
}

// ─── Verification ───────────────────────────────────────────────────────────

/**
 * Re-read both chains and list every change item still present as a DROP
 * rule. A chain that cannot be listed or parsed counts as a residual.
 */
export async function findResidualRules(
  backends: FirewallBackends,
  changes: readonly ChangeItem[],
  chainName: string,
): Promise<ResidualRule[]> {
  const residual: ResidualRule[] = [];

  for (const family of FAMILIES) {
    const backend = backends[family];
    const read = await readChain(backend, chainName);
    if (!read.success) {
      residual.push({ family, detail: `Could not inspect ${backend.label}: ${read.error}` });
      continue;
    }
    for (const item of changes) {
      const rule = findBlockingRule(read.chain, item);
      if (rule) {
        residual.push({ family, item, detail: `Rule still present in ${backend.label}: ${rule.raw}` });
      }
    }
  }

  return residual;
}

// ─── Rollback ───────────────────────────────────────────────────────────────

/**
 * Escalate restore → flush → per-rule delete independently per family, then
 * verify with a fresh inspection. Attempts never throw out of the sequence.
 */
export async function runRollback(
  ctx: RollbackContext,
  strategies: RecoveryStrategy[] = buildRecoveryStrategies(ctx),
): Promise<RollbackReport> {
  const families: Record<AddressFamily, FamilyRollback> = {
    ipv4: { success: false },
    ipv6: { success: false },
  };

  for (const family of FAMILIES) {
    for (const strategy of strategies) {
      let recovered = false;
      try {
        recovered = await strategy.run(family);
      } catch (error: unknown) {
        ctx.emit({
          type: "attempt",
          family,
          strategy: strategy.name,
          attempt: 1,
          maxAttempts: 1,
          success: false,
          detail: getErrorMessage(error),
        });
      }
      if (recovered) {
        families[family] = { success: true, strategy: strategy.name };
        break;
      }
    }
  }

  const residual = await findResidualRules(ctx.backends, ctx.changes, ctx.chain);
  for (const entry of residual) {
    ctx.emit({ type: "residual", residual: entry });
  }

  const allRecovered = FAMILIES.every((family) => families[family].success);
  return {
    outcome: allRecovered && residual.length === 0 ? "ROLLED_BACK" : "ROLLBACK_PARTIAL",
    families,
    residual,
  };
}
