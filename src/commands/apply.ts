import { FAMILIES, IPTABLES_TOOLS, PERSIST_COMMAND } from "../constants.js";
import { BackupManager } from "../core/backup.js";
import { exitCodeFor, runGuardedChange, type GuardResult } from "../core/orchestrator.js";
import { loadChangeSet } from "../utils/changeSet.js";
import { resolveGuardConfig, type GuardCliOptions, type GuardConfig } from "../utils/config.js";
import { checkEnvironment } from "../utils/environment.js";
import { buildBlockRuleArgs, createIptablesBackends, formatCommand, persistRules } from "../utils/iptables.js";
import { logger } from "../utils/logger.js";
import { confirmApply } from "../utils/prompts.js";
import { sanitizeStderr } from "../utils/errorMapper.js";
import type { AddressFamily, ChangeItem, ChangeSet, GuardEvent, GuardPhase } from "../types/index.js";

export interface ApplyOptions extends GuardCliOptions {
  yes?: boolean;
  dryRun?: boolean;
}

const FAMILY_LABELS: Record<AddressFamily, string> = { ipv4: "IPv4", ipv6: "IPv6" };

// ─── Pure Functions ─────────────────────────────────────────────────────────

export function formatRemaining(seconds: number): string {
  const mins = Math.floor(seconds / 60);
  const secs = seconds % 60;
  return `${String(mins).padStart(2, "0")}:${String(secs).padStart(2, "0")}`;
}

export function describeItem(item: ChangeItem): string {
  return `${item.protocol}/${item.port} (${item.description})`;
}

export function buildApplyPlan(changeSet: ChangeSet, chain: string): string[] {
  const commands: string[] = [];
  for (const item of changeSet.items) {
    for (const family of FAMILIES) {
      commands.push(formatCommand(IPTABLES_TOOLS[family].cli, buildBlockRuleArgs("-A", item.protocol, item.port, chain)));
    }
  }
  return commands;
}

// ─── Reporting ──────────────────────────────────────────────────────────────

const PHASE_TITLES: Partial<Record<GuardPhase, string>> = {
  INIT: "VERIFICATION PHASE",
  VERIFIED: "BACKUP PHASE",
  BACKED_UP: "APPLYING RULES",
  AWAITING_CONFIRMATION: "WAITING FOR CONFIRMATION",
};

export interface ReportContext {
  chain: string;
  timeoutSeconds: number;
}

export function reportGuardEvent(event: GuardEvent, context: ReportContext): void {
  switch (event.type) {
    case "phase": {
      const title = PHASE_TITLES[event.phase];
      if (title) logger.title(title);
      if (event.phase === "AWAITING_CONFIRMATION") {
        logger.warning("Firewall rules have been applied TEMPORARILY.");
        logger.info(">>> TEST YOUR CONNECTION NOW <<< Open a NEW SSH session to verify connectivity.");
        logger.step("Press Ctrl+C  -->  COMMIT changes permanently");
        logger.step(`Wait ${formatRemaining(context.timeoutSeconds)}  -->  ROLLBACK automatically`);
      }
      break;
    }
    case "check":
      if (event.check.passed) {
        logger.success(event.check.detail);
      } else {
        logger.error(`REFUSED: ${event.check.detail}`);
        if (event.check.hint) logger.info(event.check.hint);
      }
      break;
    case "snapshot":
      logger.step(`${FAMILY_LABELS[event.family]} backup: ${event.path}`);
      break;
    case "apply":
      if (event.success) {
        logger.step(
          `${formatCommand(IPTABLES_TOOLS[event.family].cli, buildBlockRuleArgs("-A", event.item.protocol, event.item.port, context.chain))}  # ${event.item.description}`,
        );
      } else {
        logger.error(
          `FAILED: ${FAMILY_LABELS[event.family]} ${describeItem(event.item)}: ${sanitizeStderr(event.detail ?? "")}`,
        );
        logger.warning("Initiating emergency rollback...");
      }
      break;
    case "listing":
      logger.info(`${FAMILY_LABELS[event.family]} (${IPTABLES_TOOLS[event.family].cli} -S):`);
      for (const line of event.lines) logger.detail(line);
      break;
    case "countdown":
      logger.step(`Time remaining: ${formatRemaining(event.remainingSeconds)}  [Ctrl+C to commit]`);
      break;
    case "confirmed":
      logger.success("Confirmation received. Committing changes...");
      break;
    case "timeout":
      logger.warning(`Timeout reached (${formatRemaining(event.timeoutSeconds)}). No confirmation received.`);
      logger.title("ROLLBACK IN PROGRESS - RESTORING PREVIOUS STATE");
      break;
    case "wait-error":
      logger.error(`Unexpected error while waiting: ${event.detail}`);
      logger.warning("Initiating emergency rollback...");
      break;
    case "attempt": {
      const label = `[${event.strategy} ${event.attempt}/${event.maxAttempts}] ${FAMILY_LABELS[event.family]}`;
      if (event.success) {
        logger.success(`${label}${event.detail ? `: ${event.detail}` : " ok"}`);
      } else {
        logger.warning(`${label} failed: ${sanitizeStderr(event.detail ?? "unknown error")}`);
      }
      break;
    }
    case "snapshot-missing":
      logger.warning(`${FAMILY_LABELS[event.family]} backup file not found: ${event.path}`);
      break;
    case "residual":
      logger.warning(`${FAMILY_LABELS[event.residual.family]}: ${event.residual.detail}`);
      break;
    case "persist":
      if (event.success) {
        logger.success("Rules saved permanently. They will persist across reboots.");
      } else {
        logger.warning(`${formatCommand(PERSIST_COMMAND.bin, [...PERSIST_COMMAND.args])} failed: ${sanitizeStderr(event.detail ?? "")}`);
        logger.warning("Rules are applied but may not persist after reboot.");
        logger.info(`Try manually: sudo ${formatCommand(PERSIST_COMMAND.bin, [...PERSIST_COMMAND.args])}`);
      }
      break;
    case "discard":
      if (event.success) {
        logger.step(`Removed: ${event.path}`);
      } else {
        logger.warning(`Could not remove ${event.path}: ${event.detail ?? "unknown error"}`);
      }
      break;
  }
}

export function printGuardSummary(result: GuardResult, chain: string): void {
  console.log();
  switch (result.phase) {
    case "COMMITTED":
      logger.success("SUCCESS: change set committed permanently.");
      break;
    case "ROLLED_BACK":
      logger.warning(`ROLLBACK COMPLETE: ${result.failure?.message ?? "changes reverted"}`);
      break;
    case "ROLLBACK_PARTIAL":
      logger.error("ROLLBACK PARTIALLY COMPLETE - MANUAL INTERVENTION MAY BE NEEDED");
      if (result.failure) logger.info(`Cause: ${result.failure.message}`);
      logger.info("Try manually:");
      for (const family of FAMILIES) {
        logger.step(`sudo ${IPTABLES_TOOLS[family].cli} -F ${chain}`);
      }
      break;
    case "ABORTED":
      logger.error(`Aborted before any change: ${result.failure?.message ?? "unknown reason"}`);
      if (result.failure?.hint) logger.info(result.failure.hint);
      break;
  }

  if (result.retainedSnapshots.length > 0) {
    logger.info("Backup files preserved for manual recovery:");
    for (const path of result.retainedSnapshots) logger.step(path);
    logger.info("Restore with: sudo portguard recover");
  }
}

// ─── Command ────────────────────────────────────────────────────────────────

function printDryRun(changeSet: ChangeSet, config: GuardConfig): void {
  logger.title("Dry Run - Guarded Apply");
  logger.info(`Change set: ${changeSet.name} (${changeSet.items.length} rule(s))`);
  logger.info(`Backup directory: ${config.backupDir}`);
  logger.info(`Rollback window: ${config.timeoutSeconds}s`);
  console.log();
  logger.info("Commands to execute:");
  for (const command of buildApplyPlan(changeSet, config.chain)) {
    logger.step(command);
  }
  console.log();
  logger.warning("No changes applied. Remove --dry-run to execute.");
}

export async function applyCommand(file: string, options: ApplyOptions = {}): Promise<void> {
  const loaded = loadChangeSet(file);
  if (!loaded.success) {
    logger.error(loaded.error);
    if (loaded.hint) logger.info(loaded.hint);
    process.exitCode = 1;
    return;
  }
  for (const warning of loaded.warnings) logger.warning(warning);

  const { config, warnings } = resolveGuardConfig(options);
  for (const warning of warnings) logger.warning(warning);

  const { changeSet } = loaded;
  if (options.dryRun) {
    printDryRun(changeSet, config);
    return;
  }

  logger.title(`portguard: ${changeSet.name}`);
  for (const item of changeSet.items) logger.step(`Block ${describeItem(item)}`);

  if (!options.yes && !(await confirmApply(changeSet, config.timeoutSeconds))) {
    logger.info("Apply cancelled.");
    return;
  }

  const backends = createIptablesBackends(config.chain);
  const backup = new BackupManager({ dir: config.backupDir, backends });

  const result = await runGuardedChange({
    changes: changeSet.items,
    backends,
    backup,
    checkEnvironment,
    persistRulesPermanently: persistRules,
    chain: config.chain,
    expectedPolicy: config.expectedPolicy,
    timeoutSeconds: config.timeoutSeconds,
    onEvent: (event) => reportGuardEvent(event, { chain: config.chain, timeoutSeconds: config.timeoutSeconds }),
  });

  printGuardSummary(result, config.chain);
  process.exitCode = exitCodeFor(result);
}
