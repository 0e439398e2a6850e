import { existsSync } from "fs";
import { FAMILIES } from "../constants.js";
import { BackupManager } from "../core/backup.js";
import { readChains } from "../core/status.js";
import { resolveGuardConfig, type GuardCliOptions } from "../utils/config.js";
import { isRoot } from "../utils/environment.js";
import { createIptablesBackends } from "../utils/iptables.js";
import { logger } from "../utils/logger.js";
import { confirmRecover } from "../utils/prompts.js";
import { reportGuardEvent } from "./apply.js";

export interface RecoverOptions extends Pick<GuardCliOptions, "backupDir"> {
  yes?: boolean;
}

export async function recoverCommand(options: RecoverOptions = {}): Promise<void> {
  const { config, warnings } = resolveGuardConfig(options);
  for (const warning of warnings) logger.warning(warning);

  const backends = createIptablesBackends(config.chain);
  const backup = new BackupManager({
    dir: config.backupDir,
    backends,
    onEvent: (event) => reportGuardEvent(event, { chain: config.chain, timeoutSeconds: config.timeoutSeconds }),
  });

  const files = backup.existingSnapshotFiles();
  if (files.length === 0) {
    logger.info(`No snapshot found in ${config.backupDir}. Nothing to recover.`);
    return;
  }

  if (!isRoot()) {
    logger.error("Root privileges are required to restore firewall rules.");
    logger.info("Run with: sudo portguard recover");
    process.exitCode = 1;
    return;
  }

  if (!options.yes && !(await confirmRecover(files))) {
    logger.info("Recovery cancelled.");
    return;
  }

  logger.title("RESTORING FROM SNAPSHOT");
  // An aborted backup leaves only the families saved before the failure
  const saved = FAMILIES.filter((family) => existsSync(backup.paths[family]));
  let restored = true;
  for (const family of FAMILIES) {
    if (!saved.includes(family)) {
      logger.info(`No ${backends[family].label} snapshot to restore; leaving its rules as they are.`);
      continue;
    }
    if (!(await backup.restore(family))) restored = false;
  }

  const chains = await readChains(backends, config.chain);
  let verified = true;
  for (const family of FAMILIES) {
    const result = chains[family];
    if (!result.success) {
      verified = false;
      logger.warning(`Could not verify ${backends[family].label} after restore: ${result.error}`);
    }
  }

  if (restored && verified) {
    backup.discard();
    logger.success("Firewall restored from snapshot. Snapshot files removed.");
    return;
  }

  logger.error("Recovery incomplete. Snapshot files kept for another attempt.");
  for (const path of backup.existingSnapshotFiles()) logger.step(path);
  process.exitCode = 1;
}
