import { statSync } from "fs";
import { BackupManager } from "../core/backup.js";
import { resolveGuardConfig, type GuardCliOptions } from "../utils/config.js";
import { createIptablesBackends } from "../utils/iptables.js";
import { logger } from "../utils/logger.js";

export interface SnapshotFileInfo {
  path: string;
  modifiedAt: string;
  bytes: number;
}

export function describeSnapshotFiles(paths: string[]): SnapshotFileInfo[] {
  return paths.map((path) => {
    const stats = statSync(path);
    return { path, modifiedAt: stats.mtime.toISOString(), bytes: stats.size };
  });
}

export async function statusCommand(options: Pick<GuardCliOptions, "backupDir"> = {}): Promise<void> {
  const { config, warnings } = resolveGuardConfig(options);
  for (const warning of warnings) logger.warning(warning);

  const backup = new BackupManager({
    dir: config.backupDir,
    backends: createIptablesBackends(config.chain),
  });

  logger.title("portguard status");
  logger.info(`Backup directory: ${config.backupDir}`);
  logger.info(`Rollback window: ${config.timeoutSeconds}s`);

  const files = backup.existingSnapshotFiles();
  if (files.length === 0) {
    logger.success("No snapshot present. Ready for a new guarded apply.");
    return;
  }

  logger.warning("A snapshot from an earlier run is still present:");
  for (const file of describeSnapshotFiles(files)) {
    logger.step(`${file.path} (${file.bytes} bytes, ${file.modifiedAt})`);
  }
  logger.info("A previous run did not finish cleanly. New runs are refused until this is resolved.");
  logger.info("Restore with: sudo portguard recover");
  logger.info(`Or, after checking the rules by hand, remove the files in ${config.backupDir}`);
  process.exitCode = 1;
}
