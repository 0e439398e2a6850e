import { accessSync, constants, existsSync } from "fs";
import { dirname } from "path";
import { REQUIRED_COMMANDS } from "../constants.js";
import { getSnapshotPaths } from "../core/backup.js";
import { resolveGuardConfig, type GuardConfig } from "../utils/config.js";
import { commandExists } from "../utils/command.js";
import { installHint, isRoot } from "../utils/environment.js";
import { logger } from "../utils/logger.js";

export interface CheckResult {
  name: string;
  status: "pass" | "fail" | "warn";
  detail: string;
}

function checkNodeVersion(): CheckResult {
  const version = process.version;
  const major = parseInt(version.slice(1).split(".")[0], 10);
  if (major >= 20) {
    return { name: "Node.js", status: "pass", detail: version };
  }
  return { name: "Node.js", status: "fail", detail: `${version} (requires >= 20)` };
}

function checkRoot(): CheckResult {
  if (isRoot()) {
    return { name: "Privileges", status: "pass", detail: "running as root" };
  }
  return { name: "Privileges", status: "fail", detail: "not root (apply and recover need sudo)" };
}

function checkCommand(bin: string): CheckResult {
  if (commandExists(bin)) {
    return { name: bin, status: "pass", detail: "available" };
  }
  return { name: bin, status: "fail", detail: `not found. ${installHint(bin)}` };
}

function checkBackupDir(dir: string): CheckResult {
  const target = existsSync(dir) ? dir : dirname(dir);
  if (!existsSync(target)) {
    return { name: "Backup Dir", status: "warn", detail: `${dir} (parent does not exist)` };
  }
  try {
    accessSync(target, constants.R_OK | constants.W_OK);
    const suffix = target === dir ? "" : " (not created yet)";
    return { name: "Backup Dir", status: "pass", detail: `${dir}${suffix}` };
  } catch {
    return { name: "Backup Dir", status: "fail", detail: `${dir} (not writable)` };
  }
}

function checkStaleSnapshot(dir: string): CheckResult {
  const present = Object.values(getSnapshotPaths(dir)).filter((path) => existsSync(path));
  if (present.length === 0) {
    return { name: "Snapshot", status: "pass", detail: "none pending" };
  }
  return {
    name: "Snapshot",
    status: "fail",
    detail: `${present.length} file(s) left by an unfinished run (run portguard recover)`,
  };
}

function checkPersistDir(config: GuardConfig): CheckResult {
  const dir = dirname(config.persistPaths.ipv4);
  if (existsSync(dir)) {
    return { name: "Persistence", status: "pass", detail: dir };
  }
  return { name: "Persistence", status: "warn", detail: `${dir} missing (rules will not survive a reboot)` };
}

export function runDoctorChecks(config: GuardConfig): CheckResult[] {
  return [
    checkNodeVersion(),
    checkRoot(),
    ...REQUIRED_COMMANDS.map(checkCommand),
    checkBackupDir(config.backupDir),
    checkStaleSnapshot(config.backupDir),
    checkPersistDir(config),
  ];
}

export function doctorCommand(options: { backupDir?: string } = {}): void {
  logger.title("portguard doctor");

  const { config, warnings } = resolveGuardConfig(options);
  for (const warning of warnings) logger.warning(warning);

  const results = runDoctorChecks(config);

  for (const result of results) {
    const colorFn =
      result.status === "pass"
        ? logger.success
        : result.status === "warn"
          ? logger.warning
          : logger.error;
    colorFn(`${result.name}: ${result.detail}`);
  }

  const failures = results.filter((r) => r.status === "fail");
  const warningCount = results.filter((r) => r.status === "warn").length;

  console.log();
  if (failures.length > 0) {
    logger.error(`${failures.length} check(s) failed. Please fix the issues above.`);
    process.exitCode = 1;
  } else if (warningCount > 0) {
    logger.warning(`All checks passed with ${warningCount} warning(s).`);
  } else {
    logger.success("All checks passed! This host is ready for a guarded apply.");
  }
}
