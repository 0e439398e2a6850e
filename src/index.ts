#!/usr/bin/env node

import { Command } from "commander";
import { readFileSync } from "fs";
import { join } from "path";
import { applyCommand, type ApplyOptions } from "./commands/apply.js";
import { inspectCommand } from "./commands/inspect.js";
import { statusCommand } from "./commands/status.js";
import { recoverCommand, type RecoverOptions } from "./commands/recover.js";
import { doctorCommand } from "./commands/doctor.js";

const pkg: unknown = JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8"));
const version =
  typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";

const program = new Command();

program
  .name("portguard")
  .description("Apply iptables block rules with automatic rollback unless confirmed")
  .version(version);

program
  .command("apply <changeset>")
  .description("Apply a change set, wait for Ctrl+C to commit, roll back on timeout")
  .option("-t, --timeout <seconds>", "Rollback window in seconds (30-3600)")
  .option("--backup-dir <dir>", "Directory for the pre-change snapshot")
  .option("-y, --yes", "Skip the confirmation prompt")
  .option("--dry-run", "Show commands without executing")
  .action((changeset: string, options?: ApplyOptions) => applyCommand(changeset, options));

program
  .command("inspect [changeset]")
  .description("Show INPUT chains and check whether a change set's ports are blocked")
  .action((changeset?: string) => inspectCommand(changeset));

program
  .command("status")
  .description("Report whether a snapshot from an unfinished run is pending")
  .option("--backup-dir <dir>", "Directory for the pre-change snapshot")
  .action((options?: { backupDir?: string }) => statusCommand(options));

program
  .command("recover")
  .description("Restore the firewall from a pending snapshot")
  .option("--backup-dir <dir>", "Directory for the pre-change snapshot")
  .option("-y, --yes", "Skip the confirmation prompt")
  .action((options?: RecoverOptions) => recoverCommand(options));

program
  .command("doctor")
  .description("Check that this host can run a guarded apply")
  .option("--backup-dir <dir>", "Directory for the pre-change snapshot")
  .action((options?: { backupDir?: string }) => doctorCommand(options));

program.parse();
