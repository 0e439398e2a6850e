import { FAMILIES } from "../constants.js";
import { FormatError } from "./errors.js";
import { isEmpty, parseChain } from "./inspector.js";
import type { BackupManager } from "./backup.js";
import { describeFailure } from "../utils/command.js";
import { getErrorMessage, mapCommandError } from "../utils/errorMapper.js";
import type {
  AddressFamily,
  Chain,
  ChainPolicy,
  EnvironmentReport,
  FirewallBackends,
  PreconditionCheck,
} from "../types/index.js";

export interface PreconditionOptions {
  backends: FirewallBackends;
  backup: BackupManager;
  checkEnvironment: () => EnvironmentReport | Promise<EnvironmentReport>;
  chain: string;
  expectedPolicy: ChainPolicy;
  onCheck?: (check: PreconditionCheck) => void;
}

export interface PreconditionReport {
  passed: boolean;
  checks: PreconditionCheck[];
  chains: Partial<Record<AddressFamily, Chain>>;
}

/**
 * Fail-closed gate before any mutation. Stops at the first failed check.
 *
 * The stale-snapshot check runs before anything touches the chains, so a run
 * refused for an unfinished predecessor issues no firewall commands at all.
 */
export async function verifyPreconditions(options: PreconditionOptions): Promise<PreconditionReport> {
  const report: PreconditionReport = { passed: false, checks: [], chains: {} };

  const record = (check: PreconditionCheck): boolean => {
    report.checks.push(check);
    options.onCheck?.(check);
    return check.passed;
  };

  let environment: EnvironmentReport;
  try {
    environment = await options.checkEnvironment();
  } catch (error: unknown) {
    environment = { ready: false, problems: [getErrorMessage(error)] };
  }
  if (
    !record({
      name: "environment",
      passed: environment.ready,
      detail: environment.ready ? "Running as root with all required commands" : environment.problems.join("; "),
    })
  ) {
    return report;
  }

  const stale = options.backup.existingSnapshotFiles();
  if (
    !record({
      name: "snapshot",
      passed: stale.length === 0,
      detail: stale.length === 0 ? "No stale backup files" : `Backup files from a previous run exist: ${stale.join(", ")}`,
      ...(stale.length > 0
        ? { hint: "A previous run did not complete. Run 'portguard recover', or remove the files if the current state is correct." }
        : {}),
    })
  ) {
    return report;
  }

  for (const family of FAMILIES) {
    const backend = options.backends[family];
    const label = `${backend.label} -S ${options.chain}`;

    let chain: Chain;
    try {
      const listing = await backend.listChain();
      if (listing.code !== 0) {
        const hint = mapCommandError(listing.stderr, backend.label);
        record({
          name: `${family} format`,
          passed: false,
          detail: `'${label}' failed: ${describeFailure(listing)}`,
          ...(hint ? { hint } : {}),
        });
        return report;
      }
      chain = parseChain(listing.stdout, { chain: options.chain, source: backend.label });
    } catch (error: unknown) {
      record({
        name: `${family} format`,
        passed: false,
        detail: error instanceof FormatError ? error.message : `'${label}' failed: ${getErrorMessage(error)}`,
      });
      return report;
    }
    report.chains[family] = chain;
    record({ name: `${family} format`, passed: true, detail: `${label} output format verified` });

    const declared = chain.rules.length + chain.untracked.length;
    if (
      !record({
        name: `${family} empty`,
        passed: isEmpty(chain),
        detail: isEmpty(chain)
          ? `${options.chain} chain is empty (only default policy)`
          : `${options.chain} chain is not empty: ${declared} rule(s) present`,
        ...(!isEmpty(chain)
          ? { hint: `If the rules are already in place there is nothing to do. To start over: sudo ${backend.label} -F ${options.chain}` }
          : {}),
      })
    ) {
      return report;
    }

    if (
      !record({
        name: `${family} policy`,
        passed: chain.policy === options.expectedPolicy,
        detail:
          chain.policy === options.expectedPolicy
            ? `${options.chain} policy is ${chain.policy}`
            : `${options.chain} policy is ${chain.policy}, expected ${options.expectedPolicy}`,
      })
    ) {
      return report;
    }
  }

  report.passed = true;
  return report;
}
