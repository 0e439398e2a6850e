import { FAMILIES } from "../constants.js";
import { buildFixCommands, evaluateChangeSet, readChains, unblockedFamilies } from "../core/status.js";
import { loadChangeSet } from "../utils/changeSet.js";
import { resolveGuardConfig } from "../utils/config.js";
import { createIptablesBackends } from "../utils/iptables.js";
import { logger, createSpinner } from "../utils/logger.js";
import type { AddressFamily, Chain, ChangeSet } from "../types/index.js";

const FAMILY_LABELS: Record<AddressFamily, string> = { ipv4: "IPv4", ipv6: "IPv6" };

export function describeChain(chain: Chain): string[] {
  const lines = [`policy ${chain.policy}, ${chain.rules.length} port rule(s), ${chain.untracked.length} other rule(s)`];
  for (const rule of chain.rules) {
    lines.push(`#${rule.ordinal} ${rule.protocol}/${rule.port} → ${rule.target}`);
  }
  for (const raw of chain.untracked) {
    lines.push(`(not evaluated) ${raw}`);
  }
  return lines;
}

function reportChangeSet(changeSet: ChangeSet, chains: Record<AddressFamily, Chain>, chainName: string): number {
  logger.title(`Change set: ${changeSet.name}`);
  const statuses = evaluateChangeSet(chains, changeSet.items);

  for (const status of statuses) {
    const { item, verdicts } = status;
    if (status.blocked) {
      logger.success(`Port ${item.port}/${item.protocol} is blocked (IPv4 and IPv6)`);
      logger.detail(`Service: ${item.description}`);
      logger.detail(`IPv4: ${verdicts.ipv4.reason}`);
      logger.detail(`IPv6: ${verdicts.ipv6.reason}`);
      continue;
    }

    const families = unblockedFamilies(status);
    logger.error(`Port ${item.port}/${item.protocol} is NOT fully blocked!`);
    logger.detail(`Service: ${item.description}`);
    for (const family of families) {
      logger.detail(`${FAMILY_LABELS[family]}: ${verdicts[family].reason}`);
    }
    logger.detail("Fix with:");
    for (const command of buildFixCommands(item, chainName, families)) logger.detail(`  ${command}`);
  }

  const failed = statuses.filter((status) => !status.blocked).length;
  console.log();
  if (failed > 0) {
    logger.error(`${failed} of ${statuses.length} port(s) not fully blocked.`);
  } else {
    logger.success(`All ${statuses.length} port(s) blocked on IPv4 and IPv6.`);
  }
  return failed;
}

export async function inspectCommand(file?: string): Promise<void> {
  let changeSet: ChangeSet | undefined;
  if (file) {
    const loaded = loadChangeSet(file);
    if (!loaded.success) {
      logger.error(loaded.error);
      if (loaded.hint) logger.info(loaded.hint);
      process.exitCode = 1;
      return;
    }
    for (const warning of loaded.warnings) logger.warning(warning);
    changeSet = loaded.changeSet;
  }

  const { config, warnings } = resolveGuardConfig();
  for (const warning of warnings) logger.warning(warning);

  const spinner = createSpinner(`Reading ${config.chain} chains...`);
  spinner.start();
  const results = await readChains(createIptablesBackends(config.chain), config.chain);

  const chains: Partial<Record<AddressFamily, Chain>> = {};
  let unreadable = 0;
  for (const family of FAMILIES) {
    const result = results[family];
    if (result.success) {
      chains[family] = result.chain;
    } else {
      unreadable++;
    }
  }
  if (unreadable > 0) {
    spinner.fail("Could not read firewall state");
  } else {
    spinner.succeed(`${config.chain} chains read`);
  }

  for (const family of FAMILIES) {
    const result = results[family];
    logger.title(`${FAMILY_LABELS[family]} ${config.chain}`);
    if (!result.success) {
      logger.error(result.error);
      if (result.hint) logger.info(result.hint);
      continue;
    }
    for (const line of describeChain(result.chain)) logger.step(line);
  }

  if (!chains.ipv4 || !chains.ipv6) {
    process.exitCode = 1;
    return;
  }

  if (changeSet && reportChangeSet(changeSet, { ipv4: chains.ipv4, ipv6: chains.ipv6 }, config.chain) > 0) {
    process.exitCode = 1;
  }
}
