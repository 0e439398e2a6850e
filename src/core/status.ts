import { FAMILIES, IPTABLES_TOOLS } from "../constants.js";
import { isBlocked, parseChain } from "./inspector.js";
import { describeFailure } from "../utils/command.js";
import { buildBlockRuleArgs, formatCommand } from "../utils/iptables.js";
import { getErrorMessage, mapCommandError } from "../utils/errorMapper.js";
import type {
  AddressFamily,
  BlockVerdict,
  Chain,
  ChangeItem,
  FirewallBackend,
  FirewallBackends,
} from "../types/index.js";

export type ChainReadResult =
  | { success: true; chain: Chain }
  | { success: false; error: string; hint?: string };

export interface ItemStatus {
  item: ChangeItem;
  verdicts: Record<AddressFamily, BlockVerdict>;
  blocked: boolean;
}

/** List and parse one family's chain; a parse failure is reported, not thrown. */
export async function readChain(backend: FirewallBackend, chainName: string): Promise<ChainReadResult> {
  try {
    const listing = await backend.listChain();
    if (listing.code !== 0) {
      const hint = mapCommandError(listing.stderr, backend.label);
      return {
        success: false,
        error: `${backend.label} -S ${chainName} failed: ${describeFailure(listing)}`,
        ...(hint ? { hint } : {}),
      };
    }
    return { success: true, chain: parseChain(listing.stdout, { chain: chainName, source: backend.label }) };
  } catch (error: unknown) {
    return { success: false, error: getErrorMessage(error) };
  }
}

export async function readChains(
  backends: FirewallBackends,
  chainName: string,
): Promise<Record<AddressFamily, ChainReadResult>> {
  return {
    ipv4: await readChain(backends.ipv4, chainName),
    ipv6: await readChain(backends.ipv6, chainName),
  };
}

/** Families on which the item is not blocked. */
export function unblockedFamilies(status: ItemStatus): AddressFamily[] {
  return FAMILIES.filter((family) => !status.verdicts[family].blocked);
}

export function evaluateChangeSet(
  chains: Record<AddressFamily, Chain>,
  items: readonly ChangeItem[],
): ItemStatus[] {
  return items.map((item) => {
    const verdicts = {
      ipv4: isBlocked(chains.ipv4, item.protocol, item.port),
      ipv6: isBlocked(chains.ipv6, item.protocol, item.port),
    };
    return { item, verdicts, blocked: verdicts.ipv4.blocked && verdicts.ipv6.blocked };
  });
}

export function buildFixCommands(
  item: ChangeItem,
  chainName: string,
  families: readonly AddressFamily[] = FAMILIES,
): string[] {
  return families.map(
    (family) => `sudo ${formatCommand(IPTABLES_TOOLS[family].cli, buildBlockRuleArgs("-A", item.protocol, item.port, chainName))}`,
  );
}
