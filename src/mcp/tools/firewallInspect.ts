import { existsSync } from "fs";
import { z } from "zod";
import { FAMILIES } from "../../constants.js";
import { getSnapshotPaths } from "../../core/backup.js";
import {
  buildFixCommands,
  evaluateChangeSet,
  readChains,
  unblockedFamilies,
  type ItemStatus,
} from "../../core/status.js";
import { loadChangeSet } from "../../utils/changeSet.js";
import { resolveGuardConfig } from "../../utils/config.js";
import { getErrorMessage } from "../../utils/errorMapper.js";
import { createIptablesBackends } from "../../utils/iptables.js";
import { mcpError, mcpSuccess, type McpResponse } from "../utils.js";
import type { AddressFamily, Chain, ChangeItem, FirewallBackends, Protocol } from "../../types/index.js";

export const firewallInspectSchema = {
  action: z.enum(["chains", "check", "snapshot"]).describe(
    "Action to perform: 'chains' lists parsed INPUT chains, 'check' evaluates ports against them, 'snapshot' reports a pending pre-change snapshot",
  ),
  changeset: z.string().optional().describe(
    "Path to a YAML change set file. Used by 'check'; takes precedence over port/protocol.",
  ),
  port: z.number().int().min(1).max(65535).optional().describe(
    "Single port to check when no change set is given",
  ),
  protocol: z.enum(["tcp", "udp"]).optional().describe(
    "Protocol for 'port'. Default: tcp",
  ),
};

export interface FirewallInspectParams {
  action: "chains" | "check" | "snapshot";
  changeset?: string;
  port?: number;
  protocol?: Protocol;
}

/** Collaborators the handler reads from; tests pass fakes. */
export interface FirewallInspectDeps {
  backends: FirewallBackends;
  backupDir: string;
  chain: string;
}

function defaultDeps(): FirewallInspectDeps {
  const { config } = resolveGuardConfig();
  return {
    backends: createIptablesBackends(config.chain),
    backupDir: config.backupDir,
    chain: config.chain,
  };
}

function formatChain(chain: Chain): Record<string, unknown> {
  return {
    policy: chain.policy,
    rules: chain.rules.map((rule) => ({
      ordinal: rule.ordinal,
      protocol: rule.protocol,
      port: rule.port,
      target: rule.target,
    })),
    untracked: chain.untracked,
  };
}

function formatItemStatus(status: ItemStatus, chainName: string): Record<string, unknown> {
  return {
    protocol: status.item.protocol,
    port: status.item.port,
    description: status.item.description,
    blocked: status.blocked,
    ipv4: status.verdicts.ipv4.reason,
    ipv6: status.verdicts.ipv6.reason,
    ...(status.blocked ? {} : { fix: buildFixCommands(status.item, chainName, unblockedFamilies(status)) }),
  };
}

function resolveCheckItems(params: FirewallInspectParams): { items: readonly ChangeItem[] } | { error: McpResponse } {
  if (params.changeset) {
    const loaded = loadChangeSet(params.changeset);
    if (!loaded.success) return { error: mcpError(loaded.error, loaded.hint) };
    return { items: loaded.changeSet.items };
  }
  if (params.port !== undefined) {
    const protocol = params.protocol ?? "tcp";
    return {
      items: [{ protocol, port: params.port, action: "block", description: `Block ${protocol}/${params.port}` }],
    };
  }
  return { error: mcpError("Either 'changeset' or 'port' is required for the 'check' action") };
}

async function loadChains(
  deps: FirewallInspectDeps,
): Promise<{ chains: Record<AddressFamily, Chain> } | { error: McpResponse }> {
  const results = await readChains(deps.backends, deps.chain);
  const chains: Partial<Record<AddressFamily, Chain>> = {};
  const failures: Array<{ family: AddressFamily; error: string }> = [];

  for (const family of FAMILIES) {
    const result = results[family];
    if (result.success) {
      chains[family] = result.chain;
    } else {
      failures.push({ family, error: result.error });
    }
  }

  if (!chains.ipv4 || !chains.ipv6) {
    return {
      error: mcpError(
        failures.map((f) => `${f.family}: ${f.error}`).join("; "),
        "Listing chains needs root and the iptables tools",
        [{ command: "portguard doctor", reason: "Check privileges and required commands" }],
      ),
    };
  }
  return { chains: { ipv4: chains.ipv4, ipv6: chains.ipv6 } };
}

export async function handleFirewallInspect(
  params: FirewallInspectParams,
  deps: FirewallInspectDeps = defaultDeps(),
): Promise<McpResponse> {
  try {
    switch (params.action) {
      case "chains": {
        const loaded = await loadChains(deps);
        if ("error" in loaded) return loaded.error;
        return mcpSuccess({
          chain: deps.chain,
          ipv4: formatChain(loaded.chains.ipv4),
          ipv6: formatChain(loaded.chains.ipv6),
        });
      }

      case "check": {
        const resolved = resolveCheckItems(params);
        if ("error" in resolved) return resolved.error;
        const loaded = await loadChains(deps);
        if ("error" in loaded) return loaded.error;

        const statuses = evaluateChangeSet(loaded.chains, resolved.items);
        const failed = statuses.filter((status) => !status.blocked).length;
        return mcpSuccess({
          results: statuses.map((status) => formatItemStatus(status, deps.chain)),
          summary: { total: statuses.length, blocked: statuses.length - failed, notBlocked: failed },
          suggested_actions:
            failed > 0
              ? [{ command: "portguard apply <changeset>", reason: "Apply the missing rules with automatic rollback" }]
              : [],
        });
      }

      case "snapshot": {
        const paths = getSnapshotPaths(deps.backupDir);
        const present = FAMILIES.map((family) => paths[family]).filter((path) => existsSync(path));
        return mcpSuccess({
          backupDir: deps.backupDir,
          pending: present.length > 0,
          files: present,
          suggested_actions:
            present.length > 0
              ? [{ command: "sudo portguard recover", reason: "A guarded apply did not finish; restore the saved rules" }]
              : [],
        });
      }
    }
  } catch (error: unknown) {
    return mcpError(getErrorMessage(error));
  }
}
