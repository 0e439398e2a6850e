import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { readFileSync } from "fs";
import { join } from "path";
import { firewallInspectSchema, handleFirewallInspect } from "./tools/firewallInspect.js";

function readPackageInfo(): { name: string; version: string } {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, "..", "..", "package.json"), "utf-8"));
  if (typeof pkg !== "object" || pkg === null) return { name: "portguard", version: "0.0.0" };
  return {
    name: "name" in pkg && typeof pkg.name === "string" ? pkg.name : "portguard",
    version: "version" in pkg && typeof pkg.version === "string" ? pkg.version : "0.0.0",
  };
}

export function createMcpServer(): McpServer {
  const server = new McpServer(readPackageInfo(), { capabilities: { logging: {} } });

  server.registerTool("firewall_inspect", {
    description:
      "Read-only view of the host's iptables/ip6tables INPUT chains. Actions: 'chains' lists the parsed policy and port rules for IPv4 and IPv6, 'check' reports whether each port of a change set file (or a single port/protocol) is blocked on both families, with the first-match reason, 'snapshot' reports whether a pre-change snapshot from an unfinished guarded apply is still on disk. Never modifies the firewall; use the portguard CLI to apply or recover. Needs root to list chains.",
    inputSchema: firewallInspectSchema,
    annotations: {
      title: "Firewall Inspection",
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: false,
    },
  }, async (params) => {
    return handleFirewallInspect(params);
  });

  return server;
}
