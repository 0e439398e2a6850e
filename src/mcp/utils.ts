// ─── Types ───────────────────────────────────────────────────────────────────

export type McpResponse = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export interface SuggestedAction {
  command: string;
  reason: string;
}

// ─── mcpSuccess ──────────────────────────────────────────────────────────────

export function mcpSuccess(data: Record<string, unknown>): McpResponse {
  return {
    content: [{ type: "text", text: JSON.stringify(data) }],
  };
}

// ─── mcpError ────────────────────────────────────────────────────────────────

/**
 * Wrap an error message (and optional metadata) in the standard MCP error response shape.
 */
export function mcpError(
  error: string,
  hint?: string,
  suggestedActions?: SuggestedAction[],
): McpResponse {
  const payload: Record<string, unknown> = {
    error,
    ...(hint !== undefined ? { hint } : {}),
    ...(suggestedActions !== undefined ? { suggested_actions: suggestedActions } : {}),
  };
  return {
    content: [{ type: "text", text: JSON.stringify(payload) }],
    isError: true,
  };
}
