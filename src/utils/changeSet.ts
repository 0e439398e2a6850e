import { readFileSync } from "fs";
import { basename, extname } from "path";
import yaml from "js-yaml";
import { z } from "zod";
import { getErrorMessage, mapFileSystemError } from "./errorMapper.js";
import type { ChangeItem, ChangeSet } from "../types/index.js";

const KNOWN_KEYS = new Set(["name", "description", "rules"]);

const changeItemSchema = z
  .object({
    protocol: z.enum(["tcp", "udp"]).default("tcp"),
    port: z.number().int().min(1).max(65535),
    action: z.literal("block").default("block"),
    description: z.string().trim().min(1).optional(),
  })
  .strict();

const changeSetSchema = z
  .object({
    name: z.string().trim().min(1).optional(),
    description: z.string().optional(),
    rules: z.array(changeItemSchema).min(1, "rules must list at least one port"),
  })
  .passthrough();

export type ChangeSetLoadResult =
  | { success: true; changeSet: ChangeSet; warnings: string[] }
  | { success: false; error: string; hint?: string };

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

export function changeItemKey(item: Pick<ChangeItem, "protocol" | "port">): string {
  return `${item.protocol}/${item.port}`;
}

export function validateChangeSet(raw: unknown, fallbackName: string): ChangeSetLoadResult {
  if (raw === null || raw === undefined || typeof raw !== "object" || Array.isArray(raw)) {
    return { success: false, error: "Change set must be a YAML object with a 'rules' list" };
  }

  const warnings = Object.keys(raw)
    .filter((key) => !KNOWN_KEYS.has(key))
    .map((key) => `Unknown change set key: "${key}"`);

  const parsed = changeSetSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      error: `Invalid change set: ${parsed.error.issues.map(formatIssue).join("; ")}`,
    };
  }

  const seen = new Set<string>();
  const items: ChangeItem[] = [];
  for (const rule of parsed.data.rules) {
    const key = changeItemKey(rule);
    if (seen.has(key)) {
      return { success: false, error: `Duplicate rule for ${key} in change set` };
    }
    seen.add(key);
    items.push(
      Object.freeze({
        protocol: rule.protocol,
        port: rule.port,
        action: rule.action,
        description: rule.description ?? `Block ${key}`,
      }),
    );
  }

  return {
    success: true,
    changeSet: {
      name: parsed.data.name ?? fallbackName,
      ...(parsed.data.description ? { description: parsed.data.description } : {}),
      items: Object.freeze(items),
    },
    warnings,
  };
}

export function loadChangeSet(path: string): ChangeSetLoadResult {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error: unknown) {
    const hint = mapFileSystemError(error);
    return {
      success: false,
      error: `Could not read change set ${path}: ${getErrorMessage(error)}`,
      ...(hint ? { hint } : {}),
    };
  }

  let raw: unknown;
  try {
    raw = yaml.load(content, { schema: yaml.JSON_SCHEMA });
  } catch (error: unknown) {
    return { success: false, error: `Could not parse ${path}: ${getErrorMessage(error)}` };
  }

  return validateChangeSet(raw, basename(path, extname(path)));
}
