import { GUARDED_CHAIN } from "../constants.js";
import { FormatError } from "./errors.js";
import type {
  BlockVerdict,
  Chain,
  ChainLine,
  ChainPolicy,
  ChangeItem,
  Protocol,
  Rule,
  RuleAction,
} from "../types/index.js";

// ─── Pure Functions (Tokenizer) ─────────────────────────────────────────────

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

export function isChainPolicy(value: string): value is ChainPolicy {
  return value === "ACCEPT" || value === "DROP";
}

export function isProtocol(value: string): value is Protocol {
  return value === "tcp" || value === "udp";
}

export function tokenize(line: string): string[] {
  return line.trim().split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Classify one line of `iptables -S <chain>` output.
 *
 * Only `-P <chain> <policy>` and `-A <chain> <spec...>` are recognized;
 * everything else is reported as unrecognized with the reason.
 */
export function classifyLine(line: string): ChainLine {
  const raw = line.trim();
  const tokens = tokenize(raw);

  if (tokens[0] === "-P") {
    if (tokens.length !== 3) {
      return { kind: "unrecognized", raw, reason: `unexpected policy line format: ${JSON.stringify(raw)}` };
    }
    return { kind: "policy", chain: tokens[1], policy: tokens[2], raw };
  }

  if (tokens[0] === "-A") {
    if (tokens.length < 3) {
      return { kind: "unrecognized", raw, reason: `unexpected rule line format: ${JSON.stringify(raw)}` };
    }
    return { kind: "rule", chain: tokens[1], tokens: tokens.slice(2), raw };
  }

  return {
    kind: "unrecognized",
    raw,
    reason: `unexpected line type ${JSON.stringify(tokens[0] ?? "")}: ${JSON.stringify(raw)}`,
  };
}

function valueAfter(tokens: string[], flag: string): { value?: string; negated: boolean } {
  const index = tokens.indexOf(flag);
  if (index === -1) return { negated: false };
  return { value: tokens[index + 1], negated: index > 0 && tokens[index - 1] === "!" };
}

export function toRuleAction(target: string): RuleAction {
  if (target === "DROP" || target === "REJECT" || target === "ACCEPT") return target;
  return "OTHER";
}

// ─── Parser ─────────────────────────────────────────────────────────────────

export interface ParseOptions {
  chain?: string;
  /** Command name used as the prefix of error messages */
  source?: string;
}

/**
 * Parse `iptables -S <chain>` output into a Chain.
 *
 * Any line outside the expected shape throws FormatError.
 */
export function parseChain(text: string, options: ParseOptions = {}): Chain {
  const chainName = options.chain ?? GUARDED_CHAIN;
  const source = options.source ?? "iptables";
  const lines = text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  if (lines.length === 0) {
    throw new FormatError(`${source} -S ${chainName} returned empty output`);
  }

  const first = classifyLine(lines[0]);
  if (first.kind !== "policy" || first.chain !== chainName) {
    throw new FormatError(
      `${source}: expected first line to be policy (-P ${chainName} ...), got: ${JSON.stringify(lines[0])}`,
    );
  }
  if (!isChainPolicy(first.policy)) {
    throw new FormatError(`${source}: unexpected ${chainName} policy ${JSON.stringify(first.policy)}`);
  }

  const rules: Rule[] = [];
  const untracked: string[] = [];
  let ordinal = 0;

  for (const line of lines.slice(1)) {
    const parsed = classifyLine(line);

    if (parsed.kind === "unrecognized") {
      throw new FormatError(`${source}: ${parsed.reason}`);
    }
    if (parsed.kind === "policy") {
      throw new FormatError(`${source}: unexpected policy declaration after the first line: ${JSON.stringify(parsed.raw)}`);
    }
    // Rules for other chains are not ours to judge
    if (parsed.chain !== chainName) continue;

    ordinal++;
    const target = valueAfter(parsed.tokens, "-j").value;
    if (target === undefined) {
      throw new FormatError(`${source}: rule without -j action: ${JSON.stringify(parsed.raw)}`);
    }

    const protocol = valueAfter(parsed.tokens, "-p");
    const dport = valueAfter(parsed.tokens, "--dport");
    if (
      protocol.value === undefined ||
      protocol.negated ||
      !isProtocol(protocol.value) ||
      dport.value === undefined ||
      dport.negated ||
      !/^\d+$/.test(dport.value) ||
      !isValidPort(Number(dport.value))
    ) {
      untracked.push(parsed.raw);
      continue;
    }

    rules.push({
      ordinal,
      protocol: protocol.value,
      port: Number(dport.value),
      action: toRuleAction(target),
      target,
      raw: parsed.raw,
    });
  }

  return { policy: first.policy, rules, untracked };
}

export function serializeChain(chain: Chain, chainName: string = GUARDED_CHAIN): string {
  const lines = [`-P ${chainName} ${chain.policy}`];
  for (const rule of chain.rules) {
    lines.push(
      `-A ${chainName} -p ${rule.protocol} -m ${rule.protocol} --dport ${rule.port} -j ${rule.target}`,
    );
  }
  return lines.join("\n");
}

// ─── Evaluation ─────────────────────────────────────────────────────────────

/** First matching rule wins; the policy decides when nothing matches. */
export function isBlocked(chain: Chain, protocol: Protocol, port: number): BlockVerdict {
  for (const rule of chain.rules) {
    if (rule.protocol !== protocol || rule.port !== port) continue;

    if (rule.action === "DROP" || rule.action === "REJECT") {
      return { blocked: true, reason: `Blocked by rule #${rule.ordinal} (${rule.action})` };
    }
    if (rule.action === "ACCEPT") {
      return { blocked: false, reason: `ACCEPTED by rule #${rule.ordinal} BEFORE any DROP/REJECT` };
    }
    return { blocked: false, reason: `Unknown action '${rule.target}' in rule #${rule.ordinal}` };
  }

  if (chain.policy === "DROP") {
    return { blocked: true, reason: "No explicit rule, but default policy is DROP" };
  }
  return { blocked: false, reason: "No DROP/REJECT rule found for this port" };
}

export function isEmpty(chain: Chain): boolean {
  return chain.rules.length === 0 && chain.untracked.length === 0;
}

/** The DROP rule a change item would have added, if it is still in the chain. */
export function findBlockingRule(chain: Chain, item: ChangeItem): Rule | undefined {
  return chain.rules.find(
    (rule) => rule.protocol === item.protocol && rule.port === item.port && rule.action === "DROP",
  );
}
