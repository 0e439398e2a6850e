// Change sets
export type Protocol = "tcp" | "udp";
export type ChangeAction = "block";

export interface ChangeItem {
  readonly protocol: Protocol;
  readonly port: number;
  readonly action: ChangeAction;
  readonly description: string;
}

export interface ChangeSet {
  name: string;
  description?: string;
  items: readonly ChangeItem[];
}

// Chains
export type AddressFamily = "ipv4" | "ipv6";
export type ChainPolicy = "ACCEPT" | "DROP";
export type RuleAction = "DROP" | "REJECT" | "ACCEPT" | "OTHER";

export interface Rule {
  /** 1-indexed position among the chain's rule declarations */
  ordinal: number;
  protocol: Protocol;
  port: number;
  action: RuleAction;
  /** Literal `-j` target, e.g. "DROP" or "LOG" */
  target: string;
  raw: string;
}

export interface Chain {
  policy: ChainPolicy;
  rules: Rule[];
  /** Rule declarations without a protocol/port qualifier */
  untracked: string[];
}

export type ChainLine =
  | { kind: "policy"; chain: string; policy: string; raw: string }
  | { kind: "rule"; chain: string; tokens: string[]; raw: string }
  | { kind: "unrecognized"; raw: string; reason: string };

export interface BlockVerdict {
  blocked: boolean;
  reason: string;
}

// Command collaborator
export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface FirewallBackend {
  readonly family: AddressFamily;
  /** Command name used in messages ("iptables" / "ip6tables") */
  readonly label: string;
  dumpRules(): Promise<CommandResult>;
  restoreRules(payload: string): Promise<CommandResult>;
  appendBlockRule(protocol: Protocol, port: number): Promise<CommandResult>;
  deleteBlockRule(protocol: Protocol, port: number): Promise<CommandResult>;
  flushChain(): Promise<CommandResult>;
  listChain(): Promise<CommandResult>;
}

export type FirewallBackends = Record<AddressFamily, FirewallBackend>;

// Environment
export interface EnvironmentReport {
  ready: boolean;
  problems: string[];
}

// Orchestration
export type GuardPhase =
  | "INIT"
  | "VERIFIED"
  | "BACKED_UP"
  | "APPLIED"
  | "AWAITING_CONFIRMATION"
  | "COMMITTED"
  | "ROLLED_BACK"
  | "ROLLBACK_PARTIAL"
  | "ABORTED";

export type TerminalPhase = Extract<GuardPhase, "COMMITTED" | "ROLLED_BACK" | "ROLLBACK_PARTIAL" | "ABORTED">;

export interface OrchestrationState {
  phase: GuardPhase;
  backupCreated: boolean;
  changesApplied: boolean;
  confirmed: boolean;
}

export interface PreconditionCheck {
  name: string;
  passed: boolean;
  detail: string;
  hint?: string;
}

export type RecoveryStrategyName = "restore" | "flush" | "delete-rules";

export interface ResidualRule {
  family: AddressFamily;
  item?: ChangeItem;
  detail: string;
}

export interface FamilyRollback {
  success: boolean;
  strategy?: RecoveryStrategyName;
}

export interface RollbackReport {
  outcome: Extract<GuardPhase, "ROLLED_BACK" | "ROLLBACK_PARTIAL">;
  families: Record<AddressFamily, FamilyRollback>;
  residual: ResidualRule[];
}

export type GuardFailureKind = "precondition" | "backup" | "apply" | "timeout" | "wait-error";

export interface GuardFailure {
  kind: GuardFailureKind;
  message: string;
  hint?: string;
}

export type GuardEvent =
  | { type: "phase"; phase: GuardPhase }
  | { type: "check"; check: PreconditionCheck }
  | { type: "snapshot"; family: AddressFamily; path: string }
  | { type: "apply"; family: AddressFamily; item: ChangeItem; success: boolean; detail?: string }
  | { type: "listing"; family: AddressFamily; lines: string[] }
  | { type: "countdown"; remainingSeconds: number }
  | { type: "confirmed" }
  | { type: "timeout"; timeoutSeconds: number }
  | { type: "wait-error"; detail: string }
  | {
      type: "attempt";
      family: AddressFamily;
      strategy: RecoveryStrategyName;
      attempt: number;
      maxAttempts: number;
      success: boolean;
      detail?: string;
    }
  | { type: "snapshot-missing"; family: AddressFamily; path: string }
  | { type: "residual"; residual: ResidualRule }
  | { type: "persist"; success: boolean; detail?: string }
  | { type: "discard"; path: string; success: boolean; detail?: string };

export type GuardEventHandler = (event: GuardEvent) => void;
