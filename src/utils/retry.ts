import { getErrorMessage } from "./errorMapper.js";
import { describeFailure } from "./command.js";
import type { CommandResult } from "../types/index.js";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface AttemptOutcome {
  success: boolean;
  detail?: string;
}

export interface RetryOptions {
  attempts: number;
  delayMs: number;
  sleep?: Sleep;
  onAttempt?: (attempt: number, outcome: AttemptOutcome) => void;
}

export function commandOutcome(result: CommandResult): AttemptOutcome {
  if (result.code === 0) return { success: true };
  return { success: false, detail: describeFailure(result) };
}

/**
 * Run `operation` until it succeeds or the attempts run out, strictly one at
 * a time with a fixed pause in between. A thrown error counts as a failed attempt.
 */
export async function retrySequentially(
  operation: (attempt: number) => Promise<AttemptOutcome>,
  options: RetryOptions,
): Promise<boolean> {
  const pause = options.sleep ?? sleep;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    let outcome: AttemptOutcome;
    try {
      outcome = await operation(attempt);
    } catch (error: unknown) {
      outcome = { success: false, detail: getErrorMessage(error) };
    }
    options.onAttempt?.(attempt, outcome);
    if (outcome.success) return true;
    if (attempt < options.attempts) {
      await pause(options.delayMs);
    }
  }
  return false;
}
