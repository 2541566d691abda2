import { z } from "zod";
import { DEFAULT_POLL_INTERVAL_MS, DEFAULT_READINESS_TIMEOUT_MS } from "../constants";

/**
 * Poll interval and termination bound for the readiness poller.
 * At least one of maxAttempts/timeoutMs is always set after resolution.
 */
export interface WaitPolicy {
  readonly pollIntervalMs: number;
  /** Maximum status queries before giving up */
  readonly maxAttempts?: number;
  /** Deadline measured from the first query */
  readonly timeoutMs?: number;
}

export const WaitPolicySchema = z.object({
  pollIntervalMs: z.number().int().positive().default(DEFAULT_POLL_INTERVAL_MS),
  maxAttempts: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export type WaitPolicyInput = z.input<typeof WaitPolicySchema>;

/**
 * Validate a wait policy and fill defaults.
 * A policy with no bound at all gets the default timeout so polling always terminates.
 */
export function resolveWaitPolicy(input: WaitPolicyInput = {}): WaitPolicy {
  const parsed = WaitPolicySchema.parse(input);
  const timeoutMs =
    parsed.maxAttempts === undefined && parsed.timeoutMs === undefined
      ? DEFAULT_READINESS_TIMEOUT_MS
      : parsed.timeoutMs;

  return Object.freeze({
    pollIntervalMs: parsed.pollIntervalMs,
    maxAttempts: parsed.maxAttempts,
    timeoutMs,
  });
}

/** Human-readable bound, used in timeout messages */
export function describeWaitPolicy(policy: WaitPolicy): string {
  const bounds: string[] = [];
  if (policy.maxAttempts !== undefined) bounds.push(`${policy.maxAttempts} attempts`);
  if (policy.timeoutMs !== undefined) bounds.push(`${policy.timeoutMs}ms`);
  return bounds.join(" / ");
}
