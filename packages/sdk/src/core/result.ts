import { Verdict } from "@agentguard/shared/events";
import type { GuardResult } from "./types.js";

/** Unverified result: the agent's own output with a `pass` action. */
export function passThrough<T>(executionId: string, rawOutput: T): GuardResult<T> {
  return {
    executionId,
    output: rawOutput,
    rawOutput,
    confidence: null,
    action: "pass",
    corrections: null,
    checks: {},
    verified: false,
  };
}

/**
 * Turn a verdict mapping into a typed result.
 *
 * Returns null when the mapping doesn't match the verdict schema; the
 * caller decides what to fall back to.
 */
export function interpretVerdict<T>(
  verdict: Record<string, unknown>,
  executionId: string,
  rawOutput: T,
): GuardResult<T> | null {
  const parsed = Verdict.safeParse(verdict);
  if (!parsed.success) return null;

  const data = parsed.data;
  return {
    executionId: data.execution_id || executionId,
    // A verdict without an output echoes the agent's
    output: data.output === undefined ? rawOutput : data.output,
    rawOutput,
    confidence: data.confidence,
    action: data.action,
    corrections: data.corrections ?? null,
    checks: data.checks,
    verified: true,
  };
}
