import type { GuardAction } from "@agentguard/shared/events";
import type { GuardConfigInput } from "@agentguard/shared/validation";

/**
 * Minimal logging surface the SDK writes to. The global `console`
 * satisfies it, as does a pino or winston logger.
 */
export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
}

/** Options accepted by `new AgentGuard()`; anything omitted is resolved from env or file. */
export interface AgentGuardOptions extends Partial<GuardConfigInput> {
  /** Custom fetch implementation (tests, proxies). */
  fetch?: typeof globalThis.fetch;
  logger?: Logger;
  /** Close the guard on process `beforeExit`. Defaults to true. */
  closeOnExit?: boolean;
}

/** What every guarded execution resolves to. */
export interface GuardResult<T = unknown> {
  executionId: string;
  /** Verified (possibly corrected) output, or the raw output on pass-through. */
  output: unknown;
  /** What the agent actually returned. */
  rawOutput: T;
  /** `null` when no verdict was obtained. */
  confidence: number | null;
  action: GuardAction;
  corrections: unknown;
  checks: Record<string, unknown>;
  verified: boolean;
}

export interface StepInput {
  type: string;
  name: string;
  input?: unknown;
  output?: unknown;
  durationMs?: number;
}

/** Options shared by `trace()`, `run()` and `watch()`. */
export interface TraceOptions {
  agentId: string;
  task?: string;
  input?: unknown;
  groundTruth?: unknown;
  schema?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
  parentExecutionId?: string;
  sessionId?: string;
  sequence?: number;
}

export interface RunOptions<R> extends TraceOptions {
  fn: () => R | Promise<R>;
}

export type WatchOptions = Omit<TraceOptions, "input">;
