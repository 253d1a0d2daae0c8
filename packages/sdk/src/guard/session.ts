import { generateSessionId } from "../core/ids.js";
import type { GuardResult, RunOptions, TraceOptions } from "../core/types.js";
import type { TraceContext } from "./trace.js";

/** The part of `AgentGuard` a session delegates to. */
export interface TraceRunner {
  trace(options: TraceOptions, body: (trace: TraceContext) => unknown): Promise<GuardResult>;
  run<R>(options: RunOptions<R>): Promise<GuardResult<Awaited<R>>>;
}

export interface SessionOptions {
  agentId: string;
  sessionId?: string;
  metadata?: Record<string, unknown>;
}

export type SessionTraceOptions = Omit<TraceOptions, "agentId" | "sessionId" | "sequence"> & {
  agentId?: string;
};

export type SessionRunOptions<R> = SessionTraceOptions & { fn: () => R | Promise<R> };

/**
 * A conversation or multi-turn run. Every trace started through the
 * session carries its ID and the next sequence number; session metadata
 * is applied first so per-trace metadata overrides it.
 */
export class Session {
  readonly sessionId: string;
  readonly agentId: string;
  private readonly metadata: Record<string, unknown>;
  private _sequence = 0;

  constructor(
    private readonly runner: TraceRunner,
    options: SessionOptions,
  ) {
    this.sessionId = options.sessionId ?? generateSessionId();
    this.agentId = options.agentId;
    this.metadata = { ...options.metadata };
  }

  /** Number of traces started so far. */
  get sequence(): number {
    return this._sequence;
  }

  trace(options: SessionTraceOptions, body: (trace: TraceContext) => unknown): Promise<GuardResult> {
    return this.runner.trace(this.withSession(options), body);
  }

  run<R>(options: SessionRunOptions<R>): Promise<GuardResult<Awaited<R>>> {
    return this.runner.run({ ...this.withSession(options), fn: options.fn });
  }

  private withSession(options: SessionTraceOptions): TraceOptions {
    this._sequence += 1;
    return {
      ...options,
      agentId: options.agentId ?? this.agentId,
      sessionId: this.sessionId,
      sequence: this._sequence,
      metadata: { ...this.metadata, ...options.metadata },
    };
  }
}
