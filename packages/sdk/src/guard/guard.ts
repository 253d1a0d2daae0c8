import { ErrorCode, describeError } from "@agentguard/shared/errors";
import type { ExecutionEvent } from "@agentguard/shared/events";
import type { GuardConfig, GuardMode } from "@agentguard/shared/validation";
import { SDK_VERSION, resolveConfig } from "../core/config.js";
import { AgentGuardBlockError } from "../core/errors.js";
import { buildExecutionEvent } from "../core/events.js";
import { interpretVerdict, passThrough } from "../core/result.js";
import type {
  AgentGuardOptions,
  GuardResult,
  Logger,
  RunOptions,
  TraceOptions,
  WatchOptions,
} from "../core/types.js";
import { BatchTransport } from "../transport/batch.js";
import { DirectTransport } from "../transport/direct.js";
import { currentTrace, runInTrace } from "./context.js";
import { Session, type SessionOptions, type TraceRunner } from "./session.js";
import { TraceContext, type TraceTiming } from "./trace.js";

/**
 * Instruments agent executions and delivers them to the AgentGuard API.
 *
 * In `async` mode events are batched in the background and every call
 * returns its own output with a `pass` action. In `sync` mode each
 * execution waits for a verdict, which may correct or block the output;
 * when the verdict can't be obtained the output passes through unverified.
 *
 * Without an API key the guard runs in no-op mode: functions run
 * unchanged and nothing is sent.
 */
export class AgentGuard implements TraceRunner {
  readonly config: GuardConfig | null;

  private readonly logger: Logger;
  private readonly ingest: BatchTransport | null = null;
  private readonly verifier: DirectTransport | null = null;
  private readonly exitHook: (() => void) | null = null;
  private closing: Promise<void> | null = null;

  constructor(options: AgentGuardOptions = {}) {
    this.logger = options.logger ?? console;
    this.config = resolveConfig(options);

    if (!this.config) {
      this.logger.warn(
        `[${ErrorCode.SDK.NO_API_KEY}] No API key found — AgentGuard running in no-op mode`,
      );
      return;
    }

    if (this.config.mode === "async") {
      this.ingest = new BatchTransport({
        apiUrl: this.config.apiUrl,
        apiKey: this.config.apiKey,
        sdkVersion: SDK_VERSION,
        flushBatchSize: this.config.flushBatchSize,
        flushIntervalMs: this.config.flushIntervalMs,
        timeoutMs: this.config.timeoutMs,
        maxBufferSize: this.config.maxBufferSize,
        fetch: options.fetch,
        logger: this.logger,
      });
      this.ingest.start();
    } else {
      this.verifier = new DirectTransport({
        apiUrl: this.config.apiUrl,
        apiKey: this.config.apiKey,
        sdkVersion: SDK_VERSION,
        timeoutMs: this.config.timeoutMs,
        fetch: options.fetch,
      });
    }

    if (options.closeOnExit ?? true) {
      this.exitHook = () => {
        void this.close();
      };
      process.once("beforeExit", this.exitHook);
    }
  }

  /** Delivery mode, or null in no-op mode. */
  get mode(): GuardMode | null {
    return this.config?.mode ?? null;
  }

  /**
   * Wrap a function so every call is traced. The wrapper resolves to a
   * `GuardResult`; errors thrown by `fn` propagate unchanged.
   */
  watch<A extends unknown[], R>(
    options: WatchOptions,
    fn: (...args: A) => R | Promise<R>,
  ): (...args: A) => Promise<GuardResult<Awaited<R>>> {
    return (...args: A) =>
      this.run<R>({
        ...options,
        input: args.length === 1 ? args[0] : args,
        fn: () => fn(...args),
      });
  }

  /** Trace a single call of `fn`. */
  run<R>(options: RunOptions<R>): Promise<GuardResult<Awaited<R>>> {
    const { fn, ...traceOptions } = options;
    return this.execute(traceOptions, async (trace): Promise<Awaited<R>> => {
      const output = await fn();
      trace.record(output);
      return output;
    });
  }

  /**
   * Run `body` with a trace it can annotate. The output is whatever the
   * body passed to `trace.record()`, else its return value.
   */
  trace(options: TraceOptions, body: (trace: TraceContext) => unknown): Promise<GuardResult> {
    return this.execute(options, async (trace) => {
      const returned = await body(trace);
      return trace.hasRecorded ? trace.recordedOutput : returned;
    });
  }

  session(options: SessionOptions): Session {
    return new Session(this, options);
  }

  /** Flush buffered events now (async mode only). */
  async flush(): Promise<void> {
    await this.ingest?.flush();
  }

  /** Flush and release transports. Safe to call more than once. */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    if (this.exitHook) {
      process.removeListener("beforeExit", this.exitHook);
    }
    await this.ingest?.close();
    await this.verifier?.close();
  }

  private async execute<T>(
    options: TraceOptions,
    body: (trace: TraceContext) => Promise<T>,
  ): Promise<GuardResult<T>> {
    const parent = currentTrace();
    const trace = new TraceContext({
      ...options,
      parentExecutionId: options.parentExecutionId ?? parent?.executionId,
      sessionId: options.sessionId ?? parent?.sessionId,
    });

    const startedAt = new Date();
    const start = performance.now();
    const timing = (status: TraceTiming["status"], errorMessage?: string): TraceTiming => ({
      startedAt,
      endedAt: new Date(),
      latencyMs: Math.round(performance.now() - start),
      status,
      errorMessage,
    });

    let rawOutput: T;
    try {
      rawOutput = await runInTrace(trace, () => body(trace));
    } catch (error) {
      this.reportFailure(
        trace,
        timing("error", error instanceof Error ? error.message : String(error)),
      );
      throw error;
    }

    if (!trace.hasRecorded) trace.record(rawOutput);
    const result = await this.deliver(trace, timing("success"), rawOutput);
    trace.result = result;

    if (result.action === "block" && this.config?.raiseOnBlock) {
      throw new AgentGuardBlockError(result);
    }
    return result;
  }

  private async deliver<T>(
    trace: TraceContext,
    timing: TraceTiming,
    rawOutput: T,
  ): Promise<GuardResult<T>> {
    if (!this.ingest && !this.verifier) {
      return passThrough(trace.executionId, rawOutput);
    }
    const event = this.buildEvent(trace, timing);
    if (!event) {
      return passThrough(trace.executionId, rawOutput);
    }
    if (this.ingest) {
      this.ingest.enqueue(event);
      return passThrough(event.execution_id, rawOutput);
    }
    if (!this.verifier) {
      return passThrough(event.execution_id, rawOutput);
    }

    const outcome = await this.verifier.verify(event);
    if (!outcome.ok) {
      this.logger.warn(
        `[${ErrorCode.VERIFY.PASS_THROUGH}] ${outcome.error.message} — returning unverified output`,
      );
      return passThrough(event.execution_id, rawOutput);
    }

    const result = interpretVerdict(outcome.verdict, event.execution_id, rawOutput);
    if (!result) {
      this.logger.warn(
        `[${ErrorCode.VERIFY.INVALID_RESPONSE}] Verdict for ${event.execution_id} did not match the expected shape — returning unverified output`,
      );
      return passThrough(event.execution_id, rawOutput);
    }
    return result;
  }

  /** Failed executions are reported in async mode; there is no output to verify in sync mode. */
  private reportFailure(trace: TraceContext, timing: TraceTiming): void {
    if (this.ingest) {
      const event = this.buildEvent(trace, timing);
      if (event) this.ingest.enqueue(event);
      return;
    }
    if (this.verifier) {
      this.logger.debug(
        `[${ErrorCode.SDK.FAILED_EXECUTION_NOT_VERIFIED}] Execution ${trace.executionId} threw; skipping verification`,
      );
    }
  }

  /** Snapshot the trace into an event; a payload that can't be serialized is logged and skipped. */
  private buildEvent(trace: TraceContext, timing: TraceTiming): ExecutionEvent | null {
    try {
      return buildExecutionEvent({ sdkVersion: SDK_VERSION }, trace.toRecord(timing));
    } catch (error) {
      this.logger.warn(
        `[${ErrorCode.SDK.EVENT_NOT_SERIALIZABLE}] Execution ${trace.executionId} could not be serialized (${describeError(error)}); not delivered`,
      );
      return null;
    }
  }
}
