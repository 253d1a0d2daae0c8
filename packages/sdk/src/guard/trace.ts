import type { ExecutionStatus, StepRecord } from "@agentguard/shared/events";
import type { ExecutionRecord } from "../core/events.js";
import { generateExecutionId } from "../core/ids.js";
import type { GuardResult, StepInput, TraceOptions } from "../core/types.js";

export interface TraceTiming {
  startedAt: Date;
  endedAt: Date;
  latencyMs: number;
  status: ExecutionStatus;
  errorMessage?: string;
}

/**
 * Mutable collector for one execution. Handed to `trace()` bodies and
 * reachable from agent code via `currentTrace()`; turned into an
 * immutable event once the body settles.
 */
export class TraceContext {
  readonly executionId: string;
  readonly agentId: string;
  readonly task: string | undefined;
  readonly sessionId: string | undefined;
  readonly parentExecutionId: string | undefined;
  readonly sequence: number | undefined;

  /** Set once the execution has been delivered. */
  result: GuardResult | null = null;

  private input: unknown;
  private output: unknown = undefined;
  private recorded = false;
  private groundTruth: unknown = undefined;
  private schema: Record<string, unknown> | undefined;
  private readonly steps: StepRecord[] = [];
  private tokenCount: number | undefined;
  private costEstimate: number | undefined;
  private readonly _metadata: Record<string, unknown>;

  constructor(options: TraceOptions, executionId: string = generateExecutionId()) {
    this.executionId = executionId;
    this.agentId = options.agentId;
    this.task = options.task;
    this.sessionId = options.sessionId;
    this.parentExecutionId = options.parentExecutionId;
    this.sequence = options.sequence;
    this.input = options.input;
    this.groundTruth = options.groundTruth;
    this.schema = options.schema;
    this._metadata = { ...options.metadata };
  }

  /** Record the execution's final output. Last call wins. */
  record(output: unknown): void {
    this.output = output;
    this.recorded = true;
  }

  get hasRecorded(): boolean {
    return this.recorded;
  }

  get recordedOutput(): unknown {
    return this.output;
  }

  setInput(input: unknown): void {
    this.input = input;
  }

  setGroundTruth(groundTruth: unknown): void {
    this.groundTruth = groundTruth;
  }

  setSchema(schema: Record<string, unknown>): void {
    this.schema = schema;
  }

  /** Append an intermediate step (LLM call, tool call, retrieval…). */
  step(step: StepInput): void {
    this.steps.push({
      type: step.type,
      name: step.name,
      input: step.input,
      output: step.output,
      duration_ms: step.durationMs,
    });
  }

  setTokenCount(tokens: number): void {
    this.tokenCount = tokens;
  }

  setCostEstimate(cost: number): void {
    this.costEstimate = cost;
  }

  setMetadata(key: string, value: unknown): void {
    this._metadata[key] = value;
  }

  get metadata(): Readonly<Record<string, unknown>> {
    return this._metadata;
  }

  toRecord(timing: TraceTiming): ExecutionRecord {
    return {
      executionId: this.executionId,
      agentId: this.agentId,
      task: this.task,
      input: this.input,
      output: this.output,
      ...timing,
      groundTruth: this.groundTruth,
      schema: this.schema,
      steps: this.steps,
      tokenCount: this.tokenCount,
      costEstimate: this.costEstimate,
      metadata: this._metadata,
      sessionId: this.sessionId,
      parentExecutionId: this.parentExecutionId,
      sequence: this.sequence,
    };
  }
}
