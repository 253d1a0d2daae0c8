import type { ExecutionEvent, ExecutionStatus, StepRecord } from "@agentguard/shared/events";
import { type JsonValue, toJsonObject, toJsonValue } from "@agentguard/shared/serialize";

export interface EventContext {
  sdkVersion: string;
}

/** Everything the guard observed about one execution. */
export interface ExecutionRecord {
  executionId: string;
  agentId: string;
  task?: string;
  input: unknown;
  output: unknown;
  startedAt: Date;
  endedAt: Date;
  latencyMs: number;
  status: ExecutionStatus;
  errorMessage?: string;
  groundTruth?: unknown;
  schema?: Record<string, unknown>;
  steps: readonly StepRecord[];
  tokenCount?: number;
  costEstimate?: number;
  metadata: Readonly<Record<string, unknown>>;
  sessionId?: string;
  parentExecutionId?: string;
  sequence?: number;
}

/**
 * Build the wire event for a finished execution.
 *
 * Payloads (`input`, `output`, `ground_truth`, `schema`, step payloads,
 * `metadata`) are snapshotted into JSON values and the whole event is
 * frozen, so later changes to the agent's own objects never reach it.
 * Throws when a payload can't be serialized, e.g. a `toJSON()` or getter
 * that throws.
 */
export function buildExecutionEvent(
  ctx: EventContext,
  record: ExecutionRecord,
): Readonly<ExecutionEvent> {
  const steps = record.steps.map(snapshotStep);
  Object.freeze(steps);

  return Object.freeze({
    execution_id: record.executionId,
    agent_id: record.agentId,
    task: record.task,
    input: snapshot(record.input),
    output: snapshot(record.output),
    started_at: record.startedAt.toISOString(),
    ended_at: record.endedAt.toISOString(),
    latency_ms: Math.max(0, record.latencyMs),
    status: record.status,
    error_message: record.errorMessage,
    ground_truth: snapshot(record.groundTruth),
    schema: record.schema && snapshotRecord(record.schema),
    steps: steps.length > 0 ? steps : undefined,
    token_count: record.tokenCount,
    cost_estimate: record.costEstimate,
    metadata: snapshotRecord(record.metadata),
    session_id: record.sessionId,
    parent_execution_id: record.parentExecutionId,
    sequence: record.sequence,
    sdk_version: ctx.sdkVersion,
  });
}

/** Absent payloads stay absent instead of becoming `null`. */
function snapshot(value: unknown): JsonValue | undefined {
  if (value === undefined) return undefined;
  const json = toJsonValue(value);
  freezeJson(json);
  return json;
}

function snapshotRecord(record: Record<string, unknown>): { [key: string]: JsonValue } {
  const json = toJsonObject(record);
  freezeJson(json);
  return json;
}

function snapshotStep(step: StepRecord): StepRecord {
  return Object.freeze({
    type: step.type,
    name: step.name,
    input: snapshot(step.input),
    output: snapshot(step.output),
    duration_ms: step.duration_ms,
  });
}

function freezeJson(value: JsonValue): void {
  if (Array.isArray(value)) {
    for (const item of value) freezeJson(item);
    Object.freeze(value);
  } else if (value !== null && typeof value === "object") {
    for (const item of Object.values(value)) freezeJson(item);
    Object.freeze(value);
  }
}
