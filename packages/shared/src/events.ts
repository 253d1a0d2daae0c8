import { z } from "zod";

// ---------------------------------------------------------------------------
// Steps (sub-operations inside one execution)
// ---------------------------------------------------------------------------

/** Open set of step kinds; these are the ones the backend knows about. */
export const KNOWN_STEP_TYPES = ["llm", "tool_call", "retrieval", "custom"] as const;

export const StepRecord = z.object({
  type: z.string().min(1),
  name: z.string().min(1),
  input: z.unknown().optional(),
  output: z.unknown().optional(),
  duration_ms: z.number().min(0).optional(),
});
export type StepRecord = z.infer<typeof StepRecord>;

// ---------------------------------------------------------------------------
// Execution event
// ---------------------------------------------------------------------------

export const ExecutionStatus = z.enum(["success", "error"]);
export type ExecutionStatus = z.infer<typeof ExecutionStatus>;

/** One observed agent execution, as sent on the wire. */
export const ExecutionEvent = z.object({
  execution_id: z.string().uuid(),
  agent_id: z.string().min(1).max(256),
  task: z.string().optional(),
  input: z.unknown(),
  output: z.unknown(),
  started_at: z.string().datetime(),
  ended_at: z.string().datetime(),
  latency_ms: z.number().min(0),
  status: ExecutionStatus,
  error_message: z.string().optional(),
  ground_truth: z.unknown().optional(),
  schema: z.record(z.unknown()).optional(),
  steps: z.array(StepRecord).optional(),
  token_count: z.number().int().min(0).optional(),
  cost_estimate: z.number().min(0).optional(),
  metadata: z.record(z.unknown()),
  session_id: z.string().optional(),
  parent_execution_id: z.string().optional(),
  sequence: z.number().int().min(0).optional(),
  sdk_version: z.string(),
});
export type ExecutionEvent = z.infer<typeof ExecutionEvent>;

// ---------------------------------------------------------------------------
// Ingestion batch (POST /v1/ingest/batch)
// ---------------------------------------------------------------------------

export const IngestBatch = z.object({
  events: z.array(ExecutionEvent).min(1),
});
export type IngestBatch = z.infer<typeof IngestBatch>;

// ---------------------------------------------------------------------------
// Verdict (response of POST /v1/verify)
// ---------------------------------------------------------------------------

export const KNOWN_ACTIONS = ["pass", "block", "correct"] as const;
export type KnownAction = (typeof KNOWN_ACTIONS)[number];

/** Action string; the backend may add values beyond the known three. */
export type GuardAction = KnownAction | (string & {});

export const Verdict = z.object({
  execution_id: z.string(),
  confidence: z.number().min(0).max(1),
  action: z.string().min(1),
  output: z.unknown(),
  corrections: z.unknown().nullable().optional(),
  checks: z.record(z.unknown()).default({}),
});
export type Verdict = z.infer<typeof Verdict>;

export function isKnownAction(action: string): action is KnownAction {
  return KNOWN_ACTIONS.some((known) => known === action);
}
