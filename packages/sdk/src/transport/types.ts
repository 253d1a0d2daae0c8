import type { AgentGuardError } from "@agentguard/shared/errors";
import type { ExecutionEvent } from "@agentguard/shared/events";

/** Fire-and-forget delivery to the ingestion API. */
export interface IngestTransport {
  /** Buffer an event; never throws or blocks. */
  enqueue(event: ExecutionEvent): void;
  /** Send everything currently buffered as one batch. Never rejects. */
  flush(): Promise<void>;
  /** Final flush, then release the HTTP client. Idempotent. */
  close(): Promise<void>;
}

export type VerifyOutcome =
  | { ok: true; status: number; verdict: Record<string, unknown> }
  | { ok: false; status: number | null; error: AgentGuardError };

/** Single-event request/response verification. */
export interface VerifyTransport {
  /** Resolve to the verdict mapping, or a failure the caller must handle. */
  verify(event: ExecutionEvent): Promise<VerifyOutcome>;
  /** Release the HTTP client. Idempotent. */
  close(): Promise<void>;
}
