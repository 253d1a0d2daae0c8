import { AgentGuardError, ErrorCode, describeError } from "@agentguard/shared/errors";
import type { ExecutionEvent } from "@agentguard/shared/events";
import { type WireEvent, serializeEvent } from "@agentguard/shared/serialize";
import { HttpClient } from "./http.js";
import type { VerifyOutcome, VerifyTransport } from "./types.js";

export interface DirectTransportOptions {
  apiUrl: string;
  apiKey: string;
  sdkVersion: string;
  timeoutMs?: number;
  fetch?: typeof globalThis.fetch;
}

export const VERIFY_PATH = "/v1/verify";

const DEFAULT_TIMEOUT_MS = 2_000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Sends one event to the verification API and hands back the verdict
 * mapping untouched. Failures come back as `{ ok: false }` outcomes;
 * falling back (pass-through or otherwise) is the caller's decision.
 */
export class DirectTransport implements VerifyTransport {
  private readonly verifyUrl: string;
  private readonly client: HttpClient;

  constructor(options: DirectTransportOptions) {
    this.verifyUrl = `${options.apiUrl.replace(/\/+$/, "")}${VERIFY_PATH}`;
    this.client = new HttpClient({
      apiKey: options.apiKey,
      sdkVersion: options.sdkVersion,
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      fetch: options.fetch,
    });
  }

  async verify(event: ExecutionEvent): Promise<VerifyOutcome> {
    let wire: WireEvent;
    try {
      wire = serializeEvent(event);
    } catch (error) {
      return {
        ok: false,
        status: null,
        error: new AgentGuardError(
          ErrorCode.SDK.EVENT_NOT_SERIALIZABLE,
          `Event could not be serialized: ${describeError(error)}`,
          null,
          { executionId: event.execution_id },
        ),
      };
    }

    const result = await this.client.postJson(this.verifyUrl, wire);

    if (!result.ok) {
      return {
        ok: false,
        status: result.status,
        error: new AgentGuardError(
          ErrorCode.VERIFY.REQUEST_FAILED,
          `Verification request failed: ${result.error}`,
          result.status,
          { executionId: event.execution_id, ...(result.body ? { body: result.body } : {}) },
        ),
      };
    }

    let verdict: unknown;
    try {
      verdict = JSON.parse(result.body);
    } catch {
      verdict = undefined;
    }

    if (!isRecord(verdict)) {
      return {
        ok: false,
        status: result.status,
        error: new AgentGuardError(
          ErrorCode.VERIFY.INVALID_RESPONSE,
          "Verification response is not a JSON object",
          result.status,
          { executionId: event.execution_id, body: result.body },
        ),
      };
    }

    return { ok: true, status: result.status, verdict };
  }

  async close(): Promise<void> {
    this.client.close();
  }
}
