import { randomUUID } from "node:crypto";
import type { ExecutionEvent } from "@agentguard/shared/events";
import { type Mock, vi } from "vitest";
import type { Logger } from "../core/types.js";

export type FetchFn = typeof globalThis.fetch;

export const API_URL = "https://api.agentguard.test";

export function jsonResponse(status: number, body?: unknown): Response {
  return new Response(body === undefined ? null : JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** Fetch mock answering every request with a fresh response. */
export function createMockFetch(status = 202, body: unknown = { accepted: 1 }): Mock<FetchFn> {
  return vi.fn<FetchFn>(async () => jsonResponse(status, body));
}

/** Fetch mock whose requests hang until the test answers them. */
export function createDeferredFetch() {
  const resolvers: ((response: Response) => void)[] = [];
  const fetch = vi.fn<FetchFn>(
    () =>
      new Promise<Response>((resolve) => {
        resolvers.push(resolve);
      }),
  );
  return {
    fetch,
    respond(index: number, response: Response): void {
      const resolve = resolvers[index];
      if (!resolve) throw new Error(`no pending request #${index}`);
      resolve(response);
    },
  };
}

/** Fetch mock that never answers but honours the abort signal. */
export function createHangingFetch(): Mock<FetchFn> {
  return vi.fn<FetchFn>(
    (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          reject(new Error("The operation was aborted."));
        });
      }),
  );
}

export interface CapturedRequest {
  url: string;
  method: string | undefined;
  headers: RequestInit["headers"];
  body: unknown;
}

export function requestAt(fetch: Mock<FetchFn>, index: number): CapturedRequest {
  const call = fetch.mock.calls[index];
  if (!call) throw new Error(`no request #${index}`);
  const [input, init] = call;
  return {
    url: String(input),
    method: init?.method,
    headers: init?.headers,
    body: JSON.parse(String(init?.body)),
  };
}

/** The `events` array of the batch sent as request #index. */
export function batchAt(fetch: Mock<FetchFn>, index: number): Record<string, unknown>[] {
  const { body } = requestAt(fetch, index);
  if (typeof body !== "object" || body === null || !("events" in body)) {
    throw new Error("request body is not a batch");
  }
  const { events } = body;
  if (!Array.isArray(events)) throw new Error("events is not an array");
  return events;
}

export function createLogger(): Logger & { [K in keyof Logger]: Mock<(message: string) => void> } {
  return {
    debug: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
  };
}

let counter = 0;

export function fakeEvent(overrides: Partial<ExecutionEvent> = {}): ExecutionEvent {
  counter += 1;
  return {
    execution_id: randomUUID(),
    agent_id: "test-bot",
    input: { n: counter },
    output: { ok: true },
    started_at: "2026-03-01T10:30:00.000Z",
    ended_at: "2026-03-01T10:30:00.100Z",
    latency_ms: 100,
    status: "success",
    metadata: {},
    sdk_version: "0.1.0",
    ...overrides,
  };
}
