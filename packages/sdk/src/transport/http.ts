import { ErrorCode, describeError } from "@agentguard/shared/errors";

export const API_KEY_HEADER = "X-AgentGuard-Key";
export const SDK_VERSION_HEADER = "X-AgentGuard-SDK-Version";

export interface HttpClientOptions {
  apiKey: string;
  sdkVersion: string;
  timeoutMs: number;
  fetch?: typeof globalThis.fetch;
}

/** Outcome of one POST; the client never throws for HTTP or network failures. */
export type HttpResult =
  | { ok: true; status: number; body: string }
  | { ok: false; status: number | null; error: string; body?: string };

/**
 * Owns the fetch function, auth headers and in-flight requests for one
 * transport. Each request gets its own abort timer; `close()` aborts
 * whatever is still running and makes later calls fail fast.
 */
export class HttpClient {
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly _fetch: typeof globalThis.fetch;
  private readonly inFlight = new Set<AbortController>();
  private _closed = false;

  constructor(options: HttpClientOptions) {
    this.headers = {
      "Content-Type": "application/json",
      [API_KEY_HEADER]: options.apiKey,
      [SDK_VERSION_HEADER]: options.sdkVersion,
    };
    this.timeoutMs = options.timeoutMs;
    this._fetch = options.fetch ?? globalThis.fetch;
  }

  get closed(): boolean {
    return this._closed;
  }

  async postJson(url: string, payload: unknown): Promise<HttpResult> {
    if (this._closed) {
      return { ok: false, status: null, error: `[${ErrorCode.TRANSPORT.CLIENT_CLOSED}] client closed` };
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    this.inFlight.add(controller);

    try {
      const response = await this._fetch(url, {
        method: "POST",
        headers: this.headers,
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      const body = await response.text();
      if (!response.ok) {
        return { ok: false, status: response.status, error: `HTTP ${response.status}`, body };
      }
      return { ok: true, status: response.status, body };
    } catch (error) {
      if (timedOut) {
        return {
          ok: false,
          status: null,
          error: `[${ErrorCode.TRANSPORT.REQUEST_TIMEOUT}] timed out after ${this.timeoutMs}ms`,
        };
      }
      if (this._closed) {
        return { ok: false, status: null, error: `[${ErrorCode.TRANSPORT.CLIENT_CLOSED}] client closed` };
      }
      return { ok: false, status: null, error: describeError(error) };
    } finally {
      clearTimeout(timer);
      this.inFlight.delete(controller);
    }
  }

  /** Abort in-flight requests and refuse new ones. Safe to call twice. */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }
}
