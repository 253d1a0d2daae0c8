import { ErrorCode, describeError } from "@agentguard/shared/errors";
import type { ExecutionEvent } from "@agentguard/shared/events";
import { type WireEvent, serializeEvent } from "@agentguard/shared/serialize";
import type { Logger } from "../core/types.js";
import { HttpClient } from "./http.js";
import type { IngestTransport } from "./types.js";

export interface BatchTransportOptions {
  apiUrl: string;
  apiKey: string;
  sdkVersion: string;
  /** Buffer length that triggers an automatic flush. */
  flushBatchSize?: number;
  /** Period of the timer started by `start()`. */
  flushIntervalMs?: number;
  timeoutMs?: number;
  /** Drop the oldest events beyond this many. Unbounded when omitted. */
  maxBufferSize?: number;
  /** Auto-flushes allowed in flight at once; further triggers are skipped. */
  maxConcurrentFlushes?: number;
  fetch?: typeof globalThis.fetch;
  logger?: Logger;
}

export const INGEST_BATCH_PATH = "/v1/ingest/batch";

const DEFAULT_FLUSH_BATCH_SIZE = 50;
const DEFAULT_FLUSH_INTERVAL_MS = 1_000;
const DEFAULT_TIMEOUT_MS = 2_000;
const DEFAULT_MAX_CONCURRENT_FLUSHES = 4;

/** A buffered event tagged with its enqueue position, serialized on arrival. */
interface Slot {
  seq: number;
  event: ExecutionEvent;
  wire: WireEvent;
}

/**
 * Buffers execution events and ships them to the ingestion API in batches.
 *
 * Every read or write of the buffer is a synchronous block, so on the
 * event loop no caller can observe or modify it half-way. `flush()` swaps
 * the buffer out before its first `await`; the POST runs with the buffer
 * already free for new events. A failed batch is merged back by enqueue
 * position, which puts it ahead of anything that arrived meanwhile.
 *
 * Events are serialized in `enqueue`, so one unserializable payload is
 * dropped on its own and can never sink a batch.
 */
export class BatchTransport implements IngestTransport {
  private buffer: Slot[] = [];
  private nextSeq = 0;
  private client: HttpClient | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private autoFlushesInFlight = 0;
  private readonly flushes = new Set<Promise<void>>();
  private closing: Promise<void> | null = null;
  private released = false;

  private readonly ingestUrl: string;
  private readonly apiKey: string;
  private readonly sdkVersion: string;
  private readonly flushBatchSize: number;
  private readonly flushIntervalMs: number;
  private readonly timeoutMs: number;
  private readonly maxBufferSize: number | null;
  private readonly maxConcurrentFlushes: number;
  private readonly _fetch: typeof globalThis.fetch | undefined;
  private readonly logger: Logger;

  constructor(options: BatchTransportOptions) {
    this.ingestUrl = `${options.apiUrl.replace(/\/+$/, "")}${INGEST_BATCH_PATH}`;
    this.apiKey = options.apiKey;
    this.sdkVersion = options.sdkVersion;
    this.flushBatchSize = options.flushBatchSize ?? DEFAULT_FLUSH_BATCH_SIZE;
    this.flushIntervalMs = options.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxBufferSize = options.maxBufferSize ?? null;
    this.maxConcurrentFlushes = options.maxConcurrentFlushes ?? DEFAULT_MAX_CONCURRENT_FLUSHES;
    this._fetch = options.fetch;
    this.logger = options.logger ?? console;
  }

  /** Number of events waiting for delivery. */
  get size(): number {
    return this.buffer.length;
  }

  /** Snapshot of buffered events, oldest first. */
  pending(): ExecutionEvent[] {
    return this.buffer.map((slot) => slot.event);
  }

  /** Start the periodic flush timer. */
  start(): void {
    if (this.timer || this.closing) return;
    this.timer = setInterval(() => {
      void this.flush();
    }, this.flushIntervalMs);
    // Don't prevent process exit
    this.timer.unref();
  }

  enqueue(event: ExecutionEvent): void {
    if (this.closing) {
      this.logger.warn(
        `[${ErrorCode.TRANSPORT.EVENT_AFTER_CLOSE}] Transport is closed — dropped event ${event.execution_id}`,
      );
      return;
    }

    let wire: WireEvent;
    try {
      wire = serializeEvent(event);
    } catch (error) {
      this.logger.warn(
        `[${ErrorCode.SDK.EVENT_NOT_SERIALIZABLE}] Dropped event ${event.execution_id}: ${describeError(error)}`,
      );
      return;
    }

    this.buffer.push({ seq: this.nextSeq++, event, wire });
    this.enforceCap();

    if (this.buffer.length >= this.flushBatchSize) {
      this.scheduleFlush();
    }
  }

  flush(): Promise<void> {
    const flushing = this.send().finally(() => {
      this.flushes.delete(flushing);
    });
    this.flushes.add(flushing);
    return flushing;
  }

  private async send(): Promise<void> {
    if (this.released) return;

    const batch = this.buffer;
    if (batch.length === 0) return;
    this.buffer = [];

    const payload = { events: batch.map((slot) => slot.wire) };
    const result = await this.getClient().postJson(this.ingestUrl, payload);

    if (result.ok) {
      this.logger.debug(
        `Flushed ${batch.length} events to ${this.ingestUrl} (status ${result.status})`,
      );
      return;
    }

    this.logger.warn(
      `[${ErrorCode.TRANSPORT.FLUSH_FAILED_REQUEUED}] Failed to flush ${batch.length} events (${result.error}); returning to buffer for retry`,
    );
    this.requeue(batch);
  }

  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    // In-flight flushes settle (failures requeue) before the final one
    await Promise.allSettled(this.flushes);
    await this.flush();
    await Promise.allSettled(this.flushes);

    if (this.buffer.length > 0) {
      this.logger.warn(
        `[${ErrorCode.TRANSPORT.CLOSE_FLUSH_INCOMPLETE}] Closing with ${this.buffer.length} undelivered events`,
      );
    }
    this.released = true;
    this.client?.close();
    this.client = null;
  }

  /**
   * Best-effort: hand a flush to the event loop unless every auto-flush
   * slot is busy. A skipped attempt leaves the events for the next timer
   * tick or explicit flush.
   */
  private scheduleFlush(): void {
    if (this.autoFlushesInFlight >= this.maxConcurrentFlushes) {
      this.logger.debug(
        `[${ErrorCode.TRANSPORT.AUTO_FLUSH_SKIPPED}] ${this.autoFlushesInFlight} flushes in flight; deferring auto-flush (buffer size: ${this.buffer.length})`,
      );
      return;
    }

    this.autoFlushesInFlight += 1;
    void this.flush().finally(() => {
      this.autoFlushesInFlight -= 1;
    });
  }

  private getClient(): HttpClient {
    if (!this.client || this.client.closed) {
      this.client = new HttpClient({
        apiKey: this.apiKey,
        sdkVersion: this.sdkVersion,
        timeoutMs: this.timeoutMs,
        fetch: this._fetch,
      });
    }
    return this.client;
  }

  /** Merge a failed batch back, ordered by enqueue position. */
  private requeue(batch: Slot[]): void {
    const merged: Slot[] = [];
    let i = 0;
    let j = 0;
    const live = this.buffer;
    while (i < batch.length && j < live.length) {
      if (batch[i].seq < live[j].seq) {
        merged.push(batch[i++]);
      } else {
        merged.push(live[j++]);
      }
    }
    while (i < batch.length) merged.push(batch[i++]);
    while (j < live.length) merged.push(live[j++]);

    this.buffer = merged;
    this.enforceCap();
  }

  private enforceCap(): void {
    if (this.maxBufferSize === null || this.buffer.length <= this.maxBufferSize) return;
    const dropped = this.buffer.length - this.maxBufferSize;
    this.buffer.splice(0, dropped);
    this.logger.warn(`[${ErrorCode.TRANSPORT.BUFFER_OVERFLOW}] Dropped ${dropped} oldest events`);
  }
}
