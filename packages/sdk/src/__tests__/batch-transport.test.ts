import { afterEach, describe, expect, it, vi } from "vitest";
import { BatchTransport, type BatchTransportOptions } from "../transport/batch.js";
import {
  API_URL,
  type FetchFn,
  batchAt,
  createDeferredFetch,
  createLogger,
  createMockFetch,
  fakeEvent,
  jsonResponse,
  requestAt,
} from "./helpers.js";

function createTransport(fetch: FetchFn, options: Partial<BatchTransportOptions> = {}) {
  const logger = createLogger();
  const transport = new BatchTransport({
    apiUrl: API_URL,
    apiKey: "test-key",
    sdkVersion: "0.1.0",
    flushBatchSize: 100,
    fetch,
    logger,
    ...options,
  });
  return { transport, logger };
}

describe("BatchTransport", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("buffers events without sending immediately", () => {
    const fetch = createMockFetch();
    const { transport } = createTransport(fetch);

    transport.enqueue(fakeEvent());

    expect(fetch).not.toHaveBeenCalled();
    expect(transport.size).toBe(1);
  });

  it("posts the buffered events as one batch with the auth headers", async () => {
    const fetch = createMockFetch();
    const { transport, logger } = createTransport(fetch);
    const first = fakeEvent();
    const second = fakeEvent();

    transport.enqueue(first);
    transport.enqueue(second);
    await transport.flush();

    expect(fetch).toHaveBeenCalledOnce();
    const request = requestAt(fetch, 0);
    expect(request.url).toBe("https://api.agentguard.test/v1/ingest/batch");
    expect(request.method).toBe("POST");
    expect(request.headers).toEqual({
      "Content-Type": "application/json",
      "X-AgentGuard-Key": "test-key",
      "X-AgentGuard-SDK-Version": "0.1.0",
    });
    expect(batchAt(fetch, 0)).toEqual([first, second]);
    expect(transport.size).toBe(0);
    expect(logger.debug).toHaveBeenCalledWith(
      "Flushed 2 events to https://api.agentguard.test/v1/ingest/batch (status 202)",
    );
  });

  it("does not send when the buffer is empty", async () => {
    const fetch = createMockFetch();
    const { transport } = createTransport(fetch);

    await transport.flush();

    expect(fetch).not.toHaveBeenCalled();
  });

  it("strips a trailing slash from the API URL", async () => {
    const fetch = createMockFetch();
    const { transport } = createTransport(fetch, { apiUrl: "https://api.agentguard.test/" });

    transport.enqueue(fakeEvent());
    await transport.flush();

    expect(requestAt(fetch, 0).url).toBe("https://api.agentguard.test/v1/ingest/batch");
  });

  it("omits undefined fields from serialized events", async () => {
    const fetch = createMockFetch();
    const { transport } = createTransport(fetch);

    transport.enqueue(fakeEvent({ task: undefined, output: new Date("2026-03-01T00:00:00.000Z") }));
    await transport.flush();

    const [sent] = batchAt(fetch, 0);
    expect(sent).not.toHaveProperty("task");
    expect(sent?.output).toBe("2026-03-01T00:00:00.000Z");
  });

  describe("auto-flush", () => {
    it("flushes when the buffer reaches the batch size", () => {
      const fetch = createMockFetch();
      const { transport } = createTransport(fetch, { flushBatchSize: 3 });
      const events = Array.from({ length: 7 }, () => fakeEvent());

      for (const event of events) transport.enqueue(event);

      expect(fetch).toHaveBeenCalledTimes(2);
      expect(batchAt(fetch, 0)).toEqual(events.slice(0, 3));
      expect(batchAt(fetch, 1)).toEqual(events.slice(3, 6));
      expect(transport.pending()).toEqual(events.slice(6));
    });

    it("skips the trigger while every flush slot is busy", () => {
      const { fetch } = createDeferredFetch();
      const { transport, logger } = createTransport(fetch, {
        flushBatchSize: 1,
        maxConcurrentFlushes: 1,
      });

      transport.enqueue(fakeEvent());
      transport.enqueue(fakeEvent());

      expect(fetch).toHaveBeenCalledOnce();
      expect(transport.size).toBe(1);
      expect(logger.debug).toHaveBeenCalledWith(
        "[AGENTGUARD-2001] 1 flushes in flight; deferring auto-flush (buffer size: 1)",
      );
    });

    it("frees the slot once the flush settles", async () => {
      const deferred = createDeferredFetch();
      const { transport, logger } = createTransport(deferred.fetch, {
        flushBatchSize: 1,
        maxConcurrentFlushes: 1,
      });

      transport.enqueue(fakeEvent());
      deferred.respond(0, jsonResponse(202));
      await vi.waitFor(() => {
        expect(logger.debug).toHaveBeenCalledWith(
          "Flushed 1 events to https://api.agentguard.test/v1/ingest/batch (status 202)",
        );
      });
      await new Promise((resolve) => setImmediate(resolve));

      transport.enqueue(fakeEvent());
      expect(deferred.fetch).toHaveBeenCalledTimes(2);
    });

    it("flushes on the timer", async () => {
      vi.useFakeTimers();
      const fetch = createMockFetch();
      const { transport } = createTransport(fetch, { flushIntervalMs: 1_000 });
      transport.start();

      transport.enqueue(fakeEvent());
      await vi.advanceTimersByTimeAsync(999);
      expect(fetch).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      expect(fetch).toHaveBeenCalledOnce();

      await transport.close();
    });
  });

  describe("failed flushes", () => {
    it("returns the batch to the buffer in order and logs a warning", async () => {
      const fetch = createMockFetch(500, { detail: "unavailable" });
      const { transport, logger } = createTransport(fetch);
      const events = [fakeEvent(), fakeEvent()];

      for (const event of events) transport.enqueue(event);
      await transport.flush();

      expect(transport.pending()).toEqual(events);
      expect(logger.warn).toHaveBeenCalledWith(
        "[AGENTGUARD-2000] Failed to flush 2 events (HTTP 500); returning to buffer for retry",
      );
    });

    it("puts a failed batch ahead of events enqueued during the request", async () => {
      const deferred = createDeferredFetch();
      const { transport } = createTransport(deferred.fetch);
      const [a, b, c] = [fakeEvent(), fakeEvent(), fakeEvent()];

      transport.enqueue(a);
      transport.enqueue(b);
      const flushing = transport.flush();
      transport.enqueue(c);
      expect(transport.pending()).toEqual([c]);

      deferred.respond(0, jsonResponse(503));
      await flushing;

      expect(transport.pending()).toEqual([a, b, c]);
    });

    it("keeps enqueue order when concurrent flushes fail out of order", async () => {
      const deferred = createDeferredFetch();
      const { transport } = createTransport(deferred.fetch);
      const [a, b, c] = [fakeEvent(), fakeEvent(), fakeEvent()];

      transport.enqueue(a);
      const first = transport.flush();
      transport.enqueue(b);
      const second = transport.flush();
      transport.enqueue(c);

      deferred.respond(1, jsonResponse(500));
      await second;
      expect(transport.pending()).toEqual([b, c]);

      deferred.respond(0, jsonResponse(500));
      await first;
      expect(transport.pending()).toEqual([a, b, c]);
    });

    it("retries requeued events on the next flush", async () => {
      const fetch = vi
        .fn<FetchFn>()
        .mockResolvedValueOnce(jsonResponse(500))
        .mockResolvedValueOnce(jsonResponse(202));
      const { transport } = createTransport(fetch);
      const event = fakeEvent();

      transport.enqueue(event);
      await transport.flush();
      await transport.flush();

      expect(fetch).toHaveBeenCalledTimes(2);
      expect(batchAt(fetch, 1)).toEqual([event]);
      expect(transport.size).toBe(0);
    });
  });

  describe("serialization", () => {
    it("drops an unserializable event on enqueue and still delivers the rest", async () => {
      const fetch = createMockFetch();
      const { transport, logger } = createTransport(fetch);
      const [first, second] = [fakeEvent(), fakeEvent()];
      const broken = fakeEvent({
        output: {
          toJSON() {
            throw new Error("boom");
          },
        },
      });

      transport.enqueue(first);
      transport.enqueue(broken);
      transport.enqueue(second);

      expect(transport.size).toBe(2);
      expect(logger.warn).toHaveBeenCalledWith(
        `[AGENTGUARD-1003] Dropped event ${broken.execution_id}: Error: boom`,
      );

      await expect(transport.flush()).resolves.toBeUndefined();
      expect(batchAt(fetch, 0)).toEqual([first, second]);
      expect(transport.size).toBe(0);
    });

    it("sends payloads as they were when enqueued", async () => {
      const fetch = createMockFetch();
      const { transport } = createTransport(fetch);
      const output = { answer: "original" };

      transport.enqueue(fakeEvent({ output }));
      output.answer = "changed";
      await transport.flush();

      expect(batchAt(fetch, 0)[0]?.output).toEqual({ answer: "original" });
    });
  });

  describe("maxBufferSize", () => {
    it("drops the oldest events beyond the cap", () => {
      const fetch = createMockFetch();
      const { transport, logger } = createTransport(fetch, { maxBufferSize: 2 });
      const [a, b, c] = [fakeEvent(), fakeEvent(), fakeEvent()];

      transport.enqueue(a);
      transport.enqueue(b);
      transport.enqueue(c);

      expect(transport.pending()).toEqual([b, c]);
      expect(logger.warn).toHaveBeenCalledWith("[AGENTGUARD-2002] Dropped 1 oldest events");
    });

    it("is unbounded by default", () => {
      const fetch = createMockFetch();
      const { transport, logger } = createTransport(fetch, { flushBatchSize: 10_000 });

      for (let i = 0; i < 500; i++) transport.enqueue(fakeEvent());

      expect(transport.size).toBe(500);
      expect(logger.warn).not.toHaveBeenCalled();
    });
  });

  describe("close", () => {
    it("flushes remaining events", async () => {
      const fetch = createMockFetch();
      const { transport } = createTransport(fetch);
      const event = fakeEvent();

      transport.enqueue(event);
      await transport.close();

      expect(batchAt(fetch, 0)).toEqual([event]);
      expect(transport.size).toBe(0);
    });

    it("is idempotent", async () => {
      const fetch = createMockFetch();
      const { transport } = createTransport(fetch);
      transport.enqueue(fakeEvent());

      const first = transport.close();
      const second = transport.close();
      expect(second).toBe(first);
      await first;
      await transport.close();

      expect(fetch).toHaveBeenCalledOnce();
    });

    it("warns about events that could not be delivered", async () => {
      const fetch = createMockFetch(500);
      const { transport, logger } = createTransport(fetch);

      transport.enqueue(fakeEvent());
      await transport.close();

      expect(transport.size).toBe(1);
      expect(logger.warn).toHaveBeenLastCalledWith(
        "[AGENTGUARD-2004] Closing with 1 undelivered events",
      );
    });

    it("drops events enqueued after close", async () => {
      const fetch = createMockFetch();
      const { transport, logger } = createTransport(fetch);
      await transport.close();

      const late = fakeEvent();
      transport.enqueue(late);
      await transport.flush();

      expect(transport.size).toBe(0);
      expect(fetch).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith(
        `[AGENTGUARD-2003] Transport is closed — dropped event ${late.execution_id}`,
      );
    });

    it("waits for an in-flight auto-flush before the final flush", async () => {
      const deferred = createDeferredFetch();
      const { transport, logger } = createTransport(deferred.fetch, { flushBatchSize: 2 });
      const [a, b, c] = [fakeEvent(), fakeEvent(), fakeEvent()];

      transport.enqueue(a);
      transport.enqueue(b);
      transport.enqueue(c);
      const closing = transport.close();
      expect(deferred.fetch).toHaveBeenCalledOnce();

      deferred.respond(0, jsonResponse(202));
      await vi.waitFor(() => {
        expect(deferred.fetch).toHaveBeenCalledTimes(2);
      });
      deferred.respond(1, jsonResponse(202));
      await closing;

      expect(batchAt(deferred.fetch, 0)).toEqual([a, b]);
      expect(batchAt(deferred.fetch, 1)).toEqual([c]);
      expect(transport.size).toBe(0);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it("retries an auto-flush that fails while closing", async () => {
      const deferred = createDeferredFetch();
      const { transport, logger } = createTransport(deferred.fetch, { flushBatchSize: 2 });
      const [a, b, c] = [fakeEvent(), fakeEvent(), fakeEvent()];

      transport.enqueue(a);
      transport.enqueue(b);
      transport.enqueue(c);
      const closing = transport.close();

      deferred.respond(0, jsonResponse(500));
      await vi.waitFor(() => {
        expect(deferred.fetch).toHaveBeenCalledTimes(2);
      });
      deferred.respond(1, jsonResponse(202));
      await closing;

      expect(batchAt(deferred.fetch, 1)).toEqual([a, b, c]);
      expect(transport.size).toBe(0);
      expect(logger.warn).toHaveBeenCalledOnce();
      expect(logger.warn).toHaveBeenCalledWith(
        "[AGENTGUARD-2000] Failed to flush 2 events (HTTP 500); returning to buffer for retry",
      );
    });

    it("stops the flush timer", async () => {
      vi.useFakeTimers();
      const fetch = createMockFetch();
      const { transport } = createTransport(fetch, { flushIntervalMs: 1_000 });
      transport.start();

      await transport.close();
      await vi.advanceTimersByTimeAsync(5_000);

      expect(vi.getTimerCount()).toBe(0);
      expect(fetch).not.toHaveBeenCalled();
    });
  });
});
