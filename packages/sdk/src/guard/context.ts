import { AsyncLocalStorage } from "node:async_hooks";
import type { TraceContext } from "./trace.js";

/** The trace whose body is currently running, per async call chain. */
export const traceStore = new AsyncLocalStorage<TraceContext>();

/** Run a function with `trace` as the active trace. */
export function runInTrace<T>(trace: TraceContext, fn: () => T): T {
  return traceStore.run(trace, fn);
}

/**
 * The active trace, or undefined outside a guarded execution.
 *
 * Lets agent code record steps without threading the trace through:
 * `currentTrace()?.step({ type: "tool_call", name: "search" })`.
 */
export function currentTrace(): TraceContext | undefined {
  return traceStore.getStore();
}
