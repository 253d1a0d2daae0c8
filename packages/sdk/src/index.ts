export { AgentGuard } from "./guard/guard.js";
export { Session, type SessionOptions, type SessionTraceOptions } from "./guard/session.js";
export { TraceContext } from "./guard/trace.js";
export { currentTrace } from "./guard/context.js";
export { AgentGuardBlockError } from "./core/errors.js";
export { SDK_VERSION, resolveConfig } from "./core/config.js";
export { BatchTransport, type BatchTransportOptions } from "./transport/batch.js";
export { DirectTransport, type DirectTransportOptions } from "./transport/direct.js";
export { API_KEY_HEADER } from "./transport/http.js";
export type { IngestTransport, VerifyOutcome, VerifyTransport } from "./transport/types.js";
export type {
  AgentGuardOptions,
  GuardResult,
  Logger,
  RunOptions,
  StepInput,
  TraceOptions,
  WatchOptions,
} from "./core/types.js";
export { AgentGuardError, ErrorCode, isAgentGuardError } from "@agentguard/shared/errors";
export type { ExecutionEvent, GuardAction, StepRecord, Verdict } from "@agentguard/shared/events";
export type { GuardConfig, GuardMode } from "@agentguard/shared/validation";
