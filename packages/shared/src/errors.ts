export { ErrorCode, type ErrorCodeValue } from "./error-codes.js";
import type { ErrorCodeValue } from "./error-codes.js";

/**
 * Base error class for all AgentGuard SDK errors.
 *
 * `status` carries the HTTP status when the error came from a backend
 * response, and is `null` for local failures (network, timeout, config).
 *
 * @example
 * import { AgentGuardError, ErrorCode } from "@agentguard/shared/errors";
 * throw new AgentGuardError(ErrorCode.SDK.CONFIG_INVALID, "mode must be async or sync");
 * throw new AgentGuardError(ErrorCode.VERIFY.REQUEST_FAILED, "HTTP 503", 503, { url });
 */
export class AgentGuardError extends Error {
  constructor(
    public readonly code: ErrorCodeValue,
    message: string,
    public readonly status: number | null = null,
    public readonly metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "AgentGuardError";
  }

  /**
   * Serialize the error into a plain object for logs and telemetry.
   *
   * @returns `{ code, message, status, metadata? }`
   */
  toJSON() {
    return {
      code: this.code,
      message: this.message,
      status: this.status,
      ...(this.metadata ? { metadata: this.metadata } : {}),
    };
  }
}

/**
 * Check whether an unknown caught value is an {@link AgentGuardError}.
 */
export function isAgentGuardError(err: unknown): err is AgentGuardError {
  return err instanceof AgentGuardError;
}

/** One-line description of a caught value, for log lines and error messages. */
export function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
