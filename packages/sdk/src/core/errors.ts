import { AgentGuardError, ErrorCode } from "@agentguard/shared/errors";
import type { GuardResult } from "./types.js";

/** Thrown when a verdict blocks an execution and `raiseOnBlock` is on. */
export class AgentGuardBlockError extends AgentGuardError {
  constructor(public readonly result: GuardResult) {
    super(
      ErrorCode.VERIFY.OUTPUT_BLOCKED,
      `Execution ${result.executionId} blocked by verification (confidence ${result.confidence ?? "n/a"})`,
      null,
      { executionId: result.executionId, confidence: result.confidence, checks: result.checks },
    );
    this.name = "AgentGuardBlockError";
  }
}
