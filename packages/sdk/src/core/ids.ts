import { randomUUID } from "node:crypto";
import { nanoid } from "nanoid";

export function generateSessionId(): string {
  return `ses_${nanoid(21)}`;
}

/** Execution IDs are UUIDs so the backend can key verdicts on them. */
export function generateExecutionId(): string {
  return randomUUID();
}
