/**
 * Error catalog for the AgentGuard SDK.
 *
 * Codes are grouped by area and never reused:
 * - `SDK` (1000–1999): configuration and guard client lifecycle
 * - `TRANSPORT` (2000–2999): batch ingestion delivery
 * - `VERIFY` (3000–3999): synchronous verification
 *
 * Every warning or error the SDK logs is prefixed with `[<code>]`.
 */
export const ErrorCode = {
  SDK: {
    NO_API_KEY: "AGENTGUARD-1000",
    CONFIG_INVALID: "AGENTGUARD-1001",
    FAILED_EXECUTION_NOT_VERIFIED: "AGENTGUARD-1002",
    EVENT_NOT_SERIALIZABLE: "AGENTGUARD-1003",
  },
  TRANSPORT: {
    FLUSH_FAILED_REQUEUED: "AGENTGUARD-2000",
    AUTO_FLUSH_SKIPPED: "AGENTGUARD-2001",
    BUFFER_OVERFLOW: "AGENTGUARD-2002",
    EVENT_AFTER_CLOSE: "AGENTGUARD-2003",
    CLOSE_FLUSH_INCOMPLETE: "AGENTGUARD-2004",
    CLIENT_CLOSED: "AGENTGUARD-2005",
    REQUEST_TIMEOUT: "AGENTGUARD-2006",
  },
  VERIFY: {
    REQUEST_FAILED: "AGENTGUARD-3000",
    INVALID_RESPONSE: "AGENTGUARD-3001",
    PASS_THROUGH: "AGENTGUARD-3002",
    OUTPUT_BLOCKED: "AGENTGUARD-3003",
  },
} as const;

type Catalog = typeof ErrorCode;

/** Union of every code string in the catalog. */
export type ErrorCodeValue = {
  [G in keyof Catalog]: Catalog[G][keyof Catalog[G]];
}[keyof Catalog];
