import { z } from "zod";

// ---------------------------------------------------------------------------
// Identifiers
// ---------------------------------------------------------------------------

/** UUID v4 string. */
export const Uuid = z.string().uuid();

/** Agent identifier: free-form but non-empty, up to 256 chars. */
export const AgentId = z.string().trim().min(1).max(256);

/** Session ID: `ses_` prefix + URL-safe alphabet. */
export const SessionId = z.string().regex(/^ses_[A-Za-z0-9_-]+$/, "Invalid session ID");

// ---------------------------------------------------------------------------
// Guard configuration
// ---------------------------------------------------------------------------

export const GuardMode = z.enum(["async", "sync"]);
export type GuardMode = z.infer<typeof GuardMode>;

export const DEFAULT_API_URL = "https://api.agentguard.dev";

/** Base URL of the backend; trailing slashes are stripped. */
export const ApiUrl = z
  .string()
  .url()
  .transform((url) => url.replace(/\/+$/, ""));

export const GuardConfigSchema = z.object({
  apiKey: z.string().min(1, "API key must not be empty"),
  apiUrl: ApiUrl.default(DEFAULT_API_URL),
  mode: GuardMode.default("async"),
  flushIntervalMs: z.number().int().positive().default(1_000),
  flushBatchSize: z.number().int().positive().default(50),
  timeoutMs: z.number().int().positive().default(2_000),
  maxBufferSize: z.number().int().positive().optional(),
  raiseOnBlock: z.boolean().default(true),
});

/** Validated configuration with defaults applied. */
export type GuardConfig = z.output<typeof GuardConfigSchema>;

/** Raw configuration before validation. */
export type GuardConfigInput = z.input<typeof GuardConfigSchema>;
