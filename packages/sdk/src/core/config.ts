import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { AgentGuardError, ErrorCode } from "@agentguard/shared/errors";
import { type GuardConfig, GuardConfigSchema } from "@agentguard/shared/validation";
import type { z } from "zod";
import type { AgentGuardOptions } from "./types.js";

export const SDK_VERSION = "0.1.0";

const CONFIG_FILENAME = ".agentguardrc.json";

/** Shape of `.agentguardrc.json`; unknown keys are ignored. */
const ConfigFile = GuardConfigSchema.partial();
type ConfigFile = z.infer<typeof ConfigFile>;

/**
 * Walk up directories from `startDir` looking for `.agentguardrc.json`.
 * Returns the parsed config or null.
 */
function findConfigFile(startDir: string): ConfigFile | null {
  let dir = startDir;
  for (;;) {
    const path = join(dir, CONFIG_FILENAME);
    if (existsSync(path)) return readConfigFile(path);

    const parent = dirname(dir);
    if (parent === dir) break; // reached filesystem root
    dir = parent;
  }
  return null;
}

/** Unreadable or malformed files count as absent. */
function readConfigFile(path: string): ConfigFile | null {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch {
    return null;
  }
  const parsed = ConfigFile.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/** Drop keys whose value is undefined so spreads don't clobber lower layers. */
function defined(layer: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(layer)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/**
 * Resolve SDK configuration with priority:
 * 1. Code options passed to `new AgentGuard()`
 * 2. Environment variables (`AGENTGUARD_API_KEY`, `AGENTGUARD_API_URL`, `AGENTGUARD_MODE`)
 * 3. `.agentguardrc.json` config file (walked up from cwd)
 *
 * Returns null if no API key is found (triggers no-op mode). Throws
 * `AgentGuardError` (`SDK.CONFIG_INVALID`) when the merged values fail validation.
 */
export function resolveConfig(options: AgentGuardOptions = {}): GuardConfig | null {
  const fileConfig = findConfigFile(process.cwd());

  const fromCode = defined({
    apiKey: options.apiKey,
    apiUrl: options.apiUrl,
    mode: options.mode,
    flushIntervalMs: options.flushIntervalMs,
    flushBatchSize: options.flushBatchSize,
    timeoutMs: options.timeoutMs,
    maxBufferSize: options.maxBufferSize,
    raiseOnBlock: options.raiseOnBlock,
  });

  const fromEnv = defined({
    apiKey: process.env.AGENTGUARD_API_KEY || undefined,
    apiUrl: process.env.AGENTGUARD_API_URL || undefined,
    mode: process.env.AGENTGUARD_MODE || undefined,
  });

  const merged: Record<string, unknown> = {
    ...(fileConfig ? defined(fileConfig) : {}),
    ...fromEnv,
    ...fromCode,
  };

  if (!merged.apiKey) return null;

  const parsed = GuardConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new AgentGuardError(
      ErrorCode.SDK.CONFIG_INVALID,
      `Invalid AgentGuard configuration — ${issues}`,
      null,
      { issues: parsed.error.issues },
    );
  }
  return parsed.data;
}
