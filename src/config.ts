// config.ts — Engine configuration
// Config file: $STEADYHAND_CONFIG or /tmp/steadyhand-config.json
// Env overrides: STEADYHAND_<KEY> (e.g. STEADYHAND_CHANGE_THRESHOLD=0.01)

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { z } from "zod";
import { createLogger, isLogLevel, type Logger } from "./log.js";

export const DEFAULT_CONFIG_PATH = "/tmp/steadyhand-config.json";

const positiveMs = z.number().int().positive();

const configSchema = z.object({
  /** Fraction of thumbnail cells that must differ to count as a change */
  "change-threshold": z.number().min(0).max(1),
  /** Per-cell grayscale delta (0-255) below which a cell is considered unchanged */
  "pixel-delta": z.number().int().min(0).max(255),
  "grid-size": z.number().int().min(1).max(256),
  "history-capacity": z.number().int().min(1).max(10_000),
  "loop-window": z.number().int().min(2),
  // consecutive looping actions before the controller forces a strategy change
  "loop-recovery-threshold": z.number().int().min(1),
  "step-timeout-ms": positiveMs,
  "step-retries": z.number().int().min(0).max(10),
  "structural-timeout-ms": positiveMs,
  "perception-timeout-ms": positiveMs,
  "retry-backoff-ms": z.number().int().min(0),
  "retry-backoff-factor": z.number().min(1),
  "retry-max-backoff-ms": z.number().int().min(0),
  "plan-deadline-ms": positiveMs,
  "min-confidence": z.number().min(0).max(1),
  "dismiss-overlays": z.boolean(),
  "log-level": z.enum(["debug", "info", "warn", "error", "silent"]),
});

const partialConfigSchema = configSchema.partial().strict();

export type EngineConfig = z.infer<typeof configSchema>;
export type ConfigKey = keyof EngineConfig;
export type ConfigValue = EngineConfig[ConfigKey];

const DEFAULTS: EngineConfig = {
  "change-threshold": 0.001,
  "pixel-delta": 8,
  "grid-size": 32,
  "history-capacity": 20,
  "loop-window": 3,
  "loop-recovery-threshold": 2,
  "step-timeout-ms": 5000,
  "step-retries": 2,
  "structural-timeout-ms": 2000,
  "perception-timeout-ms": 15000,
  "retry-backoff-ms": 250,
  "retry-backoff-factor": 2,
  "retry-max-backoff-ms": 4000,
  "plan-deadline-ms": 120000,
  "min-confidence": 0.8,
  "dismiss-overlays": true,
  "log-level": "warn",
};

const VALID_KEYS = new Set<string>(Object.keys(DEFAULTS));

export function isValidConfigKey(key: string): key is ConfigKey {
  return VALID_KEYS.has(key);
}

export function getDefaults(): EngineConfig {
  return { ...DEFAULTS };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

/** Merge a partial config over the defaults. Throws on unknown keys or out-of-range values. */
export function resolveConfig(partial: Partial<EngineConfig> = {}): EngineConfig {
  const parsed = configSchema.strict().safeParse({ ...DEFAULTS, ...partial });
  if (!parsed.success) {
    throw new Error(`Invalid config: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function coerceValue(key: ConfigKey, raw: string): ConfigValue {
  if (key === "log-level") {
    const level = raw.trim().toLowerCase();
    if (!isLogLevel(level)) {
      throw new Error(`Value for "log-level" must be debug|info|warn|error|silent, got "${raw}"`);
    }
    return level;
  }
  const defaultVal = DEFAULTS[key];
  if (typeof defaultVal === "boolean") {
    if (raw === "true" || raw === "1") return true;
    if (raw === "false" || raw === "0") return false;
    throw new Error(`Value for "${key}" must be true/false, got "${raw}"`);
  }
  const n = Number(raw);
  if (raw.trim() === "" || Number.isNaN(n)) {
    throw new Error(`Value for "${key}" must be a number, got "${raw}"`);
  }
  return n;
}

export function envVarName(key: ConfigKey): string {
  return `STEADYHAND_${key.toUpperCase().replace(/-/g, "_")}`;
}

/** Collect STEADYHAND_<KEY> overrides. Values that do not coerce throw. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<EngineConfig> {
  const raw: Record<string, ConfigValue> = {};
  for (const key of VALID_KEYS) {
    if (!isValidConfigKey(key)) continue;
    const value = env[envVarName(key)];
    if (value === undefined) continue;
    raw[key] = coerceValue(key, value);
  }
  const parsed = partialConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid environment config: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Read the JSON config file and merge it over the defaults.
 * Missing file → defaults. Unreadable or invalid file → defaults plus a warning.
 */
export async function readConfig(
  path: string = process.env.STEADYHAND_CONFIG ?? DEFAULT_CONFIG_PATH,
  logger: Logger = createLogger("steadyhand:config"),
): Promise<EngineConfig> {
  if (!existsSync(path)) return { ...DEFAULTS };
  try {
    const raw = await readFile(path, "utf-8");
    const parsed = partialConfigSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      logger.warn(`Ignoring ${path}: ${formatIssues(parsed.error)}`);
      return { ...DEFAULTS };
    }
    return { ...DEFAULTS, ...parsed.data };
  } catch (err) {
    logger.warn(`Ignoring ${path}: ${err instanceof Error ? err.message : String(err)}`);
    return { ...DEFAULTS };
  }
}

/** File, then environment, then explicit overrides. */
export async function loadConfig(
  overrides: Partial<EngineConfig> = {},
  opts: { path?: string; env?: NodeJS.ProcessEnv; logger?: Logger } = {},
): Promise<EngineConfig> {
  const fromFile = await readConfig(opts.path, opts.logger);
  return resolveConfig({ ...fromFile, ...configFromEnv(opts.env), ...overrides });
}
