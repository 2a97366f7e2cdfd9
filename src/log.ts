// log.ts — Prefixed stderr logging
// Lines look like "[steadyhand:controller] message". Level comes from the
// log-level config key or the STEADYHAND_LOG environment variable.

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function envLevel(): LogLevel {
  const raw = process.env.STEADYHAND_LOG?.trim().toLowerCase() ?? "";
  return isLogLevel(raw) ? raw : "warn";
}

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + "\n");
};

export function createLogger(
  scope = "steadyhand",
  level: LogLevel = envLevel(),
  sink: LogSink = stderrSink,
): Logger {
  const threshold = LEVEL_ORDER[level];
  const emit = (lvl: Exclude<LogLevel, "silent">, message: string) => {
    if (LEVEL_ORDER[lvl] < threshold) return;
    const tag = lvl === "info" || lvl === "debug" ? "" : ` ${lvl.toUpperCase()}`;
    sink(`[${scope}]${tag} ${message}`);
  };
  return {
    level,
    debug: (m) => emit("debug", m),
    info: (m) => emit("info", m),
    warn: (m) => emit("warn", m),
    error: (m) => emit("error", m),
    child: (sub) => createLogger(`${scope}:${sub}`, level, sink),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger("steadyhand", "silent");
