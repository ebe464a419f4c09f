export const MEXC_LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type MexcLogLevel = (typeof MEXC_LOG_LEVELS)[number];

type EmitLevel = Exclude<MexcLogLevel, "silent">;

const LEVEL_WEIGHT: Record<MexcLogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4
};

export type MexcLogSink = (line: string) => void;

export type MexcLogger = {
  readonly level: MexcLogLevel;
  isDebugEnabled(): boolean;
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
};

export function parseLogLevel(value: string): MexcLogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  return MEXC_LOG_LEVELS.find((level) => level === normalized);
}

export function createMexcLogger(
  level: MexcLogLevel = "warn",
  sink: MexcLogSink = (line) => console.log(line)
): MexcLogger {
  const threshold = LEVEL_WEIGHT[level];

  function log(entryLevel: EmitLevel, msg: string, meta?: Record<string, unknown>) {
    if (LEVEL_WEIGHT[entryLevel] > threshold) return;
    const entry = {
      level: entryLevel,
      msg,
      time: Date.now(),
      ...(meta ?? {})
    };
    // JSON line for log collectors
    sink(JSON.stringify(entry));
  }

  return {
    level,
    isDebugEnabled: () => threshold >= LEVEL_WEIGHT.debug,
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta)
  };
}
