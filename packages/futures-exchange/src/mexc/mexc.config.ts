import { z } from "zod";
import { MEXC_DEFAULT_TIMEOUT_MS, MEXC_FUTURES_API_BASE_URL } from "./mexc.constants.js";
import { parseRequest } from "./mexc.schemas.js";
import { parseLogLevel, type MexcLogSink } from "./mexc.logger.js";
import type { MexcClock, MexcFetch, MexcLogEntry } from "./mexc.types.js";

export const mexcFuturesConfigSchema = z.object({
  // WEB token copied from the browser session (starts with "WEB")
  authToken: z.string().trim().min(1, "authToken is required"),
  baseUrl: z
    .string()
    .url()
    .default(MEXC_FUTURES_API_BASE_URL)
    .transform((value) => value.replace(/\/+$/, "")),
  timeoutMs: z.number().int().positive().default(MEXC_DEFAULT_TIMEOUT_MS),
  userAgent: z.string().min(1).optional(),
  customHeaders: z.record(z.string()).default({}),
  logLevel: z
    .string()
    .default("warn")
    .transform((value, ctx) => {
      const level = parseLogLevel(value);
      if (!level) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown log level '${value}'` });
        return z.NEVER;
      }
      return level;
    })
});

/** Plain-data settings; safe to hand to a worker thread. */
export type MexcFuturesSettings = z.input<typeof mexcFuturesConfigSchema>;

export type MexcFuturesResolvedSettings = z.output<typeof mexcFuturesConfigSchema>;

export type MexcFuturesClientConfig = MexcFuturesSettings & {
  fetch?: MexcFetch;
  now?: MexcClock;
  log?: (entry: MexcLogEntry) => void;
  logSink?: MexcLogSink;
};

export function resolveMexcFuturesSettings(settings: MexcFuturesSettings): MexcFuturesResolvedSettings {
  return parseRequest(mexcFuturesConfigSchema, settings, "Invalid client configuration");
}

function envValue(env: NodeJS.ProcessEnv, ...names: string[]): string | undefined {
  for (const name of names) {
    const raw = env[name]?.trim();
    if (raw) return raw;
  }
  return undefined;
}

export function loadMexcFuturesConfigFromEnv(env: NodeJS.ProcessEnv = process.env): MexcFuturesSettings {
  const timeout = envValue(env, "MEXC_TIMEOUT_MS");
  return {
    authToken: envValue(env, "MEXC_WEB_TOKEN", "WEB_TOKEN") ?? "",
    baseUrl: envValue(env, "MEXC_FUTURES_BASE_URL"),
    timeoutMs: timeout === undefined ? undefined : Number(timeout),
    userAgent: envValue(env, "MEXC_USER_AGENT"),
    logLevel: envValue(env, "MEXC_LOG_LEVEL")
  };
}
