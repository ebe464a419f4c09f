import crypto from "node:crypto";
import {
  MEXC_AUTH_HEADER,
  MEXC_DEFAULT_HEADERS,
  MEXC_NONCE_HEADER,
  MEXC_SIGN_HEADER,
  MEXC_SIGN_KEY_OFFSET
} from "./mexc.constants.js";
import type { MexcClock, MexcSdkOptions, MexcSignature } from "./mexc.types.js";

function md5Hex(value: string): string {
  return crypto.createHash("md5").update(value).digest("hex");
}

function sortEntries(params: Record<string, unknown>): Array<[string, string]> {
  return Object.entries(params)
    .filter(([, value]) => value !== undefined && value !== null)
    .map(([key, value]) => [key, String(value)] as [string, string])
    .sort((a, b) => a[0].localeCompare(b[0]));
}

export function buildQueryParameterString(params: Record<string, unknown>): string {
  return sortEntries(params)
    .map(([key, value]) => `${key}=${encodeURIComponent(value)}`)
    .join("&");
}

/**
 * Compact JSON in insertion order. The result is both the signed text and the
 * request body, so callers must not re-serialize the payload afterwards.
 */
export function serializeRequestBody(payload: unknown): string {
  if (typeof payload === "string") return payload;
  return JSON.stringify(payload) ?? "null";
}

export function signRequestBody(params: {
  token: string;
  timestampMs: string;
  body: string;
}): string {
  const key = md5Hex(`${params.token}${params.timestampMs}`).slice(MEXC_SIGN_KEY_OFFSET);
  return md5Hex(`${params.timestampMs}${params.body}${key}`);
}

/**
 * Web-token request signature. The md5 construction is what the futures web
 * gateway verifies and has to match it byte for byte.
 */
export function mexcCrypto(token: string, payload: unknown, now: MexcClock = Date.now): MexcSignature {
  const time = String(Math.trunc(now()));
  const sign = signRequestBody({
    token,
    timestampMs: time,
    body: serializeRequestBody(payload)
  });
  return { time, sign };
}

export function generateHeaders(
  options: MexcSdkOptions,
  params: {
    includeAuth?: boolean;
    requestBody?: unknown;
    now?: MexcClock;
  } = {}
): Record<string, string> {
  const headers: Record<string, string> = { ...MEXC_DEFAULT_HEADERS };

  if (options.userAgent) {
    headers["user-agent"] = options.userAgent;
  }

  Object.assign(headers, options.customHeaders ?? {});

  if (params.includeAuth ?? true) {
    headers[MEXC_AUTH_HEADER] = options.authToken;

    if (params.requestBody !== undefined) {
      const signature = mexcCrypto(options.authToken, params.requestBody, params.now);
      headers[MEXC_NONCE_HEADER] = signature.time;
      headers[MEXC_SIGN_HEADER] = signature.sign;
    }
  }

  return headers;
}
