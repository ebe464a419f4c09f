import {
  MexcHttpStatusError,
  formatErrorForLogging,
  parseTransportError,
  toMexcError
} from "./mexc.errors.js";
import type { MexcLogger } from "./mexc.logger.js";
import { buildQueryParameterString, generateHeaders, serializeRequestBody } from "./mexc.signing.js";
import type {
  MexcClock,
  MexcFetch,
  MexcLogEntry,
  MexcRequestParams,
  MexcSdkOptions
} from "./mexc.types.js";

function nowIso() {
  return new Date().toISOString();
}

function asRecord(value: unknown): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}

function headersToRecord(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, key) => {
    out[key.toLowerCase()] = value;
  });
  return out;
}

// From 16 digits on an integer literal can lie beyond 2^53 and lose digits in JSON.parse.
const LARGE_INTEGER_DIGITS = 16;

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

/**
 * Wraps long integer literals of a JSON text in quotes so that order ids
 * reach the schemas with every digit intact. String contents and decimals
 * are left alone.
 */
export function quoteLargeIntegers(text: string): string {
  let out = "";
  let copied = 0;
  let inString = false;

  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    if (inString) {
      if (ch === "\\") i += 1;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
      continue;
    }
    if (ch !== "-" && !isDigit(ch)) continue;

    const start = ch === "-" ? i + 1 : i;
    let end = start;
    while (isDigit(text[end])) end += 1;
    const next = text[end];
    if (end - start >= LARGE_INTEGER_DIGITS && next !== "." && next !== "e" && next !== "E") {
      out += `${text.slice(copied, i)}"${text.slice(i, end)}"`;
      copied = end;
    }
    // skip the rest of the number, including any fraction or exponent
    while (end < text.length && /[0-9.eE+-]/.test(text[end] ?? "")) end += 1;
    i = end - 1;
  }

  return copied === 0 ? text : out + text.slice(copied);
}

export type MexcRestClientOptions = {
  sdk: MexcSdkOptions;
  baseUrl: string;
  timeoutMs: number;
  logger: MexcLogger;
  fetch?: MexcFetch;
  now?: MexcClock;
  log?: (entry: MexcLogEntry) => void;
};

export class MexcRestClient {
  readonly baseUrl: string;
  readonly timeoutMs: number;

  private readonly fetchImpl: MexcFetch;
  private readonly logger: MexcLogger;

  constructor(private readonly options: MexcRestClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  private log(entry: Omit<MexcLogEntry, "at">) {
    if (!this.options.log) return;
    this.options.log({
      at: nowIso(),
      ...entry
    });
  }

  /**
   * Sends one request and returns the parsed JSON reply. Every failure leaves
   * as a classified `MexcFuturesError`.
   */
  async request(params: MexcRequestParams): Promise<unknown> {
    const start = Date.now();
    const requestId = `${Date.now()}-${Math.random().toString(16).slice(2, 8)}`;

    const queryString = buildQueryParameterString(params.query ?? {});
    const url = `${this.baseUrl}${params.endpoint}${queryString ? `?${queryString}` : ""}`;

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      // one serialization feeds both the signature and the wire
      const body = params.body === undefined ? undefined : serializeRequestBody(params.body);
      const headers = generateHeaders(this.options.sdk, {
        includeAuth: params.requireAuth,
        requestBody: body,
        now: this.options.now
      });

      this.logger.debug(`${params.method} ${url}`, { requestId });
      if (body !== undefined) {
        this.logger.debug("Request body", { requestId, body });
      }

      const res = await this.fetchImpl(url, {
        method: params.method,
        headers,
        body,
        signal: controller.signal
      });
      const text = await res.text();
      this.logger.debug(`${res.status} ${res.statusText}`, { requestId });

      if (!res.ok) {
        throw new MexcHttpStatusError(res.status, res.statusText, headersToRecord(res.headers), text);
      }

      let json: unknown;
      try {
        json = text ? JSON.parse(quoteLargeIntegers(text)) : {};
      } catch (error) {
        throw toMexcError({
          status: res.status,
          bodyText: text,
          endpoint: params.endpoint,
          method: params.method,
          fallbackMessage: `Malformed JSON response (${String(error)})`,
          cause: error
        });
      }

      const obj = asRecord(json);
      if (obj.success === false) {
        throw toMexcError({
          status: res.status,
          bodyText: text,
          headers: headersToRecord(res.headers),
          endpoint: params.endpoint,
          method: params.method,
          fallbackMessage: "Request was not successful"
        });
      }

      this.log({
        endpoint: params.endpoint,
        method: params.method,
        durationMs: Date.now() - start,
        status: res.status,
        mexcCode: typeof obj.code === "number" ? obj.code : undefined,
        ok: true,
        requestId
      });
      return json;
    } catch (error) {
      const mexcError = parseTransportError(error, params.endpoint, params.method);
      this.logger.error(mexcError.getUserFriendlyMessage(), { requestId, endpoint: params.endpoint });
      if (this.logger.isDebugEnabled()) {
        this.logger.debug("Detailed error info", { requestId, detail: formatErrorForLogging(mexcError) });
      }
      this.log({
        endpoint: params.endpoint,
        method: params.method,
        durationMs: Date.now() - start,
        status: mexcError.statusCode,
        mexcCode: mexcError.code,
        ok: false,
        message: mexcError.message,
        requestId
      });
      throw mexcError;
    } finally {
      clearTimeout(timeout);
    }
  }

  requestPublic(method: MexcRequestParams["method"], endpoint: string, query?: Record<string, unknown>) {
    return this.request({ method, endpoint, query, requireAuth: false });
  }

  requestPrivate(params: Omit<MexcRequestParams, "requireAuth">) {
    return this.request({ ...params, requireAuth: true });
  }
}
