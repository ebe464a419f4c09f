import { MEXC_SIGNATURE_ERROR_CODE } from "./mexc.constants.js";

export type MexcErrorKind =
  | "authentication"
  | "api"
  | "network"
  | "validation"
  | "signature"
  | "rate_limit"
  | "unknown";

export type MexcErrorCode = string | number;

export type MexcErrorDetails = {
  name: string;
  kind: MexcErrorKind;
  message: string;
  code?: MexcErrorCode;
  statusCode?: number;
  timestamp: string;
  endpoint?: string;
  method?: string;
  responseData?: unknown;
  field?: string;
  retryAfter?: number;
};

type BaseOptions = {
  code?: MexcErrorCode;
  statusCode?: number;
  cause?: unknown;
};

export abstract class MexcFuturesError extends Error {
  abstract readonly kind: MexcErrorKind;
  readonly code?: MexcErrorCode;
  readonly statusCode?: number;
  readonly timestamp = new Date();

  constructor(message: string, options: BaseOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "MexcFuturesError";
    this.code = options.code;
    this.statusCode = options.statusCode;
  }

  getUserFriendlyMessage(): string {
    return this.message;
  }

  getDetails(): MexcErrorDetails {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      timestamp: this.timestamp.toISOString()
    };
  }
}

export class MexcAuthenticationError extends MexcFuturesError {
  readonly kind = "authentication" as const;

  constructor(message?: string, cause?: unknown) {
    super(message || "Authentication failed. Please check your authorization token.", {
      code: "AUTH_ERROR",
      statusCode: 401,
      cause
    });
    this.name = "MexcAuthenticationError";
  }

  override getUserFriendlyMessage(): string {
    return (
      `Authentication failed: ${this.message}. Your authorization token may be expired or invalid. ` +
      "Please update your WEB token from browser Developer Tools."
    );
  }
}

export class MexcApiError extends MexcFuturesError {
  readonly kind = "api" as const;
  readonly endpoint?: string;
  readonly method?: string;
  readonly responseData?: unknown;

  constructor(
    message: string,
    options: {
      code: MexcErrorCode;
      statusCode: number;
      endpoint?: string;
      method?: string;
      responseData?: unknown;
      cause?: unknown;
    }
  ) {
    super(message, options);
    this.name = "MexcApiError";
    this.endpoint = options.endpoint;
    this.method = options.method;
    this.responseData = options.responseData;
  }

  override getUserFriendlyMessage(): string {
    const status = this.statusCode;
    const message = this.message;
    switch (status) {
      case 400:
        return `Bad Request: ${message}. Please check your request parameters.`;
      case 401:
        return `Unauthorized: ${message}. Your authorization token may be expired.`;
      case 403:
        return `Forbidden: ${message}. You don't have permission for this operation.`;
      case 404:
        return `Not Found: ${message}. The requested resource was not found.`;
      case 429:
        return `Rate Limit Exceeded: ${message}. Please reduce request frequency.`;
      case 500:
        return `Server Error: ${message}. MEXC server is experiencing issues.`;
      case 502:
      case 503:
      case 504:
        return `Service Unavailable: ${message}. MEXC service is temporarily unavailable.`;
      default:
        return `API Error (${status}): ${message}`;
    }
  }

  override getDetails(): MexcErrorDetails {
    return {
      ...super.getDetails(),
      endpoint: this.endpoint,
      method: this.method,
      responseData: this.responseData
    };
  }
}

export class MexcNetworkError extends MexcFuturesError {
  readonly kind = "network" as const;

  constructor(message: string, cause?: unknown) {
    super(message, { code: "NETWORK_ERROR", cause });
    this.name = "MexcNetworkError";
  }

  override getUserFriendlyMessage(): string {
    const normalized = this.message.toLowerCase();
    if (normalized.includes("timeout")) {
      return "Request timeout. Please check your internet connection and try again.";
    }
    if (["connection", "refused", "unreachable"].some((hint) => normalized.includes(hint))) {
      return "Connection failed. Please check your internet connection.";
    }
    return `Network error: ${this.message}`;
  }
}

export class MexcValidationError extends MexcFuturesError {
  readonly kind = "validation" as const;

  constructor(
    message: string,
    readonly field?: string,
    cause?: unknown
  ) {
    super(message, { code: "VALIDATION_ERROR", cause });
    this.name = "MexcValidationError";
  }

  override getUserFriendlyMessage(): string {
    if (this.field) return `Validation error for field '${this.field}': ${this.message}`;
    return `Validation error: ${this.message}`;
  }

  override getDetails(): MexcErrorDetails {
    return { ...super.getDetails(), field: this.field };
  }
}

export class MexcSignatureError extends MexcFuturesError {
  readonly kind = "signature" as const;

  constructor(message?: string, cause?: unknown) {
    super(message || "Request signature verification failed", {
      code: "SIGNATURE_ERROR",
      statusCode: MEXC_SIGNATURE_ERROR_CODE,
      cause
    });
    this.name = "MexcSignatureError";
  }

  override getUserFriendlyMessage(): string {
    return (
      "Signature verification failed. This usually means your authorization token " +
      "is invalid or expired. Please get a fresh WEB token from your browser."
    );
  }
}

export class MexcRateLimitError extends MexcFuturesError {
  readonly kind = "rate_limit" as const;

  constructor(
    message: string,
    readonly retryAfter?: number,
    cause?: unknown
  ) {
    super(message, { code: "RATE_LIMIT", statusCode: 429, cause });
    this.name = "MexcRateLimitError";
  }

  override getUserFriendlyMessage(): string {
    const retry = this.retryAfter ? ` Please retry after ${this.retryAfter} seconds.` : "";
    return `Rate limit exceeded: ${this.message}.${retry}`;
  }

  override getDetails(): MexcErrorDetails {
    return { ...super.getDetails(), retryAfter: this.retryAfter };
  }
}

export class MexcUnknownError extends MexcFuturesError {
  readonly kind = "unknown" as const;

  constructor(message: string, cause?: unknown) {
    super(message, { code: "UNKNOWN_ERROR", cause });
    this.name = "MexcUnknownError";
  }
}

export type MexcDomainError =
  | MexcAuthenticationError
  | MexcApiError
  | MexcNetworkError
  | MexcValidationError
  | MexcSignatureError
  | MexcRateLimitError
  | MexcUnknownError;

export function isDomainError(error: unknown): error is MexcDomainError {
  return (
    error instanceof MexcAuthenticationError ||
    error instanceof MexcApiError ||
    error instanceof MexcNetworkError ||
    error instanceof MexcValidationError ||
    error instanceof MexcSignatureError ||
    error instanceof MexcRateLimitError ||
    error instanceof MexcUnknownError
  );
}

/** Raised by the transport for any non-2xx reply; never surfaced to callers. */
export class MexcHttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly statusText: string,
    readonly headers: Record<string, string>,
    readonly bodyText: string
  ) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ""}`);
    this.name = "MexcHttpStatusError";
  }
}

const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
  "UND_ERR_SOCKET"
]);

const TIMEOUT_ERROR_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT"
]);

function asRecord(value: unknown): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}

function errorCodes(error: unknown): string[] {
  const codes: string[] = [];
  let current: unknown = error;
  for (let depth = 0; depth < 3 && current instanceof Error; depth += 1) {
    const code = asRecord(current).code;
    if (typeof code === "string") codes.push(code);
    current = current.cause;
  }
  return codes;
}

function isTimeoutError(error: unknown): boolean {
  if (error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")) {
    return true;
  }
  return errorCodes(error).some((code) => TIMEOUT_ERROR_CODES.has(code));
}

function isConnectionError(error: unknown): boolean {
  if (isTimeoutError(error)) return false;
  if (errorCodes(error).some((code) => CONNECTION_ERROR_CODES.has(code))) return true;
  // undici rejects with this exact TypeError when the socket never produced a response
  return error instanceof TypeError && error.message === "fetch failed";
}

function describe(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const cause = error.cause;
  if (cause instanceof Error && cause.message && cause.message !== error.message) {
    return `${error.message} (${cause.message})`;
  }
  return error.message;
}

function parseBody(bodyText: string): { json: boolean; data: unknown } {
  if (!bodyText) return { json: false, data: bodyText };
  try {
    return { json: true, data: JSON.parse(bodyText) };
  } catch {
    return { json: false, data: bodyText };
  }
}

export function parseRetryAfter(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  return Number.parseInt(trimmed, 10);
}

/**
 * Maps an HTTP error reply (or a 2xx reply whose envelope reports failure) onto
 * the domain taxonomy.
 */
export function toMexcError(params: {
  status: number;
  bodyText: string;
  headers?: Record<string, string>;
  endpoint?: string;
  method?: string;
  fallbackMessage?: string;
  cause?: unknown;
}): MexcDomainError {
  const body = parseBody(params.bodyText);
  const record = asRecord(body.data);
  const message =
    typeof record.message === "string" && record.message
      ? record.message
      : (params.fallbackMessage ?? `HTTP ${params.status}`);
  const bodyCode = record.code;
  const code: MexcErrorCode =
    typeof bodyCode === "number" || typeof bodyCode === "string" ? bodyCode : params.status;

  if (params.status === 401) {
    return new MexcAuthenticationError(message, params.cause);
  }

  if (params.status === 429) {
    const retryAfter = parseRetryAfter(params.headers?.["retry-after"]);
    return new MexcRateLimitError(message, retryAfter, params.cause);
  }

  if (String(code) === String(MEXC_SIGNATURE_ERROR_CODE) || message.toLowerCase().includes("signature")) {
    return new MexcSignatureError(message, params.cause);
  }

  return new MexcApiError(message, {
    code,
    statusCode: params.status,
    endpoint: params.endpoint,
    method: params.method,
    responseData: body.data,
    cause: params.cause
  });
}

export function parseTransportError(error: unknown, endpoint?: string, method?: string): MexcDomainError {
  if (isDomainError(error)) return error;

  if (isConnectionError(error)) {
    return new MexcNetworkError(describe(error), error);
  }

  if (isTimeoutError(error)) {
    return new MexcNetworkError("Request timeout", error);
  }

  if (error instanceof MexcHttpStatusError) {
    return toMexcError({
      status: error.status,
      bodyText: error.bodyText,
      headers: error.headers,
      endpoint,
      method,
      fallbackMessage: error.message,
      cause: error
    });
  }

  return new MexcUnknownError(describe(error), error);
}

/** Rebuilds a domain error from its details, e.g. after crossing a thread boundary. */
export function fromErrorDetails(details: MexcErrorDetails, cause?: unknown): MexcDomainError {
  switch (details.kind) {
    case "authentication":
      return new MexcAuthenticationError(details.message, cause);
    case "api":
      return new MexcApiError(details.message, {
        code: details.code ?? details.statusCode ?? "API_ERROR",
        statusCode: details.statusCode ?? 0,
        endpoint: details.endpoint,
        method: details.method,
        responseData: details.responseData,
        cause
      });
    case "network":
      return new MexcNetworkError(details.message, cause);
    case "validation":
      return new MexcValidationError(details.message, details.field, cause);
    case "signature":
      return new MexcSignatureError(details.message, cause);
    case "rate_limit":
      return new MexcRateLimitError(details.message, details.retryAfter, cause);
    case "unknown":
      return new MexcUnknownError(details.message, cause);
  }
}

export function formatErrorForLogging(error: MexcFuturesError): string {
  return `${error.getUserFriendlyMessage()}\nDetails: ${JSON.stringify(error.getDetails(), null, 2)}`;
}
