export type HttpMethod = "GET" | "POST";

export type MexcClock = () => number;

export type MexcFetch = (url: string, init: RequestInit) => Promise<Response>;

export type MexcSdkOptions = {
  authToken: string;
  userAgent?: string;
  customHeaders?: Record<string, string>;
};

export type MexcSignature = {
  time: string;
  sign: string;
};

export type MexcLogEntry = {
  at: string;
  endpoint: string;
  method: HttpMethod;
  durationMs: number;
  status?: number;
  mexcCode?: number | string;
  ok: boolean;
  message?: string;
  requestId: string;
};

export type MexcRequestParams = {
  method: HttpMethod;
  endpoint: string;
  query?: Record<string, unknown>;
  body?: unknown;
  requireAuth: boolean;
};
