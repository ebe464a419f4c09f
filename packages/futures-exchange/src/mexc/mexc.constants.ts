export const MEXC_FUTURES_API_BASE_URL = "https://futures.mexc.com/api/v1";

export const MEXC_DEFAULT_TIMEOUT_MS = 30_000;

export const MEXC_MAX_CANCEL_BATCH = 50;

export const MEXC_SIGNATURE_ERROR_CODE = 602;

// Offset into the hex digest of md5(token + time) that the web signature keeps.
export const MEXC_SIGN_KEY_OFFSET = 7;

export const MEXC_AUTH_HEADER = "authorization";
export const MEXC_NONCE_HEADER = "x-mxc-nonce";
export const MEXC_SIGN_HEADER = "x-mxc-sign";

export const MEXC_DEFAULT_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  "content-type": "application/json",
  "user-agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  accept: "*/*",
  "accept-language": "en-US,en;q=0.9",
  "cache-control": "no-cache",
  pragma: "no-cache",
  origin: "https://futures.mexc.com",
  referer: "https://futures.mexc.com/"
});

export const MEXC_ENDPOINTS = {
  // orders
  SUBMIT_ORDER: "/private/order/submit",
  CANCEL_ORDER: "/private/order/cancel",
  CANCEL_ORDER_BY_EXTERNAL_ID: "/private/order/cancel_with_external",
  CANCEL_ALL_ORDERS: "/private/order/cancel_all",
  ORDER_HISTORY: "/private/order/list/history_orders",
  ORDER_DEALS: "/private/order/list/order_deals",
  GET_ORDER: "/private/order/get",
  GET_ORDER_BY_EXTERNAL_ID: "/private/order/external",

  // account
  RISK_LIMIT: "/private/account/risk_limit",
  FEE_RATE: "/private/account/contract/fee_rate",
  ACCOUNT_ASSET: "/private/account/asset",
  OPEN_POSITIONS: "/private/position/open_positions",
  POSITION_HISTORY: "/private/position/list/history_positions",

  // market
  TICKER: "/contract/ticker",
  CONTRACT_DETAIL: "/contract/detail",
  CONTRACT_DEPTH: "/contract/depth"
} as const;

export type MexcEndpoint = (typeof MEXC_ENDPOINTS)[keyof typeof MEXC_ENDPOINTS];
