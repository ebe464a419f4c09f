export * from "./mexc/mexc.constants.js";
export * from "./mexc/mexc.types.js";
export * from "./mexc/mexc.errors.js";
export * from "./mexc/mexc.logger.js";
export * from "./mexc/mexc.config.js";
export * from "./mexc/mexc.schemas.js";
export {
  buildQueryParameterString,
  generateHeaders,
  mexcCrypto,
  serializeRequestBody,
  signRequestBody
} from "./mexc/mexc.signing.js";
export { MexcRestClient, type MexcRestClientOptions } from "./mexc/mexc.rest.js";
export { MexcMarketApi } from "./mexc/mexc.market.api.js";
export { MexcTradingApi } from "./mexc/mexc.trading.api.js";
export { MexcAccountApi } from "./mexc/mexc.account.api.js";
export { MexcFuturesClient } from "./mexc/mexc.client.js";
export { MexcFuturesClientSync, type MexcFuturesClientSyncOptions } from "./mexc/mexc.sync.js";
