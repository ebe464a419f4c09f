import { MexcAccountApi } from "./mexc.account.api.js";
import { resolveMexcFuturesSettings, type MexcFuturesClientConfig } from "./mexc.config.js";
import { createMexcLogger, type MexcLogger } from "./mexc.logger.js";
import { MexcMarketApi } from "./mexc.market.api.js";
import { MexcRestClient } from "./mexc.rest.js";
import type {
  AccountAssetResponse,
  CancelAllOrdersRequest,
  CancelAllOrdersResponse,
  CancelOrderByExternalIdRequest,
  CancelOrderByExternalIdResponse,
  CancelOrderIds,
  CancelOrderResponse,
  ContractDepthResponse,
  ContractDetailResponse,
  FeeRateResponse,
  GetOrderResponse,
  OpenPositionsResponse,
  OrderDealsParams,
  OrderDealsResponse,
  OrderHistoryParams,
  OrderHistoryResponse,
  PositionHistoryParams,
  PositionHistoryResponse,
  RiskLimitResponse,
  SubmitOrderRequest,
  SubmitOrderResponse,
  TickerResponse
} from "./mexc.schemas.js";
import { MexcTradingApi } from "./mexc.trading.api.js";

/**
 * REST client for the MEXC futures web gateway, authenticated with the WEB
 * token of a browser session.
 *
 * ```ts
 * const client = new MexcFuturesClient({ authToken: "WEB..." });
 * const ticker = await client.getTicker("BTC_USDT");
 * ```
 */
export class MexcFuturesClient {
  readonly logger: MexcLogger;
  readonly market: MexcMarketApi;
  readonly trading: MexcTradingApi;
  readonly account: MexcAccountApi;

  private readonly rest: MexcRestClient;

  constructor(config: MexcFuturesClientConfig) {
    const settings = resolveMexcFuturesSettings({
      authToken: config.authToken,
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      userAgent: config.userAgent,
      customHeaders: config.customHeaders,
      logLevel: config.logLevel
    });

    this.logger = createMexcLogger(settings.logLevel, config.logSink);
    this.rest = new MexcRestClient({
      sdk: {
        authToken: settings.authToken,
        userAgent: settings.userAgent,
        customHeaders: settings.customHeaders
      },
      baseUrl: settings.baseUrl,
      timeoutMs: settings.timeoutMs,
      logger: this.logger,
      fetch: config.fetch,
      now: config.now,
      log: config.log
    });

    this.market = new MexcMarketApi(this.rest);
    this.trading = new MexcTradingApi(this.rest, this.logger);
    this.account = new MexcAccountApi(this.rest);
  }

  get baseUrl(): string {
    return this.rest.baseUrl;
  }

  // fetch keeps no per-client sockets; kept so callers can treat both clients alike
  async close(): Promise<void> {}

  // ==================== orders ====================

  submitOrder(params: SubmitOrderRequest): Promise<SubmitOrderResponse> {
    return this.trading.submitOrder(params);
  }

  cancelOrder(orderIds: CancelOrderIds): Promise<CancelOrderResponse> {
    return this.trading.cancelOrder(orderIds);
  }

  cancelOrderByExternalId(params: CancelOrderByExternalIdRequest): Promise<CancelOrderByExternalIdResponse> {
    return this.trading.cancelOrderByExternalId(params);
  }

  cancelAllOrders(params?: CancelAllOrdersRequest): Promise<CancelAllOrdersResponse> {
    return this.trading.cancelAllOrders(params);
  }

  getOrderHistory(params: OrderHistoryParams): Promise<OrderHistoryResponse> {
    return this.trading.getOrderHistory(params);
  }

  getOrderDeals(params: OrderDealsParams): Promise<OrderDealsResponse> {
    return this.trading.getOrderDeals(params);
  }

  getOrder(orderId: string | number): Promise<GetOrderResponse> {
    return this.trading.getOrder(orderId);
  }

  getOrderByExternalId(symbol: string, externalOid: string): Promise<GetOrderResponse> {
    return this.trading.getOrderByExternalId(symbol, externalOid);
  }

  // ==================== account ====================

  getRiskLimit(): Promise<RiskLimitResponse> {
    return this.account.getRiskLimit();
  }

  getFeeRate(): Promise<FeeRateResponse> {
    return this.account.getFeeRate();
  }

  getAccountAsset(currency: string): Promise<AccountAssetResponse> {
    return this.account.getAccountAsset(currency);
  }

  getOpenPositions(symbol?: string): Promise<OpenPositionsResponse> {
    return this.account.getOpenPositions(symbol);
  }

  getPositionHistory(params: PositionHistoryParams): Promise<PositionHistoryResponse> {
    return this.account.getPositionHistory(params);
  }

  // ==================== market ====================

  getTicker(symbol: string): Promise<TickerResponse> {
    return this.market.getTicker(symbol);
  }

  getContractDetail(symbol?: string): Promise<ContractDetailResponse> {
    return this.market.getContractDetail(symbol);
  }

  getContractDepth(symbol: string, limit?: number): Promise<ContractDepthResponse> {
    return this.market.getContractDepth(symbol, limit);
  }

  // ==================== utility ====================

  /** Hits the public ticker endpoint; never throws. */
  async testConnection(): Promise<boolean> {
    try {
      await this.getTicker("BTC_USDT");
      return true;
    } catch (error) {
      this.logger.warn("Connection test failed", { error: String(error) });
      return false;
    }
  }
}
