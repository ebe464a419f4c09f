import { z } from "zod";
import { MEXC_ENDPOINTS } from "./mexc.constants.js";
import { MexcRestClient } from "./mexc.rest.js";
import {
  accountAssetResponseSchema,
  feeRateResponseSchema,
  openPositionsResponseSchema,
  parseRequest,
  parseResponse,
  positionHistoryParamsSchema,
  positionHistoryResponseSchema,
  riskLimitResponseSchema,
  type AccountAssetResponse,
  type FeeRateResponse,
  type OpenPositionsResponse,
  type PositionHistoryParams,
  type PositionHistoryResponse,
  type RiskLimitResponse
} from "./mexc.schemas.js";

const currencySchema = z.string().trim().min(1, "currency is required");

export class MexcAccountApi {
  constructor(private readonly rest: MexcRestClient) {}

  /** Risk tiers keyed by contract symbol. */
  async getRiskLimit(): Promise<RiskLimitResponse> {
    const raw = await this.rest.requestPrivate({
      method: "GET",
      endpoint: MEXC_ENDPOINTS.RISK_LIMIT
    });
    return parseResponse(riskLimitResponseSchema, raw, MEXC_ENDPOINTS.RISK_LIMIT);
  }

  async getFeeRate(): Promise<FeeRateResponse> {
    const raw = await this.rest.requestPrivate({
      method: "GET",
      endpoint: MEXC_ENDPOINTS.FEE_RATE
    });
    return parseResponse(feeRateResponseSchema, raw, MEXC_ENDPOINTS.FEE_RATE);
  }

  async getAccountAsset(currency: string): Promise<AccountAssetResponse> {
    const checked = parseRequest(currencySchema, currency, "Invalid currency");
    const endpoint = `${MEXC_ENDPOINTS.ACCOUNT_ASSET}/${encodeURIComponent(checked)}`;
    const raw = await this.rest.requestPrivate({ method: "GET", endpoint });
    return parseResponse(accountAssetResponseSchema, raw, endpoint);
  }

  async getOpenPositions(symbol?: string): Promise<OpenPositionsResponse> {
    const raw = await this.rest.requestPrivate({
      method: "GET",
      endpoint: MEXC_ENDPOINTS.OPEN_POSITIONS,
      query: symbol ? { symbol } : undefined
    });
    return parseResponse(openPositionsResponseSchema, raw, MEXC_ENDPOINTS.OPEN_POSITIONS);
  }

  async getPositionHistory(params: PositionHistoryParams): Promise<PositionHistoryResponse> {
    const query = parseRequest(positionHistoryParamsSchema, params, "Invalid position history parameters");
    const raw = await this.rest.requestPrivate({
      method: "GET",
      endpoint: MEXC_ENDPOINTS.POSITION_HISTORY,
      query
    });
    return parseResponse(positionHistoryResponseSchema, raw, MEXC_ENDPOINTS.POSITION_HISTORY);
  }
}
