import { z } from "zod";
import { MEXC_ENDPOINTS } from "./mexc.constants.js";
import { MexcRestClient } from "./mexc.rest.js";
import {
  contractDepthResponseSchema,
  contractDetailResponseSchema,
  parseRequest,
  parseResponse,
  tickerResponseSchema,
  type ContractDepthResponse,
  type ContractDetailResponse,
  type TickerResponse
} from "./mexc.schemas.js";

const symbolSchema = z.string().trim().min(1, "symbol is required");
const depthLimitSchema = z.number().int().positive().optional();

export class MexcMarketApi {
  constructor(private readonly rest: MexcRestClient) {}

  async getTicker(symbol: string): Promise<TickerResponse> {
    const checked = parseRequest(symbolSchema, symbol, "Invalid ticker symbol");
    const raw = await this.rest.requestPublic("GET", MEXC_ENDPOINTS.TICKER, { symbol: checked });
    return parseResponse(tickerResponseSchema, raw, MEXC_ENDPOINTS.TICKER);
  }

  /** Always resolves to a list, even when a single symbol was requested. */
  async getContractDetail(symbol?: string): Promise<ContractDetailResponse> {
    const raw = await this.rest.requestPublic(
      "GET",
      MEXC_ENDPOINTS.CONTRACT_DETAIL,
      symbol ? { symbol } : undefined
    );
    return parseResponse(contractDetailResponseSchema, raw, MEXC_ENDPOINTS.CONTRACT_DETAIL);
  }

  async getContractDepth(symbol: string, limit?: number): Promise<ContractDepthResponse> {
    const checked = parseRequest(symbolSchema, symbol, "Invalid depth symbol");
    const checkedLimit = parseRequest(depthLimitSchema, limit, "Invalid depth limit");
    const endpoint = `${MEXC_ENDPOINTS.CONTRACT_DEPTH}/${encodeURIComponent(checked)}`;
    const raw = await this.rest.requestPublic(
      "GET",
      endpoint,
      checkedLimit ? { limit: checkedLimit } : undefined
    );
    return parseResponse(contractDepthResponseSchema, raw, endpoint);
  }
}
