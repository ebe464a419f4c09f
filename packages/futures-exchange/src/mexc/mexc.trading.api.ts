import { z } from "zod";
import { MEXC_ENDPOINTS } from "./mexc.constants.js";
import type { MexcLogger } from "./mexc.logger.js";
import { MexcRestClient } from "./mexc.rest.js";
import {
  cancelAllOrdersRequestSchema,
  cancelAllOrdersResponseSchema,
  cancelOrderByExternalIdRequestSchema,
  cancelOrderByExternalIdResponseSchema,
  cancelOrderIdsSchema,
  cancelOrderResponseSchema,
  getOrderResponseSchema,
  orderDealsParamsSchema,
  orderDealsResponseSchema,
  orderHistoryParamsSchema,
  orderHistoryResponseSchema,
  parseRequest,
  parseResponse,
  submitOrderRequestSchema,
  submitOrderResponseSchema,
  type CancelAllOrdersRequest,
  type CancelAllOrdersResponse,
  type CancelOrderByExternalIdRequest,
  type CancelOrderByExternalIdResponse,
  type CancelOrderIds,
  type CancelOrderResponse,
  type GetOrderResponse,
  type OrderDealsParams,
  type OrderDealsResponse,
  type OrderHistoryParams,
  type OrderHistoryResponse,
  type SubmitOrderRequest,
  type SubmitOrderResponse
} from "./mexc.schemas.js";

const idSegmentSchema = z
  .union([z.string().trim().min(1), z.number().int().nonnegative()])
  .transform((value) => encodeURIComponent(String(value)));

export class MexcTradingApi {
  constructor(
    private readonly rest: MexcRestClient,
    private readonly logger: MexcLogger
  ) {}

  /**
   * Places an order. The request is checked locally first; the caller's object
   * is sent as given so its key order survives into the signed body.
   */
  async submitOrder(payload: SubmitOrderRequest): Promise<SubmitOrderResponse> {
    parseRequest(submitOrderRequestSchema, payload, "Invalid order parameters");
    this.logger.info("Submitting order", { symbol: payload.symbol, side: payload.side, type: payload.type });

    const raw = await this.rest.requestPrivate({
      method: "POST",
      endpoint: MEXC_ENDPOINTS.SUBMIT_ORDER,
      body: payload
    });
    return parseResponse(submitOrderResponseSchema, raw, MEXC_ENDPOINTS.SUBMIT_ORDER);
  }

  /** Cancels up to 50 orders by id; the body is the bare id array. */
  async cancelOrder(orderIds: CancelOrderIds): Promise<CancelOrderResponse> {
    const ids = parseRequest(cancelOrderIdsSchema, orderIds, "Invalid order ids");
    const raw = await this.rest.requestPrivate({
      method: "POST",
      endpoint: MEXC_ENDPOINTS.CANCEL_ORDER,
      body: ids
    });
    return parseResponse(cancelOrderResponseSchema, raw, MEXC_ENDPOINTS.CANCEL_ORDER);
  }

  async cancelOrderByExternalId(params: CancelOrderByExternalIdRequest): Promise<CancelOrderByExternalIdResponse> {
    parseRequest(cancelOrderByExternalIdRequestSchema, params, "Invalid cancel parameters");
    const raw = await this.rest.requestPrivate({
      method: "POST",
      endpoint: MEXC_ENDPOINTS.CANCEL_ORDER_BY_EXTERNAL_ID,
      body: params
    });
    return parseResponse(
      cancelOrderByExternalIdResponseSchema,
      raw,
      MEXC_ENDPOINTS.CANCEL_ORDER_BY_EXTERNAL_ID
    );
  }

  /** Without a symbol every open order on the account is cancelled. */
  async cancelAllOrders(params: CancelAllOrdersRequest = {}): Promise<CancelAllOrdersResponse> {
    parseRequest(cancelAllOrdersRequestSchema, params, "Invalid cancel-all parameters");
    const raw = await this.rest.requestPrivate({
      method: "POST",
      endpoint: MEXC_ENDPOINTS.CANCEL_ALL_ORDERS,
      body: params
    });
    return parseResponse(cancelAllOrdersResponseSchema, raw, MEXC_ENDPOINTS.CANCEL_ALL_ORDERS);
  }

  async getOrderHistory(params: OrderHistoryParams): Promise<OrderHistoryResponse> {
    const query = parseRequest(orderHistoryParamsSchema, params, "Invalid order history parameters");
    const raw = await this.rest.requestPrivate({
      method: "GET",
      endpoint: MEXC_ENDPOINTS.ORDER_HISTORY,
      query
    });
    return parseResponse(orderHistoryResponseSchema, raw, MEXC_ENDPOINTS.ORDER_HISTORY);
  }

  async getOrderDeals(params: OrderDealsParams): Promise<OrderDealsResponse> {
    const query = parseRequest(orderDealsParamsSchema, params, "Invalid order deals parameters");
    const raw = await this.rest.requestPrivate({
      method: "GET",
      endpoint: MEXC_ENDPOINTS.ORDER_DEALS,
      query
    });
    return parseResponse(orderDealsResponseSchema, raw, MEXC_ENDPOINTS.ORDER_DEALS);
  }

  async getOrder(orderId: string | number): Promise<GetOrderResponse> {
    const id = parseRequest(idSegmentSchema, orderId, "Invalid order id");
    const endpoint = `${MEXC_ENDPOINTS.GET_ORDER}/${id}`;
    const raw = await this.rest.requestPrivate({ method: "GET", endpoint });
    return parseResponse(getOrderResponseSchema, raw, endpoint);
  }

  async getOrderByExternalId(symbol: string, externalOid: string): Promise<GetOrderResponse> {
    const symbolSegment = parseRequest(idSegmentSchema, symbol, "Invalid symbol");
    const oidSegment = parseRequest(idSegmentSchema, externalOid, "Invalid external order id");
    const endpoint = `${MEXC_ENDPOINTS.GET_ORDER_BY_EXTERNAL_ID}/${symbolSegment}/${oidSegment}`;
    const raw = await this.rest.requestPrivate({ method: "GET", endpoint });
    return parseResponse(getOrderResponseSchema, raw, endpoint);
  }
}
