import { z } from "zod";
import { MEXC_MAX_CANCEL_BATCH } from "./mexc.constants.js";
import { MexcValidationError } from "./mexc.errors.js";

// The gateway sends most decimals as JSON numbers but some rows carry them as strings.
const numeric = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number());
const integer = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().int());
const text = z.union([z.string(), z.number()]).transform(String);

function oneOf<const A extends number, const B extends number, const R extends number[]>(
  field: string,
  values: [A, B, ...R]
) {
  const [first, second, ...rest] = values;
  return z.union([z.literal(first), z.literal(second), ...rest.map((value) => z.literal(value))], {
    errorMap: () => ({ message: `${field} must be one of ${values.join(", ")}` })
  });
}

// ==================== market ====================

export const riseFallRatesSchema = z.object({
  zone: z.string(),
  r: numeric,
  v: numeric,
  r7: numeric,
  r30: numeric.nullish(),
  r90: numeric.nullish(),
  r180: numeric.nullish(),
  r365: numeric.nullish()
});

export const tickerDataSchema = z.object({
  contractId: integer,
  symbol: z.string(),
  lastPrice: numeric,
  bid1: numeric,
  ask1: numeric,
  volume24: numeric,
  amount24: numeric,
  holdVol: numeric,
  lower24Price: numeric,
  high24Price: numeric,
  riseFallRate: numeric,
  riseFallValue: numeric,
  indexPrice: numeric,
  fairPrice: numeric,
  fundingRate: numeric,
  maxBidPrice: numeric,
  minAskPrice: numeric,
  timestamp: integer,
  riseFallRates: riseFallRatesSchema,
  riseFallRatesOfTimezone: z.array(numeric)
});

export const tickerResponseSchema = z.object({
  success: z.boolean(),
  code: z.number(),
  data: tickerDataSchema
});

export const contractDetailSchema = z.object({
  symbol: z.string(),
  displayName: z.string(),
  displayNameEn: z.string(),
  positionOpenType: integer,
  baseCoin: z.string(),
  quoteCoin: z.string(),
  settleCoin: z.string(),
  contractSize: numeric,
  minLeverage: integer,
  maxLeverage: integer,
  priceScale: integer,
  volScale: integer,
  amountScale: integer,
  priceUnit: numeric,
  volUnit: numeric,
  minVol: numeric,
  maxVol: numeric,
  bidLimitPriceRate: numeric,
  askLimitPriceRate: numeric,
  takerFeeRate: numeric,
  makerFeeRate: numeric,
  maintenanceMarginRate: numeric,
  initialMarginRate: numeric,
  riskBaseVol: numeric,
  riskIncrVol: numeric,
  riskIncrMmr: numeric,
  riskIncrImr: numeric,
  riskLevelLimit: integer,
  priceCoefficientVariation: numeric,
  indexOrigin: z.array(z.string()),
  state: integer,
  isNew: z.boolean(),
  isHot: z.boolean(),
  isHidden: z.boolean(),
  conceptPlate: z.array(z.string()),
  riskLimitType: z.string(),
  maxNumOrders: z.array(integer),
  marketOrderMaxLevel: integer,
  marketOrderPriceLimitRate1: numeric,
  marketOrderPriceLimitRate2: numeric,
  triggerProtect: numeric,
  appraisal: numeric,
  showAppraisalCountdown: integer,
  automaticDelivery: integer,
  apiAllowed: z.boolean()
});

export const contractDetailResponseSchema = z.object({
  success: z.boolean(),
  code: z.number(),
  // a symbol filter yields one object, no filter yields the full list
  data: z
    .union([z.array(contractDetailSchema), contractDetailSchema])
    .transform((value) => (Array.isArray(value) ? value : [value]))
});

const depthEntryTupleSchema = z
  .tuple([numeric, numeric])
  .rest(integer)
  .transform((entry) => ({
    price: entry[0],
    volume: entry[1],
    count: entry.length > 2 ? entry[2] : null
  }));

const depthEntryObjectSchema = z
  .object({
    price: numeric,
    volume: numeric,
    count: integer.nullish()
  })
  .transform((entry) => ({
    price: entry.price,
    volume: entry.volume,
    count: entry.count ?? null
  }));

/** Price level as `[price, volume, count?]` or `{ price, volume, count? }`. */
export const depthEntrySchema = z.union([depthEntryTupleSchema, depthEntryObjectSchema]);

export const contractDepthDataSchema = z.object({
  asks: z.array(depthEntrySchema),
  bids: z.array(depthEntrySchema),
  version: integer,
  timestamp: integer
});

export const contractDepthResponseSchema = z.union([
  z
    .object({
      success: z.boolean().optional(),
      code: z.number().optional(),
      data: contractDepthDataSchema
    })
    .transform((value) => ({
      success: value.success ?? true,
      code: value.code ?? 0,
      data: value.data
    })),
  contractDepthDataSchema.transform((data) => ({ success: true, code: 0, data }))
]);

// ==================== orders ====================

export const submitOrderRequestSchema = z
  .object({
    symbol: z.string().trim().min(1),
    price: z.number().finite().nonnegative(),
    vol: z.number().finite().positive(),
    leverage: z.number().int().positive().optional(),
    side: oneOf("side", [1, 2, 3, 4]),
    type: oneOf("type", [1, 2, 3, 4, 5, 6]),
    openType: oneOf("openType", [1, 2]),
    positionId: z.number().int().positive().optional(),
    externalOid: z.string().min(1).optional(),
    stopLossPrice: z.number().finite().positive().optional(),
    takeProfitPrice: z.number().finite().positive().optional(),
    positionMode: oneOf("positionMode", [1, 2]).optional(),
    reduceOnly: z.boolean().optional()
  })
  .strict();

export const submitOrderResponseSchema = z.object({
  success: z.boolean(),
  code: z.number(),
  message: z.string().nullish(),
  data: z
    .union([text, z.object({ orderId: text }).passthrough().transform((value) => value.orderId)])
    .nullish()
    .transform((value) => value ?? null)
});

export const cancelOrderIdsSchema = z
  .array(z.union([z.number().int().positive(), z.string().regex(/^\d+$/, "order id must be numeric")]))
  .min(1, "Order IDs list cannot be empty")
  .max(MEXC_MAX_CANCEL_BATCH, `Cannot cancel more than ${MEXC_MAX_CANCEL_BATCH} orders at once`);

export const cancelOrderResultSchema = z.object({
  orderId: text,
  errorCode: integer,
  errorMsg: z.string()
});

export const cancelOrderResponseSchema = z.object({
  success: z.boolean(),
  code: z.number(),
  data: z.array(cancelOrderResultSchema)
});

export const cancelOrderByExternalIdRequestSchema = z
  .object({
    symbol: z.string().trim().min(1),
    externalOid: z.string().trim().min(1)
  })
  .strict();

export const cancelOrderByExternalIdResponseSchema = z.object({
  success: z.boolean(),
  code: z.number(),
  data: z
    .object({ symbol: z.string(), externalOid: z.string() })
    .nullish()
    .transform((value) => value ?? null)
});

export const cancelAllOrdersRequestSchema = z
  .object({
    symbol: z.string().trim().min(1).optional()
  })
  .strict();

export const cancelAllOrdersResponseSchema = z.object({
  success: z.boolean(),
  code: z.number(),
  data: z.unknown().transform((value) => value ?? null)
});

export const orderHistoryParamsSchema = z
  .object({
    symbol: z.string().trim().min(1),
    category: z.number().int(),
    states: z.number().int(),
    page_num: z.number().int().positive(),
    page_size: z.number().int().positive().max(100)
  })
  .strict();

export const orderSchema = z.object({
  id: text,
  symbol: z.string(),
  side: integer,
  type: text,
  vol: numeric,
  price: text,
  leverage: integer,
  status: text,
  createTime: integer,
  updateTime: integer
});

export const orderHistoryDataSchema = z.object({
  orders: z.array(orderSchema),
  total: integer
});

export const orderHistoryResponseSchema = z.object({
  success: z.boolean(),
  code: z.number(),
  data: z
    .union([
      orderHistoryDataSchema,
      z.array(orderSchema).transform((orders) => ({ orders, total: orders.length }))
    ])
    .nullish()
    .transform((value) => value ?? { orders: [], total: 0 })
});

export const orderDealsParamsSchema = z
  .object({
    symbol: z.string().trim().min(1),
    start_time: z.number().int().nonnegative().optional(),
    end_time: z.number().int().nonnegative().optional(),
    page_num: z.number().int().positive(),
    page_size: z.number().int().positive().max(100)
  })
  .strict();

export const orderDealSchema = z.object({
  id: text,
  symbol: z.string(),
  side: integer,
  vol: text,
  price: text,
  fee: text,
  feeCurrency: z.string(),
  profit: text,
  isTaker: z.boolean(),
  category: integer,
  orderId: text,
  timestamp: integer
});

export const orderDealsResponseSchema = z.object({
  success: z.boolean(),
  code: z.number(),
  data: z.array(orderDealSchema)
});

export const orderDetailSchema = z.object({
  orderId: text,
  symbol: z.string(),
  positionId: integer,
  price: numeric,
  vol: numeric,
  leverage: integer,
  side: integer,
  category: integer,
  orderType: integer,
  dealAvgPrice: numeric,
  dealVol: numeric,
  orderMargin: numeric,
  takerFee: numeric,
  makerFee: numeric,
  profit: numeric,
  feeCurrency: z.string(),
  openType: integer,
  state: integer,
  externalOid: z.string(),
  errorCode: integer,
  usedMargin: numeric,
  createTime: integer,
  updateTime: integer
});

export const getOrderResponseSchema = z.object({
  success: z.boolean(),
  code: z.number(),
  data: orderDetailSchema
});

// ==================== account ====================

export const riskLimitSchema = z.object({
  symbol: z.string(),
  level: integer,
  maxVol: numeric,
  mmr: numeric,
  imr: numeric,
  maxLeverage: integer,
  positionType: integer,
  openType: integer,
  leverage: integer,
  limitBySys: z.boolean(),
  currentMmr: numeric.nullish()
});

export const riskLimitResponseSchema = z.object({
  success: z.boolean(),
  code: z.number(),
  data: z.record(z.array(riskLimitSchema))
});

export const feeRateSchema = z.object({
  symbol: z.string(),
  takerFeeRate: numeric,
  makerFeeRate: numeric
});

export const feeRateResponseSchema = z.object({
  success: z.boolean(),
  code: z.number(),
  data: z.array(feeRateSchema)
});

export const accountAssetSchema = z.object({
  currency: z.string(),
  positionMargin: numeric,
  availableBalance: numeric,
  cashBalance: numeric,
  frozenBalance: numeric,
  equity: numeric,
  unrealized: numeric,
  bonus: numeric
});

export const accountAssetResponseSchema = z.object({
  success: z.boolean(),
  code: z.number(),
  data: accountAssetSchema
});

export const positionSchema = z.object({
  positionId: integer,
  symbol: z.string(),
  positionType: oneOf("positionType", [1, 2]),
  openType: oneOf("openType", [1, 2]),
  state: oneOf("state", [1, 2, 3]),
  holdVol: numeric,
  frozenVol: numeric,
  closeVol: numeric,
  holdAvgPrice: numeric,
  openAvgPrice: numeric,
  closeAvgPrice: numeric,
  liquidatePrice: numeric,
  oim: numeric,
  adlLevel: integer.nullish(),
  im: numeric,
  holdFee: numeric,
  realised: numeric,
  leverage: integer,
  createTime: integer,
  updateTime: integer,
  autoAddIm: z.boolean().nullish()
});

export const openPositionsResponseSchema = z.object({
  success: z.boolean(),
  code: z.number(),
  data: z.array(positionSchema)
});

export const positionHistoryParamsSchema = z
  .object({
    symbol: z.string().trim().min(1).optional(),
    type: oneOf("type", [1, 2]).optional(),
    page_num: z.number().int().positive(),
    page_size: z.number().int().positive().max(100)
  })
  .strict();

export const positionHistoryResponseSchema = z.object({
  success: z.boolean(),
  code: z.number(),
  message: z.string().nullish(),
  data: z.array(positionSchema)
});

// ==================== parsing ====================

function toValidationError(label: string, error: z.ZodError): MexcValidationError {
  const issue = error.issues[0];
  const path = issue ? issue.path.map(String).join(".") : "";
  const reason = issue ? issue.message : error.message;
  return new MexcValidationError(`${label}: ${path ? `${path}: ` : ""}${reason}`, path || undefined, error);
}

/** Validates caller input; fails before any request is sent. */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, value: unknown, label: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) throw toValidationError(label, result.error);
  return result.data;
}

export function parseResponse<T extends z.ZodTypeAny>(schema: T, value: unknown, endpoint: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) throw toValidationError(`Unexpected response shape from ${endpoint}`, result.error);
  return result.data;
}

// ==================== types ====================

export type DepthEntry = z.output<typeof depthEntrySchema>;
export type TickerData = z.output<typeof tickerDataSchema>;
export type TickerResponse = z.output<typeof tickerResponseSchema>;
export type ContractDetail = z.output<typeof contractDetailSchema>;
export type ContractDetailResponse = z.output<typeof contractDetailResponseSchema>;
export type ContractDepthData = z.output<typeof contractDepthDataSchema>;
export type ContractDepthResponse = z.output<typeof contractDepthResponseSchema>;

export type SubmitOrderRequest = z.input<typeof submitOrderRequestSchema>;
export type SubmitOrderResponse = z.output<typeof submitOrderResponseSchema>;
export type CancelOrderIds = z.input<typeof cancelOrderIdsSchema>;
export type CancelOrderResult = z.output<typeof cancelOrderResultSchema>;
export type CancelOrderResponse = z.output<typeof cancelOrderResponseSchema>;
export type CancelOrderByExternalIdRequest = z.input<typeof cancelOrderByExternalIdRequestSchema>;
export type CancelOrderByExternalIdResponse = z.output<typeof cancelOrderByExternalIdResponseSchema>;
export type CancelAllOrdersRequest = z.input<typeof cancelAllOrdersRequestSchema>;
export type CancelAllOrdersResponse = z.output<typeof cancelAllOrdersResponseSchema>;
export type OrderHistoryParams = z.input<typeof orderHistoryParamsSchema>;
export type Order = z.output<typeof orderSchema>;
export type OrderHistoryResponse = z.output<typeof orderHistoryResponseSchema>;
export type OrderDealsParams = z.input<typeof orderDealsParamsSchema>;
export type OrderDeal = z.output<typeof orderDealSchema>;
export type OrderDealsResponse = z.output<typeof orderDealsResponseSchema>;
export type OrderDetail = z.output<typeof orderDetailSchema>;
export type GetOrderResponse = z.output<typeof getOrderResponseSchema>;

export type RiskLimit = z.output<typeof riskLimitSchema>;
export type RiskLimitResponse = z.output<typeof riskLimitResponseSchema>;
export type FeeRate = z.output<typeof feeRateSchema>;
export type FeeRateResponse = z.output<typeof feeRateResponseSchema>;
export type AccountAsset = z.output<typeof accountAssetSchema>;
export type AccountAssetResponse = z.output<typeof accountAssetResponseSchema>;
export type Position = z.output<typeof positionSchema>;
export type OpenPositionsResponse = z.output<typeof openPositionsResponseSchema>;
export type PositionHistoryParams = z.input<typeof positionHistoryParamsSchema>;
export type PositionHistoryResponse = z.output<typeof positionHistoryResponseSchema>;
