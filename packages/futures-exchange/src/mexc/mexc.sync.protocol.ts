import type { MessagePort } from "node:worker_threads";
import type { MexcFuturesSettings } from "./mexc.config.js";
import type { MexcErrorDetails } from "./mexc.errors.js";
import type { CancelOrderIds, SubmitOrderRequest } from "./mexc.schemas.js";

export type MexcSyncRequest =
  | { method: "submitOrder"; args: [SubmitOrderRequest] }
  | { method: "cancelOrder"; args: [CancelOrderIds] }
  | { method: "getTicker"; args: [string] }
  | { method: "getAccountAsset"; args: [string] }
  | { method: "getOpenPositions"; args: [string | undefined] }
  | { method: "testConnection"; args: [] };

export type MexcSyncCall = {
  id: number;
  request: MexcSyncRequest;
};

export type MexcSyncReply =
  | { id: number; ok: true; value: unknown }
  | { id: number; ok: false; error: MexcErrorDetails };

export type MexcSyncWorkerData = {
  settings: MexcFuturesSettings;
  signal: Int32Array;
  port: MessagePort;
};

export const SYNC_SIGNAL_IDLE = 0;
export const SYNC_SIGNAL_READY = 1;
export const SYNC_SIGNAL_FAILED = 2;

// call ids start at 1; a reply with this id reports that the worker itself broke
export const SYNC_FAILURE_ID = 0;
