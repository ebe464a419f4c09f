import { workerData } from "node:worker_threads";
import { MexcFuturesClient } from "./mexc.client.js";
import { MexcUnknownError, parseTransportError } from "./mexc.errors.js";
import {
  SYNC_FAILURE_ID,
  SYNC_SIGNAL_FAILED,
  SYNC_SIGNAL_READY,
  type MexcSyncCall,
  type MexcSyncReply,
  type MexcSyncRequest,
  type MexcSyncWorkerData
} from "./mexc.sync.protocol.js";

const data: MexcSyncWorkerData = workerData;

function respond(reply: MexcSyncReply, signal = SYNC_SIGNAL_READY) {
  data.port.postMessage(reply);
  Atomics.store(data.signal, 0, signal);
  Atomics.notify(data.signal, 0);
}

function reportFailure(error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  respond(
    { id: SYNC_FAILURE_ID, ok: false, error: new MexcUnknownError(message, error).getDetails() },
    SYNC_SIGNAL_FAILED
  );
}

function createClient(): MexcFuturesClient | undefined {
  try {
    return new MexcFuturesClient(data.settings);
  } catch (error) {
    reportFailure(error);
    return undefined;
  }
}

function dispatch(client: MexcFuturesClient, request: MexcSyncRequest): Promise<unknown> {
  switch (request.method) {
    case "submitOrder":
      return client.submitOrder(...request.args);
    case "cancelOrder":
      return client.cancelOrder(...request.args);
    case "getTicker":
      return client.getTicker(...request.args);
    case "getAccountAsset":
      return client.getAccountAsset(...request.args);
    case "getOpenPositions":
      return client.getOpenPositions(...request.args);
    case "testConnection":
      return client.testConnection();
  }
}

// the caller is parked in Atomics.wait and cannot see an "error" event, so report and stop
process.on("uncaughtException", (error) => {
  reportFailure(error);
  process.exit(1);
});
process.on("unhandledRejection", (reason) => {
  reportFailure(reason);
  process.exit(1);
});

const client = createClient();
if (client) {
  data.port.on("message", (call: MexcSyncCall) => {
    void dispatch(client, call.request).then(
      (value) => respond({ id: call.id, ok: true, value }),
      (error: unknown) => respond({ id: call.id, ok: false, error: parseTransportError(error).getDetails() })
    );
  });
}
