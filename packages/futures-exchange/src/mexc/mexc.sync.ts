import { MessageChannel, Worker, receiveMessageOnPort, type MessagePort } from "node:worker_threads";
import { z } from "zod";
import { resolveMexcFuturesSettings, type MexcFuturesSettings } from "./mexc.config.js";
import {
  MexcNetworkError,
  MexcUnknownError,
  fromErrorDetails,
  type MexcErrorDetails
} from "./mexc.errors.js";
import {
  accountAssetResponseSchema,
  cancelOrderIdsSchema,
  cancelOrderResponseSchema,
  openPositionsResponseSchema,
  parseRequest,
  parseResponse,
  submitOrderRequestSchema,
  submitOrderResponseSchema,
  tickerResponseSchema,
  type AccountAssetResponse,
  type CancelOrderIds,
  type CancelOrderResponse,
  type OpenPositionsResponse,
  type SubmitOrderRequest,
  type SubmitOrderResponse,
  type TickerResponse
} from "./mexc.schemas.js";
import {
  SYNC_FAILURE_ID,
  SYNC_SIGNAL_FAILED,
  SYNC_SIGNAL_IDLE,
  type MexcSyncCall,
  type MexcSyncReply,
  type MexcSyncRequest,
  type MexcSyncWorkerData
} from "./mexc.sync.protocol.js";

// slack on top of the HTTP timeout before the caller stops waiting on the worker
const WORKER_WAIT_MARGIN_MS = 5_000;

const symbolSchema = z.string().trim().min(1, "symbol is required");
const currencySchema = z.string().trim().min(1, "currency is required");

function defaultWorkerEntry(): URL {
  // under a TypeScript loader this module runs from its .ts source
  const extension = import.meta.url.endsWith(".ts") ? ".ts" : ".js";
  return new URL(`./mexc.sync.worker${extension}`, import.meta.url);
}

function resolveTsxLoader(): string {
  try {
    return import.meta.resolve("tsx/esm/api");
  } catch (error) {
    throw new MexcUnknownError("Synchronous client needs tsx to run from TypeScript sources", error);
  }
}

/**
 * Worker threads do not inherit loader hooks, so the entry is imported from a
 * small ES module that registers tsx first when needed. A failed import is
 * reported through the shared signal because the caller is blocked and cannot
 * observe the worker's "error" event.
 */
function bootstrapUrl(entry: URL): URL {
  const loader = entry.pathname.endsWith(".ts") ? resolveTsxLoader() : undefined;
  const source = [
    'import { workerData } from "node:worker_threads";',
    "try {",
    loader ? `  (await import(${JSON.stringify(loader)})).register();` : "",
    `  await import(${JSON.stringify(entry.href)});`,
    "} catch (error) {",
    "  const message = error instanceof Error ? error.message : String(error);",
    "  workerData.port.postMessage({",
    `    id: ${SYNC_FAILURE_ID},`,
    "    ok: false,",
    '    error: { name: "MexcUnknownError", kind: "unknown", message, timestamp: new Date().toISOString() }',
    "  });",
    `  Atomics.store(workerData.signal, 0, ${SYNC_SIGNAL_FAILED});`,
    "  Atomics.notify(workerData.signal, 0);",
    "}"
  ].join("\n");
  return new URL(`data:text/javascript,${encodeURIComponent(source)}`);
}

export type MexcFuturesClientSyncOptions = {
  /** Module run inside the worker thread; defaults to the bundled sync worker. */
  workerEntry?: URL;
};

type WorkerHandle = {
  worker: Worker;
  port: MessagePort;
  signal: Int32Array;
};

/**
 * Blocking facade over `MexcFuturesClient`. Each instance owns one worker
 * thread that runs the async client; calls park the calling thread until the
 * worker answers. Only plain-data settings cross into the worker, so custom
 * `fetch`, `log` and clock hooks are unavailable here.
 */
export class MexcFuturesClientSync {
  private readonly settings: MexcFuturesSettings;
  private readonly waitTimeoutMs: number;
  private readonly workerEntry: URL;
  private handle?: WorkerHandle;
  private workerFailure?: Error;
  private sequence = 0;
  private closed = false;

  constructor(settings: MexcFuturesSettings, options: MexcFuturesClientSyncOptions = {}) {
    const resolved = resolveMexcFuturesSettings(settings);
    this.settings = {
      authToken: resolved.authToken,
      baseUrl: resolved.baseUrl,
      timeoutMs: resolved.timeoutMs,
      userAgent: resolved.userAgent,
      customHeaders: resolved.customHeaders,
      logLevel: resolved.logLevel
    };
    this.waitTimeoutMs = resolved.timeoutMs + WORKER_WAIT_MARGIN_MS;
    this.workerEntry = options.workerEntry ?? defaultWorkerEntry();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private ensureWorker(): WorkerHandle {
    if (this.closed) throw new MexcUnknownError("Synchronous client is closed");
    if (this.workerFailure) {
      throw new MexcUnknownError(`Synchronous worker failed: ${this.workerFailure.message}`, this.workerFailure);
    }
    if (this.handle) return this.handle;

    const signal = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
    const { port1, port2 } = new MessageChannel();
    const data: MexcSyncWorkerData = { settings: this.settings, signal, port: port2 };
    let worker: Worker;
    try {
      worker = new Worker(bootstrapUrl(this.workerEntry), { workerData: data, transferList: [port2] });
    } catch (error) {
      port1.close();
      if (error instanceof MexcUnknownError) throw error;
      throw new MexcUnknownError("Synchronous worker could not be started", error);
    }
    worker.on("error", (error) => {
      this.workerFailure = error;
    });
    worker.unref();
    port1.unref();

    this.handle = { worker, port: port1, signal };
    return this.handle;
  }

  private fail(details: MexcErrorDetails): never {
    const cause = fromErrorDetails(details);
    this.workerFailure = cause;
    const handle = this.handle;
    this.handle = undefined;
    if (handle) {
      handle.port.close();
      void handle.worker.terminate();
    }
    throw new MexcUnknownError(`Synchronous worker failed: ${cause.message}`, cause);
  }

  private takeReply(port: MessagePort, id: number): MexcSyncReply | undefined {
    // replies to calls that already timed out are dropped here
    for (let received = receiveMessageOnPort(port); received; received = receiveMessageOnPort(port)) {
      const reply: MexcSyncReply = received.message;
      if (reply.id === SYNC_FAILURE_ID && !reply.ok) this.fail(reply.error);
      if (reply.id === id) return reply;
    }
    return undefined;
  }

  private call(request: MexcSyncRequest): unknown {
    const { port, signal } = this.ensureWorker();
    const id = ++this.sequence;
    const message: MexcSyncCall = { id, request };

    Atomics.store(signal, 0, SYNC_SIGNAL_IDLE);
    // a failure reported between calls is still queued on the port
    this.takeReply(port, id);
    port.postMessage(message);

    const deadline = Date.now() + this.waitTimeoutMs;
    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new MexcNetworkError(`Request timeout (${request.method} got no answer from the worker)`);
      }
      Atomics.wait(signal, 0, SYNC_SIGNAL_IDLE, remaining);
      Atomics.store(signal, 0, SYNC_SIGNAL_IDLE);

      const reply = this.takeReply(port, id);
      if (!reply) continue;
      if (!reply.ok) throw fromErrorDetails(reply.error);
      return reply.value;
    }
  }

  async closeAsync(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const handle = this.handle;
    this.handle = undefined;
    if (!handle) return;
    handle.port.close();
    await handle.worker.terminate();
  }

  /** Marks the client closed and stops its worker; pending termination is not awaited. */
  close(): void {
    void this.closeAsync();
  }

  submitOrder(params: SubmitOrderRequest): SubmitOrderResponse {
    parseRequest(submitOrderRequestSchema, params, "Invalid order parameters");
    const value = this.call({ method: "submitOrder", args: [params] });
    return parseResponse(submitOrderResponseSchema, value, "submitOrder");
  }

  cancelOrder(orderIds: CancelOrderIds): CancelOrderResponse {
    parseRequest(cancelOrderIdsSchema, orderIds, "Invalid order ids");
    const value = this.call({ method: "cancelOrder", args: [orderIds] });
    return parseResponse(cancelOrderResponseSchema, value, "cancelOrder");
  }

  getTicker(symbol: string): TickerResponse {
    parseRequest(symbolSchema, symbol, "Invalid ticker symbol");
    const value = this.call({ method: "getTicker", args: [symbol] });
    return parseResponse(tickerResponseSchema, value, "getTicker");
  }

  getAccountAsset(currency: string): AccountAssetResponse {
    parseRequest(currencySchema, currency, "Invalid currency");
    const value = this.call({ method: "getAccountAsset", args: [currency] });
    return parseResponse(accountAssetResponseSchema, value, "getAccountAsset");
  }

  getOpenPositions(symbol?: string): OpenPositionsResponse {
    const value = this.call({ method: "getOpenPositions", args: [symbol] });
    return parseResponse(openPositionsResponseSchema, value, "getOpenPositions");
  }

  testConnection(): boolean {
    const value = this.call({ method: "testConnection", args: [] });
    return parseResponse(z.boolean(), value, "testConnection");
  }
}
