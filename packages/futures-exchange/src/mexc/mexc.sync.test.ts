import assert from "node:assert/strict";
import { once } from "node:events";
import { readFileSync } from "node:fs";
import test from "node:test";
import { Worker } from "node:worker_threads";
import { MexcAuthenticationError, MexcUnknownError, MexcValidationError } from "./mexc.errors.js";
import { MexcFuturesClientSync } from "./mexc.sync.js";

// The sync client blocks this thread, so the HTTP stand-in has to run on its own thread.
const STUB_SERVER = `
import http from "node:http";
import { parentPort, workerData } from "node:worker_threads";

const server = http.createServer((request, response) => {
  if (request.url === "/api/v1/contract/ticker?symbol=BTC_USDT") {
    response.writeHead(200, { "content-type": "application/json" });
    response.end(workerData.ticker);
  } else if (request.url === "/api/v1/private/account/asset/USDT") {
    response.writeHead(401, { "content-type": "application/json" });
    response.end('{"success":false,"code":401,"message":"Not logged in"}');
  } else {
    response.writeHead(404);
    response.end();
  }
});
server.listen(0, "127.0.0.1", () => parentPort.postMessage(server.address().port));
`;

function dataModule(source: string): URL {
  return new URL(`data:text/javascript,${encodeURIComponent(source)}`);
}

test("construction validates settings eagerly", () => {
  assert.throws(() => new MexcFuturesClientSync({ authToken: "" }), MexcValidationError);
});

test("arguments are validated before reaching the worker", () => {
  const client = new MexcFuturesClientSync({ authToken: "WEB-test-token", logLevel: "silent" });

  assert.throws(() => client.cancelOrder([]), {
    name: "MexcValidationError",
    message: "Invalid order ids: Order IDs list cannot be empty"
  });
  assert.throws(() => client.getTicker(""), MexcValidationError);
  assert.throws(() => client.getAccountAsset(" "), MexcValidationError);
  assert.throws(
    () => client.submitOrder({ symbol: "BTC_USDT", price: -1, vol: 1, side: 1, type: 1, openType: 1 }),
    (error: unknown) => error instanceof MexcValidationError && error.field === "price"
  );
  assert.equal(client.isClosed, false);
});

test("a closed client refuses further calls", async () => {
  const client = new MexcFuturesClientSync({ authToken: "WEB-test-token", logLevel: "silent" });
  await client.closeAsync();

  assert.equal(client.isClosed, true);
  assert.throws(() => client.getTicker("BTC_USDT"), (error: unknown) => {
    assert.ok(error instanceof MexcUnknownError);
    assert.equal(error.message, "Synchronous client is closed");
    return true;
  });
  assert.throws(() => client.testConnection(), MexcUnknownError);

  client.close();
  assert.equal(client.isClosed, true);
});

test("calls block until the worker has the answer", async (t) => {
  const ticker = readFileSync(new URL("./fixtures/ticker.json", import.meta.url), "utf8");
  const stub = new Worker(dataModule(STUB_SERVER), { workerData: { ticker } });
  t.after(() => stub.terminate());
  const [port] = await once(stub, "message");

  const client = new MexcFuturesClientSync({
    authToken: "WEB-test-token",
    baseUrl: `http://127.0.0.1:${port}/api/v1`,
    timeoutMs: 5_000,
    logLevel: "silent"
  });
  t.after(() => client.closeAsync());

  const result = client.getTicker("BTC_USDT");
  assert.equal(result.data.symbol, "BTC_USDT");
  assert.equal(result.data.lastPrice, 64250.5);
  assert.equal(result.data.fundingRate, 0.0001);
  assert.equal(client.testConnection(), true);
  assert.throws(() => client.getAccountAsset("USDT"), (error: unknown) => {
    assert.ok(error instanceof MexcAuthenticationError);
    assert.equal(error.message, "Not logged in");
    return true;
  });
});

test("a worker that cannot load fails the call at once", () => {
  const client = new MexcFuturesClientSync(
    { authToken: "WEB-test-token", timeoutMs: 60_000, logLevel: "silent" },
    { workerEntry: dataModule('throw new Error("worker entry failed");') }
  );
  const started = Date.now();

  assert.throws(() => client.getTicker("BTC_USDT"), (error: unknown) => {
    assert.ok(error instanceof MexcUnknownError);
    assert.equal(error.message, "Synchronous worker failed: worker entry failed");
    return true;
  });
  assert.ok(Date.now() - started < 10_000);
  assert.throws(() => client.testConnection(), {
    name: "MexcUnknownError",
    message: "Synchronous worker failed: worker entry failed"
  });
  client.close();
});
