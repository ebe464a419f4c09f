import assert from "node:assert/strict";
import test from "node:test";
import { MEXC_DEFAULT_HEADERS } from "./mexc.constants.js";
import {
  buildQueryParameterString,
  generateHeaders,
  mexcCrypto,
  serializeRequestBody,
  signRequestBody
} from "./mexc.signing.js";

const TOKEN = "WEB-test-token";

test("buildQueryParameterString sorts keys, drops empty values and url-encodes", () => {
  const result = buildQueryParameterString({
    symbol: "BTC_USDT",
    page_num: 1,
    page_size: 20,
    keyword: "a b",
    start_time: undefined,
    end_time: null
  });

  assert.equal(result, "keyword=a%20b&page_num=1&page_size=20&symbol=BTC_USDT");
});

test("serializeRequestBody keeps key order and emits no whitespace", () => {
  const payload = { b: 2, a: 1, nested: { z: 1, y: [1, 2] }, skipped: undefined };
  assert.equal(serializeRequestBody(payload), '{"b":2,"a":1,"nested":{"z":1,"y":[1,2]}}');
  assert.equal(serializeRequestBody([101, 102]), "[101,102]");
  assert.equal(serializeRequestBody('{"raw":true}'), '{"raw":true}');
});

test("signRequestBody matches the web gateway md5 construction", () => {
  const signature = signRequestBody({
    token: TOKEN,
    timestampMs: "1700000000000",
    body: '{"symbol":"BTC_USDT","vol":1}'
  });

  assert.equal(signature, "59c09e8a1dadd1cdac0f3a7b50056831");
});

test("mexcCrypto is stable within a millisecond and changes with the clock", () => {
  const payload = { symbol: "BTC_USDT", vol: 1 };

  const first = mexcCrypto(TOKEN, payload, () => 1_700_000_000_000);
  const second = mexcCrypto(TOKEN, payload, () => 1_700_000_000_000);
  assert.deepEqual(first, { time: "1700000000000", sign: "59c09e8a1dadd1cdac0f3a7b50056831" });
  assert.deepEqual(second, first);

  const later = mexcCrypto(TOKEN, payload, () => 1_700_000_000_001);
  assert.deepEqual(later, { time: "1700000000001", sign: "6ead19e3a84a327e0f26d6cdd81e3f3e" });
});

test("generateHeaders without auth returns the default header set", () => {
  const headers = generateHeaders({ authToken: TOKEN }, { includeAuth: false, requestBody: "{}" });
  assert.deepEqual(headers, { ...MEXC_DEFAULT_HEADERS });
});

test("generateHeaders overlays user agent and custom headers before auth", () => {
  const headers = generateHeaders(
    {
      authToken: TOKEN,
      userAgent: "test-agent/1.0",
      customHeaders: { "x-trace": "abc", authorization: "overridden-later" }
    },
    { includeAuth: true }
  );

  assert.equal(headers["user-agent"], "test-agent/1.0");
  assert.equal(headers["x-trace"], "abc");
  assert.equal(headers.authorization, TOKEN);
  assert.equal(headers["x-mxc-nonce"], undefined);
  assert.equal(headers["x-mxc-sign"], undefined);
});

test("generateHeaders signs the body when one is present", () => {
  const headers = generateHeaders(
    { authToken: TOKEN },
    { includeAuth: true, requestBody: "{}", now: () => 1_700_000_000_000 }
  );

  assert.equal(headers.authorization, TOKEN);
  assert.equal(headers["x-mxc-nonce"], "1700000000000");
  assert.equal(headers["x-mxc-sign"], "311fa167f2acf01fdcc816f737dd8c80");
});
