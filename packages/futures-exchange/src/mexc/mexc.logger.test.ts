import assert from "node:assert/strict";
import test from "node:test";
import { createMexcLogger, parseLogLevel } from "./mexc.logger.js";

test("parseLogLevel is case-insensitive", () => {
  assert.equal(parseLogLevel(" INFO "), "info");
  assert.equal(parseLogLevel("silent"), "silent");
  assert.equal(parseLogLevel("trace"), undefined);
});

test("logger drops entries below its level", () => {
  const lines: string[] = [];
  const logger = createMexcLogger("warn", (line) => lines.push(line));

  logger.debug("hidden");
  logger.info("hidden");
  logger.warn("shown", { symbol: "BTC_USDT" });
  logger.error("also shown");

  assert.equal(lines.length, 2);
  const first = JSON.parse(lines[0] ?? "{}");
  assert.equal(first.level, "warn");
  assert.equal(first.msg, "shown");
  assert.equal(first.symbol, "BTC_USDT");
  assert.equal(typeof first.time, "number");
  assert.equal(logger.isDebugEnabled(), false);
});

test("silent logger writes nothing and debug logger writes everything", () => {
  const quiet: string[] = [];
  const silent = createMexcLogger("silent", (line) => quiet.push(line));
  silent.error("nope");
  assert.deepEqual(quiet, []);

  const loud: string[] = [];
  const debug = createMexcLogger("debug", (line) => loud.push(line));
  debug.debug("a");
  debug.info("b");
  assert.equal(loud.length, 2);
  assert.equal(debug.isDebugEnabled(), true);
});
