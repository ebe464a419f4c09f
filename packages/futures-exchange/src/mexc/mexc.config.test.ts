import assert from "node:assert/strict";
import test from "node:test";
import { loadMexcFuturesConfigFromEnv, resolveMexcFuturesSettings } from "./mexc.config.js";
import { MexcValidationError } from "./mexc.errors.js";

test("resolveMexcFuturesSettings fills defaults", () => {
  assert.deepEqual(resolveMexcFuturesSettings({ authToken: " WEB-test-token " }), {
    authToken: "WEB-test-token",
    baseUrl: "https://futures.mexc.com/api/v1",
    timeoutMs: 30_000,
    customHeaders: {},
    logLevel: "warn"
  });
});

test("resolveMexcFuturesSettings requires a token", () => {
  assert.throws(
    () => resolveMexcFuturesSettings({ authToken: "   " }),
    (error: unknown) => {
      assert.ok(error instanceof MexcValidationError);
      assert.equal(error.field, "authToken");
      assert.equal(error.message, "Invalid client configuration: authToken: authToken is required");
      return true;
    }
  );
});

test("resolveMexcFuturesSettings rejects unknown log levels and bad timeouts", () => {
  assert.throws(
    () => resolveMexcFuturesSettings({ authToken: "WEB-test-token", logLevel: "loud" }),
    { message: "Invalid client configuration: logLevel: Unknown log level 'loud'" }
  );
  assert.throws(
    () => resolveMexcFuturesSettings({ authToken: "WEB-test-token", timeoutMs: 0 }),
    (error: unknown) => error instanceof MexcValidationError && error.field === "timeoutMs"
  );
});

test("loadMexcFuturesConfigFromEnv reads the MEXC_ variables", () => {
  const settings = loadMexcFuturesConfigFromEnv({
    MEXC_WEB_TOKEN: " WEB-test-token ",
    MEXC_FUTURES_BASE_URL: "https://example.test/api/v1/",
    MEXC_TIMEOUT_MS: "5000",
    MEXC_USER_AGENT: "test-agent/1.0",
    MEXC_LOG_LEVEL: "DEBUG"
  });

  assert.deepEqual(resolveMexcFuturesSettings(settings), {
    authToken: "WEB-test-token",
    baseUrl: "https://example.test/api/v1",
    timeoutMs: 5_000,
    userAgent: "test-agent/1.0",
    customHeaders: {},
    logLevel: "debug"
  });
});

test("loadMexcFuturesConfigFromEnv falls back to WEB_TOKEN", () => {
  const settings = loadMexcFuturesConfigFromEnv({ WEB_TOKEN: "WEB-other-token" });
  assert.equal(settings.authToken, "WEB-other-token");
  assert.equal(settings.timeoutMs, undefined);
  assert.equal(resolveMexcFuturesSettings(settings).timeoutMs, 30_000);
});

test("a missing token only fails once the settings are resolved", () => {
  const settings = loadMexcFuturesConfigFromEnv({});
  assert.equal(settings.authToken, "");
  assert.throws(() => resolveMexcFuturesSettings(settings), MexcValidationError);
});
