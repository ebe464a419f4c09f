import assert from "node:assert/strict";
import test from "node:test";
import { quoteLargeIntegers } from "./mexc.rest.js";

test("quoteLargeIntegers quotes integers too long for a double", () => {
  assert.equal(
    quoteLargeIntegers('{"data":739113577038255616,"code":0}'),
    '{"data":"739113577038255616","code":0}'
  );
  assert.equal(quoteLargeIntegers("[739113577038255616, -739113577038255617]"), '["739113577038255616", "-739113577038255617"]');
});

test("quoteLargeIntegers leaves short numbers, decimals and strings alone", () => {
  const text = '{"t":1700000000000,"amount":1174512345678901.25,"e":12345678901234567e3,"note":"id 739113577038255616 \\" 739113577038255616"}';
  assert.equal(quoteLargeIntegers(text), text);
});

test("quoted ids parse back to their exact digits", () => {
  const parsed = JSON.parse(quoteLargeIntegers('{"orderId":739113577038255617}'));
  assert.equal(parsed.orderId, "739113577038255617");
});
