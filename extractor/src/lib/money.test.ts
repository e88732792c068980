import assert from "node:assert/strict";
import test from "node:test";
import { FixedMoney, currencyExponent, divideHalfUp, formatMinorUnits, parseDecimal, toMinorUnits } from "./money";

test("currencyExponent follows ISO minor units", () => {
  assert.equal(currencyExponent("USD"), 2);
  assert.equal(currencyExponent("JPY"), 0);
  assert.equal(currencyExponent("KWD"), 3);
});

test("parseDecimal accepts canonical decimal text only", () => {
  assert.deepEqual(parseDecimal("19.99"), { digits: 1999n, scale: 2 });
  assert.deepEqual(parseDecimal("250"), { digits: 250n, scale: 0 });
  assert.equal(parseDecimal("1e5"), null);
  assert.equal(parseDecimal("-3"), null);
});

test("toMinorUnits rounds half-up", () => {
  assert.equal(toMinorUnits({ digits: 19995n, scale: 3 }, 2), 2000n);
  assert.equal(toMinorUnits({ digits: 19994n, scale: 3 }, 2), 1999n);
  assert.equal(toMinorUnits({ digits: 5n, scale: 0 }, 2), 500n);
  assert.equal(divideHalfUp(5n, 2n), 3n);
});

test("formatMinorUnits pads small amounts", () => {
  assert.equal(formatMinorUnits(5n, 2), "0.05");
  assert.equal(formatMinorUnits(1999n, 2), "19.99");
  assert.equal(formatMinorUnits(150n, 0), "150");
  assert.equal(formatMinorUnits(1234n, 3), "1.234");
});

test("FixedMoney converts through per-reporting-unit rates", () => {
  const usd = new FixedMoney(1999n, "USD");
  const one = { digits: 1n, scale: 0 };

  const sar = usd.convert("SAR", one, { digits: 375n, scale: 2 });
  assert.deepEqual(sar.toJSON(), { amount: "74.96", currency: "SAR" });

  const back = sar.convert("USD", { digits: 375n, scale: 2 }, one);
  assert.deepEqual(back.toJSON(), { amount: "19.99", currency: "USD" });

  const jpy = usd.convert("JPY", one, { digits: 150n, scale: 0 });
  assert.deepEqual(jpy.toJSON(), { amount: "2999", currency: "JPY" });
});

test("FixedMoney rejects negative amounts", () => {
  assert.throws(() => new FixedMoney(-1n, "USD"), RangeError);
});
