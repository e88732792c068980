import assert from "node:assert/strict";
import test from "node:test";
import { ZodError } from "zod";
import { defaultExtractorConfig, parseAppConfig } from "./config";

test("defaults cover budgets, money and policy", () => {
  const config = defaultExtractorConfig();

  assert.equal(config.budgets.overallMs, 12000);
  assert.equal(config.budgets.lightweightMs, 5000);
  assert.equal(config.budgets.renderedMinMs, 2500);
  assert.equal(config.domainPolicy.mode, "open");
  assert.equal(config.money.reportingCurrency, "USD");
  assert.equal(config.money.rates.SAR, "3.75");
  assert.equal(config.money.rates.KWD, "0.307");
  assert.deepEqual(config.requiredFields, ["title", "price"]);
  assert.equal(config.strictPartialRequired, false);
  assert.equal(config.rendering.enabled, false);
  assert.deepEqual(config.rendering.firstStrategies, []);
});

test("rendering needs both the flag and a browser path", () => {
  const enabled = defaultExtractorConfig({ BROWSER_EXECUTABLE_PATH: "/usr/bin/chromium" });
  assert.equal(enabled.rendering.enabled, true);
  assert.equal(enabled.rendering.executablePath, "/usr/bin/chromium");

  const switchedOff = defaultExtractorConfig({ BROWSER_EXECUTABLE_PATH: "/usr/bin/chromium", RENDER_ENABLED: "off" });
  assert.equal(switchedOff.rendering.enabled, false);
});

test("lists and rates are normalized", () => {
  const config = defaultExtractorConfig({
    CURRENCY_RATES: "eur=0.9, jpy=151",
    ALLOWED_DOMAINS: "Shop.Example.test, *.cdn.example.test",
    RENDER_FIRST_STRATEGIES: "Amazon",
    REQUIRED_FIELDS: "title,price,images",
    STRICT_PARTIAL_REQUIRED: "yes",
    REPORTING_CURRENCY: "eur"
  });

  assert.deepEqual(config.money.rates, { EUR: "0.9", JPY: "151" });
  assert.deepEqual(config.domainPolicy.allowedDomains, ["shop.example.test", "*.cdn.example.test"]);
  assert.deepEqual(config.rendering.firstStrategies, ["amazon"]);
  assert.deepEqual(config.requiredFields, ["title", "price", "images"]);
  assert.equal(config.strictPartialRequired, true);
  assert.equal(config.money.reportingCurrency, "EUR");
});

test("invalid settings are rejected", () => {
  assert.throws(() => parseAppConfig({ REQUIRED_FIELDS: "title,colour" }), ZodError);
  assert.throws(() => parseAppConfig({ RENDER_FIRST_STRATEGIES: "ebay" }), ZodError);
  assert.throws(() => parseAppConfig({ CURRENCY_RATES: "EUR=abc" }), ZodError);
  assert.throws(() => parseAppConfig({ CURRENCY_RATES: "EUR=0" }), ZodError);
  assert.throws(() => parseAppConfig({ RENDER_ENABLED: "maybe" }), ZodError);
  assert.throws(() => parseAppConfig({ MAX_REDIRECTS: "50" }), ZodError);
});

test("the extractor config is frozen", () => {
  const config = defaultExtractorConfig();
  assert.equal(Object.isFrozen(config), true);
  assert.equal(Object.isFrozen(config.money.rates), true);
  assert.equal(Object.isFrozen(config.budgets), true);
});
