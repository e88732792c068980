import assert from "node:assert/strict";
import test from "node:test";
import request from "supertest";
import { createApp } from "../app";
import { ExtractionError } from "../errors";
import { Logger } from "../lib/logger";
import { ExtractOptions } from "../pipeline/orchestrator";
import { ExtractRequest, ProductRecord } from "../types";
import { ExtractionService } from "./extractRoutes";

const logger = new Logger("extractor.routes.test", "error");

const RECORD: ProductRecord = {
  url: "https://example-shop.test/item/42",
  final_url: "https://example-shop.test/item/42",
  canonical_url: "https://example-shop.test/item/42",
  title: "Ceramic Mug",
  price: { amount: "19.99", currency: "USD" },
  price_raw: "$19.99",
  converted_price: { amount: "19.99", currency: "USD" },
  price_converted: false,
  images: [],
  category: null,
  breadcrumbs: [],
  variants: {},
  selected_variant: null,
  specifications: {},
  source_platform: "generic",
  transport: "lightweight",
  complete: true,
  missing_fields: [],
  language: "en",
  hint: null,
  attempts: [{ transport: "lightweight", outcome: "ok", elapsed_ms: 4 }],
  warnings: [],
  elapsed_ms: 4
};

class FakeService implements ExtractionService {
  calls: Array<{ input: ExtractRequest; options: ExtractOptions }> = [];

  constructor(private readonly outcome: () => Promise<ProductRecord>) {}

  health(): ReturnType<ExtractionService["health"]> {
    return { rendering: "disabled", pool: null };
  }

  async extract(input: ExtractRequest, options: ExtractOptions = {}): Promise<ProductRecord> {
    this.calls.push({ input, options });
    return this.outcome();
  }
}

test("GET /health reports rendering availability", async () => {
  const app = createApp(new FakeService(async () => RECORD), logger);

  const response = await request(app).get("/health");

  assert.equal(response.status, 200);
  assert.equal(response.body.ok, true);
  assert.equal(response.body.rendering, "disabled");
  assert.equal(response.body.pool, null);
  assert.equal(typeof response.body.timestamp, "string");
});

test("POST /extract returns the record and echoes the request id", async () => {
  const service = new FakeService(async () => RECORD);
  const app = createApp(service, logger);

  const response = await request(app)
    .post("/extract")
    .set("X-Request-Id", "req-123")
    .send({ url: RECORD.url, mode: "strict", hint: { label: "mug" } });

  assert.equal(response.status, 200);
  assert.equal(response.headers["x-request-id"], "req-123");
  assert.deepEqual(response.body, RECORD);
  assert.equal(service.calls.length, 1);
  assert.deepEqual(service.calls[0].input, { url: RECORD.url, mode: "strict", hint: { label: "mug" } });
  assert.equal(service.calls[0].options.requestId, "req-123");
  assert.equal(service.calls[0].options.signal?.aborted, false);
});

test("POST /extract maps extraction errors to status codes", async () => {
  const cases: Array<[ExtractionError, number]> = [
    [new ExtractionError("ForbiddenHost", "host resolves to a blocked address"), 403],
    [new ExtractionError("PartialResultInsufficient", "best attempt is missing price"), 422],
    [new ExtractionError("Timeout", "deadline exceeded"), 504],
    [new ExtractionError("ResourceExhausted", "no rendering slot"), 503]
  ];

  for (const [error, status] of cases) {
    const app = createApp(
      new FakeService(async () => {
        throw error;
      }),
      logger
    );
    const response = await request(app).post("/extract").send({ url: RECORD.url });

    assert.equal(response.status, status);
    assert.deepEqual(response.body, { error: { kind: error.kind, message: error.message } });
  }
});

test("POST /extract rejects a body without a url and never calls the service", async () => {
  const service = new FakeService(async () => RECORD);
  const app = createApp(service, logger);

  const response = await request(app).post("/extract").send({ mode: "eventually" });

  assert.equal(response.status, 400);
  assert.equal(response.body.error.kind, "InvalidURL");
  assert.equal(typeof response.headers["x-request-id"], "string");
  assert.equal(service.calls.length, 0);
});

test("POST /extract rejects a language that is not a language tag", async () => {
  const service = new FakeService(async () => RECORD);
  const app = createApp(service, logger);

  const response = await request(app)
    .post("/extract")
    .send({ url: "https://example-shop.test/item/42", language: "العربية" });

  assert.equal(response.status, 400);
  assert.equal(response.body.error.kind, "InvalidURL");
  assert.equal(service.calls.length, 0);
});

test("an unexpected failure is a 500 with a public error kind", async () => {
  class BrokenHealthService extends FakeService {
    health(): ReturnType<ExtractionService["health"]> {
      throw new Error("pool state unavailable");
    }
  }
  const app = createApp(new BrokenHealthService(async () => RECORD), logger);

  const response = await request(app).get("/health");

  assert.equal(response.status, 500);
  assert.deepEqual(response.body, { error: { kind: "TransportError", message: "pool state unavailable" } });
});

test("malformed json is a 400", async () => {
  const app = createApp(new FakeService(async () => RECORD), logger);

  const response = await request(app).post("/extract").set("content-type", "application/json").send("{\"url\":");

  assert.equal(response.status, 400);
  assert.deepEqual(response.body, { error: { kind: "InvalidURL", message: "request body is not valid json" } });
});
