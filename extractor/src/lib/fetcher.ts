import { ExtractorConfig } from "../config";
import { ExtractionError } from "../errors";
import { FetchResult, TargetURL, TransportKind } from "../types";
import { FetchImpl, HttpTransport, RequestOptions } from "./http";
import { Logger } from "./logger";
import { ResourcePool } from "./pool";
import { RenderBrowser, RenderEngine, RenderedTransport, createRenderPool } from "./render";
import { UrlValidator } from "./validator";

export class Fetcher {
  constructor(
    private readonly validator: UrlValidator,
    private readonly http: HttpTransport,
    private readonly rendered: RenderedTransport | null,
    private readonly pool: ResourcePool<RenderBrowser> | null
  ) {}

  isAvailable(transport: TransportKind): boolean {
    return transport === "lightweight" || this.rendered !== null;
  }

  async fetch(target: TargetURL, transport: TransportKind, request: RequestOptions): Promise<FetchResult> {
    if (request.timeoutMs <= 0) {
      throw new ExtractionError("Timeout", `no time left for ${transport} fetch`);
    }
    if (transport === "lightweight") {
      return this.http.fetch(target, request);
    }
    if (!this.rendered) {
      throw new ExtractionError("TransportError", "rendered transport is not configured");
    }
    return this.rendered.fetch(target, request);
  }

  /** JSON endpoint read through the lightweight transport, validated and capped like a page. */
  async fetchJson(url: string, request: RequestOptions): Promise<unknown> {
    const target = await this.validator.validate(url, { timeoutMs: request.timeoutMs });
    const result = await this.http.fetch(target, {
      ...request,
      headers: { ...request.headers, accept: "application/json" }
    });
    if (result.status >= 400) {
      throw new ExtractionError("NoData", `json endpoint answered ${result.status}`, { url, status: result.status });
    }
    try {
      return JSON.parse(result.body.toString("utf8"));
    } catch {
      throw new ExtractionError("NoData", "json endpoint returned malformed json", { url });
    }
  }

  poolStatus(): { size: number; idle: number; in_use: number } | null {
    return this.pool ? this.pool.status() : null;
  }

  async close(): Promise<void> {
    await this.pool?.drain();
  }
}

export interface FetcherDependencies {
  resolver?: ConstructorParameters<typeof UrlValidator>[1];
  fetchImpl?: FetchImpl;
  /** Omitted or null disables the rendered transport. */
  engine?: RenderEngine | null;
}

export function createFetcher(config: ExtractorConfig, logger: Logger, deps: FetcherDependencies = {}): {
  validator: UrlValidator;
  fetcher: Fetcher;
} {
  const validator = new UrlValidator(config.domainPolicy, deps.resolver);
  const validateHop = (url: string, timeoutMs: number) => validator.validate(url, { timeoutMs });
  const http = new HttpTransport(
    {
      userAgent: config.userAgent,
      maxResponseBytes: config.fetch.maxResponseBytes,
      maxRedirects: config.fetch.maxRedirects,
      networkRetries: config.fetch.networkRetries
    },
    validateHop,
    logger.child({}, "extractor.http"),
    deps.fetchImpl
  );

  let rendered: RenderedTransport | null = null;
  let pool: ResourcePool<RenderBrowser> | null = null;
  if (deps.engine) {
    pool = createRenderPool(deps.engine, config.rendering.poolSize, logger.child({}, "extractor.pool"));
    rendered = new RenderedTransport(
      {
        userAgent: config.userAgent,
        maxResponseBytes: config.fetch.maxResponseBytes,
        settleMs: config.budgets.renderSettleMs,
        idleMs: config.budgets.renderIdleMs,
        queueWaitMs: config.rendering.queueWaitMs
      },
      pool,
      validateHop,
      logger.child({}, "extractor.render")
    );
  }

  return { validator, fetcher: new Fetcher(validator, http, rendered, pool) };
}
