import puppeteer, { Browser, HTTPRequest, Page } from "puppeteer-core";
import { ExtractionError, isErrorKind, toExtractionError } from "../errors";
import { FetchResult, TargetURL } from "../types";
import { deadlineSignal, withTimeout } from "./budget";
import { HopValidator, RequestOptions } from "./http";
import { Logger } from "./logger";
import { ResourcePool } from "./pool";

export interface InterceptedRequest {
  url: string;
  resourceType: string;
  isNavigation: boolean;
  isMainFrame: boolean;
  abort(): Promise<void>;
  continue(): Promise<void>;
}

export interface RenderPage {
  setUserAgent(userAgent: string): Promise<void>;
  setExtraHeaders(headers: Record<string, string>): Promise<void>;
  /** Turns on interception; every request is held until the handler aborts or continues it. */
  interceptRequests(handler: (request: InterceptedRequest) => Promise<void>): Promise<void>;
  goto(url: string, timeoutMs: number): Promise<number | null>;
  waitForNetworkIdle(idleMs: number, timeoutMs: number): Promise<void>;
  content(): Promise<string>;
  url(): string;
  close(): Promise<void>;
}

export interface RenderBrowser {
  newPage(): Promise<RenderPage>;
  isConnected(): boolean;
  close(): Promise<void>;
}

/** The browser capability behind the rendered transport. */
export interface RenderEngine {
  launch(): Promise<RenderBrowser>;
}

export interface RenderRuntimeConfig {
  userAgent: string;
  maxResponseBytes: number;
  settleMs: number;
  idleMs: number;
  queueWaitMs: number;
}

const BLOCKED_RESOURCE_TYPES = new Set(["image", "media", "font"]);

export function createRenderPool(engine: RenderEngine, size: number, logger: Logger): ResourcePool<RenderBrowser> {
  return new ResourcePool<RenderBrowser>(
    {
      create: () => engine.launch(),
      destroy: (browser) => browser.close(),
      isHealthy: (browser) => browser.isConnected()
    },
    size,
    logger
  );
}

export class RenderedTransport {
  constructor(
    private readonly runtime: RenderRuntimeConfig,
    private readonly pool: ResourcePool<RenderBrowser>,
    private readonly validateHop: HopValidator,
    private readonly logger: Logger
  ) {}

  async fetch(target: TargetURL, request: RequestOptions): Promise<FetchResult> {
    const started = Date.now();
    if (request.signal?.aborted) {
      throw new ExtractionError("Timeout", "request cancelled before rendering");
    }
    const deadline = deadlineSignal(request.timeoutMs, request.signal);
    let openPage: RenderPage | undefined;
    const closeOpenPage = (): void => {
      const page = openPage;
      openPage = undefined;
      void page?.close().catch((error: unknown) => this.logger.warn("render_page_close_failed", { error }));
    };
    deadline.signal.addEventListener("abort", closeOpenPage, { once: true });

    const rendering = this.pool.use(
      async (browser) => {
        const page = await browser.newPage();
        openPage = page;
        try {
          if (deadline.signal.aborted) {
            throw new ExtractionError("Timeout", "deadline passed before navigation", { timeout_ms: request.timeoutMs });
          }
          return await this.render(page, target, request, started);
        } finally {
          if (openPage === page) {
            openPage = undefined;
            await page.close().catch((error: unknown) => this.logger.warn("render_page_close_failed", { error }));
          }
        }
      },
      { waitMs: Math.min(this.runtime.queueWaitMs, request.timeoutMs), signal: deadline.signal }
    );

    try {
      return await withTimeout(rendering, request.timeoutMs, `rendered fetch of ${target.host}`, closeOpenPage);
    } catch (error) {
      // Closing the page on a deadline makes puppeteer fail with "Target closed"; report the deadline.
      if (deadline.signal.aborted && !isErrorKind(error, "ForbiddenHost")) {
        throw toExtractionError(deadline.signal.reason, "Timeout");
      }
      throw toExtractionError(error, "TransportError");
    } finally {
      deadline.signal.removeEventListener("abort", closeOpenPage);
      deadline.dispose();
    }
  }

  /**
   * Every http(s) request the page makes is checked against the host policy, once per
   * host; other schemes apart from `data:` and `blob:` are refused.
   */
  private hostGuard(target: TargetURL, remaining: () => number): (url: string) => Promise<void> {
    const checked = new Map<string, Promise<void>>([[target.host, Promise.resolve()]]);
    return (url) => {
      let parsed: URL;
      try {
        parsed = new URL(url);
      } catch {
        return Promise.reject(new ExtractionError("InvalidURL", "page requested an unparseable url"));
      }
      if (parsed.protocol === "data:" || parsed.protocol === "blob:") {
        return Promise.resolve();
      }
      if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
        return Promise.reject(new ExtractionError("ForbiddenHost", `scheme ${parsed.protocol} is not allowed`));
      }
      const host = parsed.hostname.toLowerCase().replace(/\.$/, "");
      let check = checked.get(host);
      if (!check) {
        check = this.validateHop(parsed.href, remaining()).then(() => undefined);
        checked.set(host, check);
      }
      return check;
    };
  }

  private async render(page: RenderPage, target: TargetURL, request: RequestOptions, started: number): Promise<FetchResult> {
    const remaining = (): number => Math.max(0, request.timeoutMs - (Date.now() - started));
    const timeLeft = (stage: string): number => {
      const left = remaining();
      if (left <= 0) {
        throw new ExtractionError("Timeout", `no time left for ${stage}`, { timeout_ms: request.timeoutMs });
      }
      return left;
    };
    const guard = this.hostGuard(target, remaining);
    const redirects: string[] = [];
    let navigationError: ExtractionError | undefined;
    let lastAllowed = target.url;

    await page.setUserAgent(this.runtime.userAgent);
    if (request.headers) {
      await page.setExtraHeaders(request.headers);
    }
    await page.interceptRequests(async (intercepted) => {
      const mainNavigation = intercepted.isNavigation && intercepted.isMainFrame;
      try {
        if (!mainNavigation && BLOCKED_RESOURCE_TYPES.has(intercepted.resourceType)) {
          await intercepted.abort();
          return;
        }
        await guard(intercepted.url);
        if (mainNavigation && intercepted.url !== lastAllowed) {
          redirects.push(intercepted.url);
          lastAllowed = intercepted.url;
        }
        await intercepted.continue();
      } catch (error) {
        const blocked = toExtractionError(error, "ForbiddenHost");
        if (mainNavigation) {
          navigationError = blocked;
          this.logger.warn("render_navigation_blocked", { url: intercepted.url, kind: blocked.kind });
        } else {
          this.logger.warn("render_subrequest_blocked", {
            url: intercepted.url,
            resource_type: intercepted.resourceType,
            kind: blocked.kind
          });
        }
        await intercepted
          .abort()
          .catch((abortError: unknown) => this.logger.debug("render_abort_failed", { error: abortError }));
      }
    });

    let status: number | null;
    try {
      status = await page.goto(target.url, timeLeft("navigation"));
    } catch (error) {
      throw navigationError ?? toExtractionError(error, "TransportError");
    }
    if (navigationError) {
      throw navigationError;
    }

    const settleMs = Math.min(this.runtime.settleMs, remaining());
    if (settleMs > 0) {
      try {
        await page.waitForNetworkIdle(this.runtime.idleMs, settleMs);
      } catch (error) {
        this.logger.debug("render_settle_cutoff", { settle_ms: settleMs, reason: error instanceof Error ? error.message : "unknown" });
      }
    }
    if (navigationError) {
      throw navigationError;
    }

    const html = await page.content();
    const body = Buffer.from(html, "utf8");
    if (body.byteLength > this.runtime.maxResponseBytes) {
      throw new ExtractionError("TooLarge", `rendered document exceeds ${this.runtime.maxResponseBytes} bytes`, {
        max_bytes: this.runtime.maxResponseBytes
      });
    }

    return {
      requestedUrl: target.url,
      finalUrl: page.url() || lastAllowed,
      transport: "rendered",
      status: status ?? 200,
      contentType: "text/html; charset=utf-8",
      body,
      elapsedMs: Date.now() - started,
      redirects
    };
  }
}

/**
 * Waits up to `timeoutMs` for a resource; one that only arrives after the caller gave
 * up is handed to `release` instead of being left running.
 */
export async function acquireWithin<T>(
  pending: Promise<T>,
  timeoutMs: number,
  label: string,
  release: (late: T) => Promise<void>,
  logger: Logger
): Promise<T> {
  let abandoned = false;
  const settled = pending.then(async (resource) => {
    if (abandoned) {
      logger.warn("late_resource_released", { label });
      await release(resource);
    }
    return resource;
  });
  return await withTimeout(settled, timeoutMs, label, () => {
    abandoned = true;
    void settled.catch((error: unknown) => logger.warn("late_resource_failed", { label, error }));
  });
}

function adaptRequest(request: HTTPRequest, page: Page): InterceptedRequest {
  return {
    url: request.url(),
    resourceType: request.resourceType(),
    isNavigation: request.isNavigationRequest(),
    isMainFrame: request.frame() === page.mainFrame(),
    abort: () => request.abort("blockedbyclient"),
    continue: () => request.continue()
  };
}

class PuppeteerPage implements RenderPage {
  constructor(private readonly page: Page, private readonly logger: Logger) {}

  setUserAgent(userAgent: string): Promise<void> {
    return this.page.setUserAgent(userAgent);
  }

  setExtraHeaders(headers: Record<string, string>): Promise<void> {
    return this.page.setExtraHTTPHeaders(headers);
  }

  async interceptRequests(handler: (request: InterceptedRequest) => Promise<void>): Promise<void> {
    await this.page.setRequestInterception(true);
    this.page.on("request", (request) => {
      handler(adaptRequest(request, this.page)).catch((error: unknown) => {
        this.logger.warn("render_request_handler_failed", { url: request.url(), error });
      });
    });
  }

  async goto(url: string, timeoutMs: number): Promise<number | null> {
    const response = await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs });
    return response ? response.status() : null;
  }

  waitForNetworkIdle(idleMs: number, timeoutMs: number): Promise<void> {
    return this.page.waitForNetworkIdle({ idleTime: idleMs, timeout: timeoutMs });
  }

  content(): Promise<string> {
    return this.page.content();
  }

  url(): string {
    return this.page.url();
  }

  close(): Promise<void> {
    return this.page.close();
  }
}

class PuppeteerBrowser implements RenderBrowser {
  constructor(private readonly browser: Browser, private readonly logger: Logger) {}

  async newPage(): Promise<RenderPage> {
    return new PuppeteerPage(await this.browser.newPage(), this.logger);
  }

  isConnected(): boolean {
    return this.browser.connected;
  }

  close(): Promise<void> {
    return this.browser.close();
  }
}

/** Headless Chromium through puppeteer-core; the browser binary is provided by the host. */
export class PuppeteerEngine implements RenderEngine {
  constructor(
    private readonly executablePath: string,
    private readonly logger: Logger,
    private readonly launchTimeoutMs = 15_000
  ) {}

  async launch(): Promise<RenderBrowser> {
    const browser = await acquireWithin(
      puppeteer.launch({
        headless: true,
        executablePath: this.executablePath,
        args: ["--no-sandbox", "--disable-setuid-sandbox", "--disable-dev-shm-usage", "--disable-gpu"]
      }),
      this.launchTimeoutMs,
      "browser launch",
      (late) => late.close(),
      this.logger
    );
    this.logger.info("browser_launched", { executable_path: this.executablePath });
    return new PuppeteerBrowser(browser, this.logger);
  }
}
