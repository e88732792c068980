import { ExtractionError, isExtractionError, toExtractionError } from "../errors";
import { FetchResult, TargetURL } from "../types";
import { deadlineSignal } from "./budget";
import { Logger } from "./logger";
import { PinnedDispatcher, pinnedDispatcher } from "./pinning";

export type FetchImpl = (input: string, init: RequestInit) => Promise<Response>;

/** Re-validates a redirect target; same contract as `UrlValidator.validate`. */
export type HopValidator = (url: string, timeoutMs: number) => Promise<TargetURL>;

export type DispatcherFactory = (target: TargetURL) => PinnedDispatcher;

export interface HttpRuntimeConfig {
  userAgent: string;
  maxResponseBytes: number;
  maxRedirects: number;
  networkRetries: number;
}

export interface RequestOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "EPIPE",
  "ECONNABORTED",
  "UND_ERR_SOCKET",
  "UND_ERR_CLOSED"
]);

function causeCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 3 && current instanceof Error; depth += 1) {
    if ("code" in current && typeof current.code === "string") {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}

export function isTransientNetworkError(error: unknown): boolean {
  const code = causeCode(error);
  if (code && TRANSIENT_CODES.has(code)) {
    return true;
  }
  const message = error instanceof Error ? `${error.message} ${error.cause instanceof Error ? error.cause.message : ""}` : "";
  return /socket hang up|other side closed/i.test(message);
}

function abortedError(signal: AbortSignal, timeoutMs: number): ExtractionError {
  if (isExtractionError(signal.reason)) {
    return signal.reason;
  }
  return new ExtractionError("Timeout", `request aborted after ${timeoutMs}ms`, { timeout_ms: timeoutMs });
}

async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel().catch(() => undefined);
  }
}

/** Reads at most `maxBytes`; a larger body is cancelled mid-stream. */
export async function readCappedBody(response: Response, maxBytes: number): Promise<Buffer> {
  const declared = Number.parseInt(response.headers.get("content-length") ?? "", 10);
  if (Number.isFinite(declared) && declared > maxBytes) {
    await discardBody(response);
    throw new ExtractionError("TooLarge", `declared body of ${declared} bytes exceeds ${maxBytes}`, {
      declared_bytes: declared,
      max_bytes: maxBytes
    });
  }
  if (!response.body) {
    return Buffer.alloc(0);
  }

  const reader = response.body.getReader();
  const chunks: Buffer[] = [];
  let total = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel().catch(() => undefined);
      throw new ExtractionError("TooLarge", `body exceeds ${maxBytes} bytes`, { max_bytes: maxBytes });
    }
    chunks.push(Buffer.from(value));
  }
  return Buffer.concat(chunks, total);
}

/**
 * Plain HTTP transport: manual redirects (each hop re-validated), byte cap, deadline,
 * and a small number of retries for connection-level failures. Every hop connects only
 * to the addresses it was validated against.
 */
export class HttpTransport {
  constructor(
    private readonly runtime: HttpRuntimeConfig,
    private readonly validateHop: HopValidator,
    private readonly logger: Logger,
    private readonly fetchImpl: FetchImpl = fetch,
    private readonly dispatcherFor: DispatcherFactory = pinnedDispatcher
  ) {}

  async fetch(target: TargetURL, request: RequestOptions): Promise<FetchResult> {
    const started = Date.now();
    const deadline = deadlineSignal(request.timeoutMs, request.signal);
    const headers = new Headers(request.headers);
    if (!headers.has("user-agent")) {
      headers.set("user-agent", this.runtime.userAgent);
    }

    const redirects: string[] = [];
    let hop = target;
    try {
      for (;;) {
        const dispatcher = this.dispatcherFor(hop);
        try {
          const response = await this.send(hop.url, headers, deadline.signal, request.timeoutMs, dispatcher);
          const location = response.headers.get("location");

          if (REDIRECT_STATUSES.has(response.status) && location) {
            await discardBody(response);
            if (redirects.length >= this.runtime.maxRedirects) {
              throw new ExtractionError("TransportError", `more than ${this.runtime.maxRedirects} redirects`, {
                redirects
              });
            }
            let next: string;
            try {
              next = new URL(location, hop.url).href;
            } catch {
              throw new ExtractionError("InvalidURL", `redirect location ${location} is not a url`);
            }
            const remaining = request.timeoutMs - (Date.now() - started);
            const validated = await this.validateHop(next, remaining);
            this.logger.debug("redirect_followed", { from: hop.url, to: validated.url, status: response.status });
            redirects.push(validated.url);
            hop = validated;
            continue;
          }

          const body = await readCappedBody(response, this.runtime.maxResponseBytes);
          return {
            requestedUrl: target.url,
            finalUrl: hop.url,
            transport: "lightweight",
            status: response.status,
            contentType: response.headers.get("content-type") ?? "",
            body,
            elapsedMs: Date.now() - started,
            redirects
          };
        } finally {
          await dispatcher
            .destroy()
            .catch((error: unknown) => this.logger.debug("dispatcher_destroy_failed", { error }));
        }
      }
    } catch (error) {
      if (isExtractionError(error)) {
        throw error;
      }
      if (deadline.signal.aborted) {
        throw abortedError(deadline.signal, request.timeoutMs);
      }
      throw toExtractionError(error, "TransportError");
    } finally {
      deadline.dispose();
    }
  }

  private async send(
    url: string,
    headers: Headers,
    signal: AbortSignal,
    timeoutMs: number,
    dispatcher: PinnedDispatcher
  ): Promise<Response> {
    for (let attempt = 0; ; attempt += 1) {
      try {
        return await this.fetchImpl(url, { method: "GET", headers, redirect: "manual", signal, dispatcher });
      } catch (error) {
        if (signal.aborted) {
          throw abortedError(signal, timeoutMs);
        }
        if (attempt < this.runtime.networkRetries && isTransientNetworkError(error)) {
          this.logger.warn("fetch_retry", { url, attempt: attempt + 1, error });
          continue;
        }
        throw toExtractionError(error, "TransportError");
      }
    }
  }
}
