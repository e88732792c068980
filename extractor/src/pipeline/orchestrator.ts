import { ExtractorConfig } from "../config";
import { ErrorKind, ExtractionError, toExtractionError } from "../errors";
import { ExtractionOutcome, ExtractorContext, runExtractor } from "../extractors";
import { Budget, Clock, systemClock } from "../lib/budget";
import { Fetcher } from "../lib/fetcher";
import { Logger } from "../lib/logger";
import { PoolStatus } from "../lib/pool";
import { PlatformClassifier, requestProfile } from "../lib/platform";
import { UrlValidator } from "../lib/validator";
import {
  AttemptSummary,
  ExtractMode,
  ExtractRequest,
  ExtractionStrategy,
  FetchResult,
  ProductRecord,
  TargetURL,
  TransportKind
} from "../types";
import { EvaluatedProduct, RecordRequest, buildRecord, evaluateProduct, isComplete, pickBest } from "./record";

const DEFAULT_LANGUAGE = "en";
const DEFAULT_MODE: ExtractMode = "full";

type ExtractionState =
  | { name: "Validating" }
  | { name: "Classifying"; target: TargetURL }
  | { name: "FetchAttempt"; transport: TransportKind }
  | { name: "Extracting"; transport: TransportKind; page: FetchResult }
  | { name: "Evaluating"; page: FetchResult; outcome: ExtractionOutcome }
  | { name: "Done"; record: ProductRecord }
  | { name: "Failed"; error: ExtractionError };

type StateName = ExtractionState["name"];

export interface ExtractOptions {
  requestId?: string;
  /** Aborts in-flight I/O, e.g. when the client disconnects. */
  signal?: AbortSignal;
}

export interface OrchestratorHealth {
  rendering: "enabled" | "disabled";
  pool: PoolStatus | null;
}

export interface OrchestratorOptions {
  clock?: Clock;
}

/** Mutable bookkeeping for one request; nothing here outlives `extract`. */
interface Run {
  request: RecordRequest;
  mode: ExtractMode;
  strict: boolean;
  budget: Budget;
  logger: Logger;
  signal?: AbortSignal;
  target?: TargetURL;
  plan: TransportKind[];
  cursor: number;
  attemptStartedAt: number;
  attempts: AttemptSummary[];
  best: EvaluatedProduct | null;
  lastError: ExtractionError | null;
}

function otherTransport(transport: TransportKind): TransportKind {
  return transport === "lightweight" ? "rendered" : "lightweight";
}

export class Orchestrator {
  private readonly clock: Clock;

  constructor(
    private readonly config: ExtractorConfig,
    private readonly validator: UrlValidator,
    private readonly classifier: PlatformClassifier,
    private readonly fetcher: Fetcher,
    private readonly logger: Logger,
    options: OrchestratorOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  health(): OrchestratorHealth {
    return {
      rendering: this.fetcher.isAvailable("rendered") ? "enabled" : "disabled",
      pool: this.fetcher.poolStatus()
    };
  }

  async extract(input: ExtractRequest, options: ExtractOptions = {}): Promise<ProductRecord> {
    const mode = input.mode ?? DEFAULT_MODE;
    const run: Run = {
      request: {
        url: input.url,
        language: input.language ?? DEFAULT_LANGUAGE,
        hint: input.hint ?? null,
        strategy: "generic"
      },
      mode,
      strict: mode === "strict" || this.config.strictPartialRequired,
      budget: new Budget(this.config.budgets.overallMs, this.clock),
      logger: this.logger.child(options.requestId ? { request_id: options.requestId } : {}, "extractor.orchestrator"),
      ...(options.signal ? { signal: options.signal } : {}),
      plan: [],
      cursor: 0,
      attemptStartedAt: 0,
      attempts: [],
      best: null,
      lastError: null
    };

    run.logger.info("extraction_started", { url: input.url, mode, language: run.request.language });

    let state: ExtractionState = { name: "Validating" };
    while (state.name !== "Done" && state.name !== "Failed") {
      const next: ExtractionState = await this.step(run, state);
      this.logTransition(run, state.name, next.name);
      state = next;
    }

    if (state.name === "Failed") {
      run.logger.warn("extraction_failed", {
        kind: state.error.kind,
        message: state.error.message,
        attempts: run.attempts,
        elapsed_ms: run.budget.elapsed()
      });
      throw state.error;
    }

    run.logger.info("extraction_completed", {
      strategy: state.record.source_platform,
      transport: state.record.transport,
      complete: state.record.complete,
      missing_fields: state.record.missing_fields,
      attempts: state.record.attempts.length,
      elapsed_ms: state.record.elapsed_ms
    });
    return state.record;
  }

  private async step(run: Run, state: ExtractionState): Promise<ExtractionState> {
    switch (state.name) {
      case "Validating":
        return this.validate(run);
      case "Classifying":
        return this.classify(run, state.target);
      case "FetchAttempt":
        return this.fetchAttempt(run, state.transport);
      case "Extracting":
        return this.extractPage(run, state.transport, state.page);
      case "Evaluating":
        return this.evaluate(run, state.page, state.outcome);
      case "Done":
      case "Failed":
        return state;
    }
  }

  private async validate(run: Run): Promise<ExtractionState> {
    try {
      const target = await this.validator.validate(run.request.url, {
        timeoutMs: run.budget.slice(this.config.domainPolicy.dnsTimeoutMs)
      });
      run.target = target;
      run.request.url = target.url;
      return { name: "Classifying", target };
    } catch (error) {
      return { name: "Failed", error: toExtractionError(error, "InvalidURL") };
    }
  }

  private classify(run: Run, target: TargetURL): ExtractionState {
    const strategy = this.classifier.classify(target);
    run.request.strategy = strategy;
    run.plan = this.transportPlan(strategy, run.mode);
    run.logger.debug("strategy_selected", { host: target.host, strategy, plan: run.plan });
    return this.nextAttempt(run);
  }

  /** Lightweight first unless the strategy needs a browser; partial mode never escalates. */
  private transportPlan(strategy: ExtractionStrategy, mode: ExtractMode): TransportKind[] {
    const first: TransportKind =
      this.classifier.requiresRendering(strategy) && this.fetcher.isAvailable("rendered") ? "rendered" : "lightweight";
    return mode === "partial" ? [first] : [first, otherTransport(first)];
  }

  private minimumFor(transport: TransportKind): number {
    return transport === "lightweight" ? this.config.budgets.lightweightMinMs : this.config.budgets.renderedMinMs;
  }

  private phaseFor(transport: TransportKind): number {
    return transport === "lightweight" ? this.config.budgets.lightweightMs : this.config.budgets.renderedMs;
  }

  private nextAttempt(run: Run): ExtractionState {
    while (run.cursor < run.plan.length) {
      const transport = run.plan[run.cursor];
      run.cursor += 1;

      let skipReason: ExtractionError | null = null;
      if (run.signal?.aborted) {
        skipReason = new ExtractionError("Timeout", "request was cancelled");
      } else if (!this.fetcher.isAvailable(transport)) {
        skipReason = new ExtractionError("TransportError", `${transport} transport is not available`);
      } else if (!run.budget.allows(this.minimumFor(transport))) {
        skipReason = new ExtractionError("Timeout", `${run.budget.remaining()}ms left, ${transport} needs ${this.minimumFor(transport)}ms`, {
          remaining_ms: run.budget.remaining(),
          minimum_ms: this.minimumFor(transport)
        });
      }

      if (skipReason) {
        run.attempts.push({ transport, outcome: "skipped", elapsed_ms: 0 });
        run.lastError = run.lastError ?? skipReason;
        run.logger.debug("fetch_attempt_skipped", { transport, reason: skipReason.message });
        continue;
      }

      run.attemptStartedAt = run.budget.elapsed();
      return { name: "FetchAttempt", transport };
    }
    return this.finish(run);
  }

  private finish(run: Run): ExtractionState {
    const best = run.best;
    if (!best) {
      return {
        name: "Failed",
        error: run.lastError ?? new ExtractionError("Timeout", "no fetch attempt could start within the budget")
      };
    }
    if (run.strict && !isComplete(best)) {
      return {
        name: "Failed",
        error: new ExtractionError(
          "PartialResultInsufficient",
          `best attempt is missing ${best.missingFields.join(", ")}`,
          { missing_fields: best.missingFields, attempts: run.attempts }
        )
      };
    }
    const record = buildRecord(best, run.request, run.attempts, run.budget.elapsed(), this.config);
    return { name: "Done", record };
  }

  private attemptFailed(
    run: Run,
    transport: TransportKind,
    error: unknown,
    fallbackKind: ErrorKind = "TransportError"
  ): ExtractionState {
    const failure = toExtractionError(error, fallbackKind);
    run.attempts.push({ transport, outcome: failure.kind, elapsed_ms: this.attemptElapsed(run) });
    run.lastError = failure;
    run.logger.warn("fetch_attempt_failed", { transport, kind: failure.kind, message: failure.message });
    if (failure.kind === "ForbiddenHost") {
      return { name: "Failed", error: failure };
    }
    return this.nextAttempt(run);
  }

  private attemptElapsed(run: Run): number {
    return Math.max(0, run.budget.elapsed() - run.attemptStartedAt);
  }

  private async fetchAttempt(run: Run, transport: TransportKind): Promise<ExtractionState> {
    const target = run.target;
    if (!target) {
      return { name: "Failed", error: new ExtractionError("InvalidURL", "fetch attempted before validation") };
    }
    try {
      const page = await this.fetcher.fetch(target, transport, {
        timeoutMs: run.budget.slice(this.phaseFor(transport)),
        headers: requestProfile(run.request.strategy, run.request.language),
        ...(run.signal ? { signal: run.signal } : {})
      });
      if (page.status >= 400) {
        run.logger.debug("fetch_error_status", { transport, status: page.status, url: page.finalUrl });
      }
      return { name: "Extracting", transport, page };
    } catch (error) {
      return this.attemptFailed(run, transport, error);
    }
  }

  private async extractPage(run: Run, transport: TransportKind, page: FetchResult): Promise<ExtractionState> {
    const ctx: ExtractorContext = {
      requestedUrl: run.request.url,
      fetchJson: (url) =>
        this.fetcher.fetchJson(url, {
          timeoutMs: run.budget.slice(this.config.budgets.lightweightMs),
          headers: requestProfile(run.request.strategy, run.request.language),
          ...(run.signal ? { signal: run.signal } : {})
        }),
      logger: run.logger.child({ strategy: run.request.strategy, transport }, "extractor.extract")
    };
    try {
      const outcome = await runExtractor(run.request.strategy, page, ctx);
      return { name: "Evaluating", page, outcome };
    } catch (error) {
      // The page was fetched, so a parser failure means it holds no usable data.
      return this.attemptFailed(run, transport, error, "NoData");
    }
  }

  private evaluate(run: Run, page: FetchResult, outcome: ExtractionOutcome): ExtractionState {
    const warnings = outcome.usedGenericFallback ? [`generic_fallback: ${run.request.strategy} extractor found no data`] : [];
    const evaluated = evaluateProduct(outcome.product, page, this.config, warnings);
    if (!evaluated.product.title && !evaluated.price) {
      return this.attemptFailed(
        run,
        page.transport,
        new ExtractionError("NoData", "page has neither a title nor a readable price", {
          price_raw: evaluated.priceRaw,
          warnings: evaluated.warnings
        })
      );
    }
    const complete = isComplete(evaluated);
    run.attempts.push({
      transport: page.transport,
      outcome: complete ? "ok" : "incomplete",
      elapsed_ms: this.attemptElapsed(run)
    });
    run.best = pickBest(run.best, evaluated);

    if (complete) {
      return this.finish(run);
    }
    run.logger.debug("attempt_incomplete", { transport: page.transport, missing_fields: evaluated.missingFields });
    return this.nextAttempt(run);
  }

  private logTransition(run: Run, from: StateName, to: StateName): void {
    run.logger.debug("state_transition", {
      from,
      to,
      elapsed_ms: run.budget.elapsed(),
      remaining_ms: run.budget.remaining()
    });
  }
}
