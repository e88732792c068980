import dotenv from "dotenv";
import { createApp } from "./app";
import { parseAppConfig, toExtractorConfig } from "./config";
import { createFetcher } from "./lib/fetcher";
import { Logger } from "./lib/logger";
import { PlatformClassifier } from "./lib/platform";
import { PuppeteerEngine } from "./lib/render";
import { Orchestrator } from "./pipeline/orchestrator";

dotenv.config();

const appConfig = parseAppConfig(process.env);
const config = toExtractorConfig(appConfig);
const logger = new Logger("extractor.server", appConfig.LOG_LEVEL);

const engine =
  config.rendering.enabled && config.rendering.executablePath
    ? new PuppeteerEngine(config.rendering.executablePath, logger.child({}, "extractor.browser"))
    : null;
const { validator, fetcher } = createFetcher(config, logger, { engine });
const classifier = new PlatformClassifier({
  shopifyDomains: config.shopifyDomains,
  renderFirstStrategies: config.rendering.firstStrategies
});
const orchestrator = new Orchestrator(config, validator, classifier, fetcher, logger);

const app = createApp(orchestrator, logger);

const server = app.listen(appConfig.PORT, () => {
  logger.info("server_started", {
    port: appConfig.PORT,
    log_level: appConfig.LOG_LEVEL,
    domain_policy: config.domainPolicy.mode,
    rendering: engine ? "enabled" : "disabled",
    render_pool_size: config.rendering.poolSize,
    overall_timeout_ms: config.budgets.overallMs,
    reporting_currency: config.money.reportingCurrency,
    required_fields: config.requiredFields,
    strict_partial_required: config.strictPartialRequired
  });
});

let shuttingDown = false;

const shutdown = async (): Promise<void> => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info("shutdown_started");
  await new Promise<void>((resolve) => {
    server.close((error) => {
      if (error) {
        logger.warn("server_close_failed", { error });
      }
      resolve();
    });
  });
  await fetcher.close();
  logger.info("shutdown_completed");
};

const onSignal = (): void => {
  shutdown().catch((error: unknown) => {
    logger.error("shutdown_failed", { error });
    process.exitCode = 1;
  });
};

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);
