import express, { Express, NextFunction, Request, Response } from "express";
import { Logger } from "./lib/logger";
import { ExtractionService, createExtractRouter } from "./routes/extractRoutes";

export function createApp(service: ExtractionService, logger: Logger): Express {
  const app = express();
  const serverLogger = logger.child({}, "extractor.server");
  app.disable("x-powered-by");
  app.use(express.json({ limit: "64kb" }));

  app.use((request: Request, response: Response, next: NextFunction) => {
    const started = Date.now();
    response.on("finish", () => {
      serverLogger.info("http_request", {
        method: request.method,
        path: request.path,
        status_code: response.statusCode,
        duration_ms: Date.now() - started
      });
    });
    next();
  });

  app.use("/", createExtractRouter(service, logger));

  app.use((error: unknown, _request: Request, response: Response, _next: NextFunction) => {
    // express.json() reports a malformed body as a SyntaxError.
    if (error instanceof SyntaxError) {
      response.status(400).json({ error: { kind: "InvalidURL", message: "request body is not valid json" } });
      return;
    }
    const message = error instanceof Error ? error.message : "internal server error";
    serverLogger.error("unhandled_error", { error });
    response.status(500).json({ error: { kind: "TransportError", message } });
  });

  return app;
}
