import { randomUUID } from "node:crypto";
import { Router } from "express";
import { httpStatusFor, toExtractionError } from "../errors";
import { Logger } from "../lib/logger";
import { Orchestrator } from "../pipeline/orchestrator";
import { ExtractRequestSchema } from "../types";

export type ExtractionService = Pick<Orchestrator, "extract" | "health">;

const REQUEST_ID_PATTERN = /^[\w.:-]{1,128}$/;

function requestIdFrom(header: string | undefined): string {
  return header && REQUEST_ID_PATTERN.test(header) ? header : randomUUID();
}

export function createExtractRouter(service: ExtractionService, logger: Logger): Router {
  const router = Router();
  const routeLogger = logger.child({}, "extractor.routes");

  router.get("/health", (_request, response) => {
    const health = service.health();
    routeLogger.debug("health_requested", { ...health });
    response.json({ ok: true, ...health, timestamp: new Date().toISOString() });
  });

  router.post("/extract", async (request, response) => {
    const requestId = requestIdFrom(request.get("x-request-id"));
    response.setHeader("X-Request-Id", requestId);

    const parsed = ExtractRequestSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      routeLogger.warn("extract_request_invalid", { request_id: requestId, errors: parsed.error.flatten() });
      response.status(400).json({
        error: { kind: "InvalidURL", message: "request body must include a url", details: parsed.error.flatten() }
      });
      return;
    }

    // Client went away before the answer: stop fetching on its behalf.
    const controller = new AbortController();
    response.on("close", () => {
      if (!response.writableEnded) {
        controller.abort();
      }
    });

    try {
      const record = await service.extract(parsed.data, { requestId, signal: controller.signal });
      response.json(record);
    } catch (error) {
      const failure = toExtractionError(error);
      routeLogger.warn("extract_request_failed", { request_id: requestId, kind: failure.kind, message: failure.message });
      if (response.headersSent || controller.signal.aborted) {
        return;
      }
      response.status(httpStatusFor(failure.kind)).json({ error: { kind: failure.kind, message: failure.message } });
    }
  });

  return router;
}
