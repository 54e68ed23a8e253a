import { Hono } from "hono";
import { healthResponseSchema, type ErrorResponseFromSchema, type HealthResponse } from "@voicelens/shared";
import type { TagStore } from "./db/tag-store.js";
import { VoiceLensError, type ErrorCode } from "./lib/errors.js";
import { validateResponse } from "./lib/http.js";
import type { Logger } from "./lib/logger.js";
import { createAnalysesRoutes } from "./routes/analyses.js";
import { createTagRoutes } from "./routes/tags.js";
import type { InferenceDispatcher } from "./services/inference-dispatcher.js";
import type { PersistenceCoordinator } from "./services/persistence-coordinator.js";

export interface AppDeps {
  coordinator: PersistenceCoordinator;
  dispatcher: InferenceDispatcher;
  tags: TagStore;
  uploadDir: string;
  logger: Logger;
}

const STATUS_BY_CODE = {
  VALIDATION_FAILED: 400,
  NOT_FOUND: 404,
  INVALID_TRANSITION: 409,
  STORAGE_FAILED: 500,
  FILESYSTEM_FAILED: 500,
} as const satisfies Record<ErrorCode, number>;

export function createApp(deps: AppDeps): Hono {
  const { logger } = deps;
  const app = new Hono();

  app.get("/", (context) => {
    return context.text("VoiceLens server running");
  });

  app.get("/health", (context) => {
    const payload: HealthResponse = {
      status: "ok",
    };
    return context.json(validateResponse(healthResponseSchema, payload, "/health"));
  });

  app.route("/", createAnalysesRoutes(deps));
  app.route("/", createTagRoutes(deps));

  app.notFound((context) => {
    const body: ErrorResponseFromSchema = { error: "Route not found", code: "NOT_FOUND" };
    return context.json(body, 404);
  });

  app.onError((err, context) => {
    if (err instanceof VoiceLensError) {
      const status = STATUS_BY_CODE[err.code];
      if (status >= 500) {
        logger.error({ err, path: context.req.path }, "request failed");
      } else {
        logger.debug({ err, path: context.req.path }, "request rejected");
      }
      const body: ErrorResponseFromSchema = { error: err.message, code: err.code };
      return context.json(body, status);
    }

    logger.error({ err, path: context.req.path }, "unhandled error");
    const body: ErrorResponseFromSchema = { error: "Internal server error", code: "INTERNAL" };
    return context.json(body, 500);
  });

  return app;
}
