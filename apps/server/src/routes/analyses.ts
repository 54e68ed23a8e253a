import { randomUUID } from "node:crypto";
import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { Hono } from "hono";
import {
  RECENT_ANALYSES_LIMIT_DEFAULT,
  analysesListResponseSchema,
  analysesQuerySchema,
  analysisDetailResponseSchema,
  applyPredictionsBodySchema,
  deleteAnalysisResponseSchema,
  feedbackBodySchema,
} from "@voicelens/shared";
import type { AnalysisQuery } from "../db/analysis-store.js";
import { NotFoundError, ValidationError } from "../lib/errors.js";
import { parseWith, readJsonBody, requireIdParam, validateResponse } from "../lib/http.js";
import type { Logger } from "../lib/logger.js";
import type { InferenceDispatcher } from "../services/inference-dispatcher.js";
import type { PersistenceCoordinator } from "../services/persistence-coordinator.js";

export interface AnalysesRouteDeps {
  coordinator: PersistenceCoordinator;
  dispatcher: InferenceDispatcher;
  /** Where uploads are written before the coordinator copies them into the vault. */
  uploadDir: string;
  logger: Logger;
}

export function createAnalysesRoutes({ coordinator, dispatcher, uploadDir, logger }: AnalysesRouteDeps): Hono {
  const app = new Hono();

  /** GET /api/analyses — list, optionally filtered by status and ordered */
  app.get("/api/analyses", async (c) => {
    const params = parseWith(analysesQuerySchema, c.req.query(), "query");
    const query: AnalysisQuery = { sendStatus: params.status, limit: params.limit };
    if (params.orderBy !== undefined || params.direction !== undefined) {
      query.orderBy = { column: params.orderBy ?? "creationDate", direction: params.direction ?? "asc" };
    }

    const analyses = await coordinator.queryAll(query);
    return c.json(validateResponse(analysesListResponseSchema, { analyses }, "analyses list"));
  });

  /** GET /api/analyses/recent — newest first */
  app.get("/api/analyses/recent", async (c) => {
    const { limit } = parseWith(analysesQuerySchema.pick({ limit: true }), c.req.query(), "query");
    const analyses = await coordinator.getRecentAnalyses(limit ?? RECENT_ANALYSES_LIMIT_DEFAULT);
    return c.json(validateResponse(analysesListResponseSchema, { analyses }, "analyses list"));
  });

  /** GET /api/analyses/:id */
  app.get("/api/analyses/:id", async (c) => {
    const id = requireIdParam(c, "id");
    const analysis = await coordinator.getAnalysisById(id);
    if (!analysis) {
      throw new NotFoundError(`Analysis ${id} not found`);
    }
    return c.json(validateResponse(analysisDetailResponseSchema, { analysis }, "analysis"));
  });

  /**
   * POST /api/analyses — multipart upload (`file`, `title`, optional
   * `description`). The upload is staged in uploadDir and removed once the
   * coordinator has copied it.
   */
  app.post("/api/analyses", async (c) => {
    const body = await c.req.parseBody();
    const file = body["file"];
    const title = body["title"];
    const description = body["description"];

    if (file === undefined || typeof file === "string") {
      throw new ValidationError('Multipart field "file" must be an audio file');
    }
    if (typeof title !== "string") {
      throw new ValidationError('Multipart field "title" is required');
    }
    if (description !== undefined && typeof description !== "string") {
      throw new ValidationError('Multipart field "description" must be text');
    }

    await mkdir(uploadDir, { recursive: true });
    const stagedPath = path.join(uploadDir, `upload-${randomUUID()}${path.extname(file.name)}`);
    await writeFile(stagedPath, Buffer.from(await file.arrayBuffer()));

    try {
      const analysis = await coordinator.importUpload({ title, description, sourcePath: stagedPath });
      return c.json(validateResponse(analysisDetailResponseSchema, { analysis }, "analysis"), 201);
    } finally {
      await rm(stagedPath, { force: true }).catch((err: unknown) => {
        logger.warn({ err, stagedPath }, "could not remove staged upload");
      });
    }
  });

  /** DELETE /api/analyses/:id — removes the record, then its vault directory */
  app.delete("/api/analyses/:id", async (c) => {
    const id = requireIdParam(c, "id");
    const outcome = await coordinator.deleteAnalysis(id);
    return c.json(
      validateResponse(deleteAnalysisResponseSchema, { deleted: true, ...outcome }, "delete analysis"),
    );
  });

  /** POST /api/analyses/:id/predictions — inference results for one channel */
  app.post("/api/analyses/:id/predictions", async (c) => {
    const id = requireIdParam(c, "id");
    const result = await readJsonBody(c, applyPredictionsBodySchema);
    const analysis = await coordinator.applyPredictions(id, result.channel, result.predictions, result.completedAt);
    return c.json(validateResponse(analysisDetailResponseSchema, { analysis }, "analysis"));
  });

  /** PUT /api/analyses/:id/feedback — user verdict on a channel */
  app.put("/api/analyses/:id/feedback", async (c) => {
    const id = requireIdParam(c, "id");
    const { channel, value } = await readJsonBody(c, feedbackBodySchema);
    const analysis = await coordinator.setFeedback(id, channel, value);
    return c.json(validateResponse(analysisDetailResponseSchema, { analysis }, "analysis"));
  });

  /** POST /api/analyses/:id/retry — re-send a failed analysis to inference */
  app.post("/api/analyses/:id/retry", async (c) => {
    const id = requireIdParam(c, "id");
    const analysis = await dispatcher.retry(id);
    return c.json(validateResponse(analysisDetailResponseSchema, { analysis }, "analysis"));
  });

  return app;
}
