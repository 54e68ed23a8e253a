import { Hono } from "hono";
import {
  analysisDetailResponseSchema,
  createTagBodySchema,
  tagDetailResponseSchema,
  tagsListResponseSchema,
} from "@voicelens/shared";
import type { TagStore } from "../db/tag-store.js";
import { NotFoundError } from "../lib/errors.js";
import { readJsonBody, requireIdParam, validateResponse } from "../lib/http.js";
import type { PersistenceCoordinator } from "../services/persistence-coordinator.js";

export interface TagRouteDeps {
  tags: TagStore;
  coordinator: PersistenceCoordinator;
}

export function createTagRoutes({ tags, coordinator }: TagRouteDeps): Hono {
  const app = new Hono();

  app.get("/api/tags", async (c) => {
    const all = await tags.getAllTags();
    return c.json(validateResponse(tagsListResponseSchema, { tags: all }, "tags list"));
  });

  /** POST /api/tags — returns the existing tag when the name is taken */
  app.post("/api/tags", async (c) => {
    const { name } = await readJsonBody(c, createTagBodySchema);
    const tag = await tags.saveTag(name);
    return c.json(validateResponse(tagDetailResponseSchema, { tag }, "tag"), 201);
  });

  app.delete("/api/tags/:id", async (c) => {
    const id = requireIdParam(c, "id");
    if (!(await tags.deleteTag(id))) {
      throw new NotFoundError(`Tag ${id} not found`);
    }
    return c.body(null, 204);
  });

  app.put("/api/analyses/:id/tags/:tagId", async (c) => {
    const analysisId = requireIdParam(c, "id");
    const tagId = requireIdParam(c, "tagId");
    await tags.attachTag(analysisId, tagId);
    const analysis = await requireAnalysis(analysisId);
    return c.json(validateResponse(analysisDetailResponseSchema, { analysis }, "analysis"));
  });

  app.delete("/api/analyses/:id/tags/:tagId", async (c) => {
    const analysisId = requireIdParam(c, "id");
    const tagId = requireIdParam(c, "tagId");
    await tags.detachTag(analysisId, tagId);
    const analysis = await requireAnalysis(analysisId);
    return c.json(validateResponse(analysisDetailResponseSchema, { analysis }, "analysis"));
  });

  async function requireAnalysis(id: number) {
    const analysis = await coordinator.getAnalysisById(id);
    if (!analysis) {
      throw new NotFoundError(`Analysis ${id} not found`);
    }
    return analysis;
  }

  return app;
}
