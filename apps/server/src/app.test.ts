import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Hono } from "hono";
import { sql } from "drizzle-orm";
import { createApp } from "./app.js";
import { SqliteAnalysisStore } from "./db/analysis-store.js";
import { openDatabase, type OpenedDatabase } from "./db/index.js";
import { SqliteTagStore } from "./db/tag-store.js";
import { FileVault } from "./lib/file-vault.js";
import { silentLogger } from "./lib/logger.js";
import { InferenceDispatcher, unconfiguredInferenceClient } from "./services/inference-dispatcher.js";
import { PersistenceCoordinator } from "./services/persistence-coordinator.js";

let tempDir: string;
let uploadDir: string;
let opened: OpenedDatabase;
let coordinator: PersistenceCoordinator;
let tags: SqliteTagStore;
let app: Hono;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "app-test-"));
  uploadDir = join(tempDir, "uploads");
  opened = openDatabase(":memory:");
  tags = new SqliteTagStore(opened.db);

  let tick = 0;
  coordinator = new PersistenceCoordinator({
    store: new SqliteAnalysisStore(opened.db),
    tags,
    vault: new FileVault([join(tempDir, "vault")], silentLogger()),
    logger: silentLogger(),
    now: () => new Date(Date.UTC(2026, 2, 1, 10, 0, tick++)),
  });

  app = createApp({
    coordinator,
    dispatcher: new InferenceDispatcher(coordinator, unconfiguredInferenceClient, silentLogger()),
    tags,
    uploadDir,
    logger: silentLogger(),
  });
});

afterEach(async () => {
  opened.close();
  await rm(tempDir, { recursive: true, force: true });
});

async function createAnalysis(title: string): Promise<number> {
  const source = join(tempDir, `${title}.aac`);
  await writeFile(source, "aac-bytes");
  return (await coordinator.createAnalysis({ title, sourcePath: source })).id;
}

function sendJson(method: string, path: string, body: unknown): Response | Promise<Response> {
  return app.request(path, {
    method,
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("GET /health", () => {
  it("reports ok", async () => {
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });
});

describe("analyses routes", () => {
  it("lists analyses with filters and ordering", async () => {
    const first = await createAnalysis("first");
    await createAnalysis("second");
    await coordinator.recordInferenceFailure(first, "boom");

    const all = await app.request("/api/analyses?orderBy=creationDate&direction=desc");
    const failed = await app.request("/api/analyses?status=ERROR");

    expect(all.status).toBe(200);
    const allBody: unknown = await all.json();
    expect(allBody).toMatchObject({ analyses: [{ title: "second" }, { title: "first" }] });
    expect(await failed.json()).toMatchObject({ analyses: [{ id: first, errorMessage: "boom" }] });
  });

  it("rejects an unknown status filter", async () => {
    const res = await app.request("/api/analyses?status=DONE");

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: "VALIDATION_FAILED" });
  });

  it("returns the most recent analyses", async () => {
    await createAnalysis("a");
    await createAnalysis("b");
    await createAnalysis("c");

    const res = await app.request("/api/analyses/recent?limit=2");

    expect(await res.json()).toMatchObject({ analyses: [{ title: "c" }, { title: "b" }] });
  });

  it("returns one analysis or 404", async () => {
    const id = await createAnalysis("solo");

    const found = await app.request(`/api/analyses/${id}`);
    const missing = await app.request("/api/analyses/999");
    const invalid = await app.request("/api/analyses/abc");

    expect(found.status).toBe(200);
    expect(await found.json()).toMatchObject({ analysis: { id, title: "solo", sendStatus: "PENDING" } });
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: "Analysis 999 not found", code: "NOT_FOUND" });
    expect(invalid.status).toBe(400);
  });

  it("applies predictions and feedback", async () => {
    const id = await createAnalysis("scored");

    const applied = await sendJson("POST", `/api/analyses/${id}/predictions`, {
      channel: "GENDER",
      predictions: { female: 0.55, male: 0.45 },
      completedAt: "2026-03-01T12:00:00.000Z",
    });
    const feedback = await sendJson("PUT", `/api/analyses/${id}/feedback`, { channel: "GENDER", value: true });

    expect(applied.status).toBe(200);
    expect(await applied.json()).toMatchObject({
      analysis: {
        sendStatus: "SENT",
        completionDate: "2026-03-01T12:00:00.000Z",
        channels: { GENDER: { predictions: { female: 0.55, male: 0.45 }, feedback: null } },
      },
    });
    expect(await feedback.json()).toMatchObject({
      analysis: { channels: { GENDER: { feedback: true } } },
    });
  });

  it("rejects feedback on a channel without predictions", async () => {
    const id = await createAnalysis("unscored");

    const res = await sendJson("PUT", `/api/analyses/${id}/feedback`, { channel: "EMOTION", value: false });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Cannot set EMOTION feedback: no EMOTION predictions yet",
      code: "VALIDATION_FAILED",
    });
  });

  it("rejects malformed JSON", async () => {
    const id = await createAnalysis("json");

    const res = await app.request(`/api/analyses/${id}/predictions`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{not json",
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Request body must be valid JSON", code: "VALIDATION_FAILED" });
  });

  it("returns 409 when retrying an analysis that has not failed", async () => {
    const id = await createAnalysis("fine");

    const res = await app.request(`/api/analyses/${id}/retry`, { method: "POST" });

    expect(res.status).toBe(409);
    expect(await res.json()).toMatchObject({ code: "INVALID_TRANSITION" });
  });

  it("records the failure again when retrying without a backend", async () => {
    const id = await createAnalysis("offline");
    await coordinator.recordInferenceFailure(id, "timeout");

    const res = await app.request(`/api/analyses/${id}/retry`, { method: "POST" });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      analysis: { sendStatus: "ERROR", errorMessage: "No inference backend configured" },
    });
  });

  it("deletes an analysis", async () => {
    const id = await createAnalysis("gone");

    const res = await app.request(`/api/analyses/${id}`, { method: "DELETE" });
    const again = await app.request(`/api/analyses/${id}`, { method: "DELETE" });

    expect(await res.json()).toEqual({ deleted: true, orphanedDirectory: false });
    expect(again.status).toBe(404);
  });

  it("imports a multipart upload and removes the staged copy", async () => {
    const form = new FormData();
    form.append("title", "Uploaded");
    form.append("description", "from the phone");
    form.append("file", new Blob(["wav-bytes"]), "voice.wav");

    const res = await app.request("/api/analyses", { method: "POST", body: form });

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({
      analysis: {
        title: "Uploaded",
        description: "from the phone",
        audioPath: join(tempDir, "vault", "recording_1", "recording.wav"),
      },
    });
    expect(await readdir(uploadDir)).toEqual([]);
  });

  it("rejects an unsupported upload format", async () => {
    const form = new FormData();
    form.append("title", "Wrong");
    form.append("file", new Blob(["ogg-bytes"]), "voice.ogg");

    const res = await app.request("/api/analyses", { method: "POST", body: form });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: "VALIDATION_FAILED" });
    expect(await readdir(uploadDir)).toEqual([]);
  });
});

describe("reading rows with damaged prediction columns", () => {
  const damage = [
    {
      name: "an unparseable result next to a completion date",
      update: sql`UPDATE AudioAnalysis SET NATIONALITY_RESULT = 'garbage', COMPLETION_DATE = '2026-03-01T11:00:00.000Z' WHERE _id = 1`,
      channel: "NATIONALITY",
    },
    {
      name: "a confidence outside 0..1",
      update: sql`UPDATE AudioAnalysis SET AGE_RESULT = '[age:34.5]' WHERE _id = 1`,
      channel: "AGE",
    },
    {
      name: "an empty label",
      update: sql`UPDATE AudioAnalysis SET GENDER_RESULT = '[:0.5]' WHERE _id = 1`,
      channel: "GENDER",
    },
  ] as const;

  for (const { name, update, channel } of damage) {
    it(`shows ${name} as no prediction`, async () => {
      const damaged = await createAnalysis("damaged");
      await createAnalysis("healthy");
      opened.db.run(update);

      const detail = await app.request(`/api/analyses/${damaged}`);
      const list = await app.request("/api/analyses");
      const recent = await app.request("/api/analyses/recent");

      expect(detail.status).toBe(200);
      expect(await detail.json()).toMatchObject({
        analysis: { completionDate: null, channels: { [channel]: { predictions: null, feedback: null } } },
      });
      expect(list.status).toBe(200);
      expect(await list.json()).toMatchObject({ analyses: [{ title: "damaged" }, { title: "healthy" }] });
      expect(recent.status).toBe(200);
    });
  }

  it("keeps the readable pairs of a partly damaged result", async () => {
    const id = await createAnalysis("partial");
    opened.db.run(
      sql`UPDATE AudioAnalysis SET GENDER_RESULT = '[:0.5,M:0.5]', COMPLETION_DATE = '2026-03-01T11:00:00.000Z' WHERE _id = ${id}`,
    );

    const res = await app.request(`/api/analyses/${id}`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      analysis: { completionDate: "2026-03-01T11:00:00.000Z", channels: { GENDER: { predictions: { M: 0.5 } } } },
    });
  });
});

describe("tag routes", () => {
  it("creates, attaches, detaches and deletes tags", async () => {
    const id = await createAnalysis("tagged");

    const created = await sendJson("POST", "/api/tags", { name: "  meeting " });
    expect(created.status).toBe(201);
    expect(await created.json()).toEqual({ tag: { id: 1, name: "meeting" } });

    const attached = await app.request(`/api/analyses/${id}/tags/1`, { method: "PUT" });
    expect(await attached.json()).toMatchObject({ analysis: { tags: [{ id: 1, name: "meeting" }] } });

    const detached = await app.request(`/api/analyses/${id}/tags/1`, { method: "DELETE" });
    expect(await detached.json()).toMatchObject({ analysis: { tags: [] } });

    const removed = await app.request("/api/tags/1", { method: "DELETE" });
    expect(removed.status).toBe(204);
    expect(await (await app.request("/api/tags")).json()).toEqual({ tags: [] });
  });

  it("returns 404 when attaching an unknown tag", async () => {
    const id = await createAnalysis("lonely");

    const res = await app.request(`/api/analyses/${id}/tags/42`, { method: "PUT" });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Tag 42 not found", code: "NOT_FOUND" });
  });
});

it("answers unknown routes with a JSON 404", async () => {
  const res = await app.request("/api/nope");

  expect(res.status).toBe(404);
  expect(await res.json()).toEqual({ error: "Route not found", code: "NOT_FOUND" });
});
