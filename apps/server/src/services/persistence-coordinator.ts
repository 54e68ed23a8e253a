import { access } from "node:fs/promises";
import { constants } from "node:fs";
import path from "node:path";
import {
  RECENT_ANALYSES_LIMIT_DEFAULT,
  SUPPORTED_UPLOAD_FORMATS,
  canSendStatusTransition,
  isoDatetimeSchema,
  predictionChannelSchema,
  probabilityMapSchema,
  type AnalysisRecord,
  type PredictionChannel,
  type ProbabilityMap,
} from "@voicelens/shared";
import type { AnalysisQuery, AnalysisStore, StoredAnalysis } from "../db/analysis-store.js";
import type { TagStore } from "../db/tag-store.js";
import {
  FileSystemError,
  InvalidTransitionError,
  NotFoundError,
  StorageError,
  ValidationError,
  describeError,
} from "../lib/errors.js";
import type { FileVault } from "../lib/file-vault.js";
import { KeyedMutex } from "../lib/keyed-mutex.js";
import type { Logger } from "../lib/logger.js";

export interface CreateAnalysisInput {
  title: string;
  description?: string | null;
  /** Temporary capture or upload path; copied into the vault. */
  sourcePath: string;
}

export interface DeleteOutcome {
  /** True when the vault directory could not be removed and was left behind. */
  orphanedDirectory: boolean;
}

export interface PersistenceCoordinatorDeps {
  store: AnalysisStore;
  tags: TagStore;
  vault: FileVault;
  logger: Logger;
  now?: () => Date;
}

/**
 * Makes "insert a record" and "store its audio" look like one operation.
 *
 * Create is a small saga: insert (id assigned) → copy into the vault under
 * that id → commit the permanent path. A failed copy is compensated by
 * deleting the inserted row. A failed commit leaves the copied file in place;
 * {@link reconcile} finishes the job from the id alone.
 *
 * Every read-modify-write of a row runs under a per-id lock, so concurrent
 * updates to different fields of the same analysis never overwrite each other.
 */
export class PersistenceCoordinator {
  private readonly store: AnalysisStore;
  private readonly tags: TagStore;
  private readonly vault: FileVault;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly locks = new KeyedMutex<number>();

  constructor(deps: PersistenceCoordinatorDeps) {
    this.store = deps.store;
    this.tags = deps.tags;
    this.vault = deps.vault;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  // ─── Create ─────────────────────────────────────────────────────────────────

  async createAnalysis(input: CreateAnalysisInput): Promise<AnalysisRecord> {
    const title = input.title.trim();
    if (!title) {
      throw new ValidationError("Title must not be empty");
    }
    await assertReadable(input.sourcePath);

    const description = input.description?.trim() || null;
    const id = await this.store.insert({
      title,
      description,
      sendStatus: "PENDING",
      audioPath: input.sourcePath,
      creationDate: this.now().toISOString(),
    });

    return this.locks.runExclusive(id, async () => {
      let permanentPath: string;
      try {
        permanentPath = await this.vault.store(input.sourcePath, id);
      } catch (err) {
        await this.rollbackInsert(id, err);
        throw err instanceof FileSystemError
          ? err
          : new FileSystemError(`Failed to relocate audio for analysis ${id}: ${describeError(err)}`, id, {
              cause: err,
            });
      }

      try {
        const updated = await this.store.update(id, { audioPath: permanentPath });
        if (!updated) {
          throw new Error("row disappeared before the permanent path was committed");
        }
      } catch (cause) {
        this.logger.error(
          { analysisId: id, permanentPath, err: cause },
          "audio stored but path commit failed; reconcile required",
        );
        throw new StorageError(
          `Audio for analysis ${id} is in the vault but the record still points at the source: ${describeError(cause)}`,
          id,
          { cause },
        );
      }

      this.logger.info({ analysisId: id, permanentPath }, "analysis created");
      return this.requireAnalysis(id);
    });
  }

  /** Upload flow: same as {@link createAnalysis} but only for supported audio formats. */
  async importUpload(input: CreateAnalysisInput): Promise<AnalysisRecord> {
    const extension = path.extname(input.sourcePath).slice(1).toLowerCase();
    const supported: readonly string[] = SUPPORTED_UPLOAD_FORMATS;
    if (!supported.includes(extension)) {
      throw new ValidationError(
        `Unsupported audio format ".${extension}". Supported: ${SUPPORTED_UPLOAD_FORMATS.join(", ")}`,
      );
    }
    return this.createAnalysis(input);
  }

  /**
   * Points the row for `id` at its vault artifact, copying the source again
   * when the vault has nothing yet. Safe to call on an already resolved row.
   */
  async reconcile(id: number): Promise<AnalysisRecord> {
    return this.locks.runExclusive(id, async () => {
      const existing = await this.store.getById(id);
      if (!existing) {
        throw new NotFoundError(`Analysis ${id} not found`);
      }

      const artifact = await this.vault.findArtifact(id);
      if (artifact !== null && artifact === existing.audioPath) {
        return this.requireAnalysis(id);
      }

      const permanentPath = artifact ?? (await this.vault.store(existing.audioPath, id));
      const updated = await this.store.update(id, { audioPath: permanentPath });
      if (!updated) {
        throw new NotFoundError(`Analysis ${id} not found`);
      }

      this.logger.info({ analysisId: id, permanentPath }, "analysis path reconciled");
      return this.requireAnalysis(id);
    });
  }

  /** Ids of rows whose audio path is not their vault artifact. */
  async findUnresolved(): Promise<number[]> {
    const all = await this.store.queryAll();
    const unresolved: number[] = [];
    for (const analysis of all) {
      if (!(await this.vault.isVaultPathFor(analysis.id, analysis.audioPath))) {
        unresolved.push(analysis.id);
      }
    }
    return unresolved;
  }

  // ─── Delete ─────────────────────────────────────────────────────────────────

  /**
   * Store first, then files. Once the row is gone the delete has succeeded;
   * a directory that cannot be removed is reported, not thrown.
   */
  async deleteAnalysis(id: number): Promise<DeleteOutcome> {
    return this.locks.runExclusive(id, async () => {
      const deleted = await this.store.delete(id);
      if (!deleted) {
        throw new NotFoundError(`Analysis ${id} not found`);
      }

      try {
        await this.vault.delete(id);
      } catch (err) {
        this.logger.warn({ analysisId: id, err }, "analysis deleted but vault directory is orphaned");
        return { orphanedDirectory: true };
      }

      this.logger.info({ analysisId: id }, "analysis deleted");
      return { orphanedDirectory: false };
    });
  }

  // ─── Inference results ──────────────────────────────────────────────────────

  /**
   * Merges one prediction channel into the record. Other channels are left
   * untouched; completionDate is only set the first time a result arrives.
   */
  async applyPredictions(
    id: number,
    channel: PredictionChannel,
    predictions: ProbabilityMap,
    completedAt: string,
  ): Promise<AnalysisRecord> {
    const parsedChannel = predictionChannelSchema.safeParse(channel);
    if (!parsedChannel.success) {
      throw new ValidationError(`Unknown prediction channel "${String(channel)}"`);
    }
    const parsedMap = probabilityMapSchema.safeParse(predictions);
    if (!parsedMap.success) {
      throw new ValidationError(`Invalid ${channel} predictions: ${parsedMap.error.message}`);
    }
    if (!isoDatetimeSchema.safeParse(completedAt).success) {
      throw new ValidationError(`completedAt must be an ISO 8601 datetime, got "${completedAt}"`);
    }

    return this.locks.runExclusive(id, async () => {
      const existing = await this.requireStored(id);

      await this.store.update(id, {
        predictions: channelPatch(parsedChannel.data, parsedMap.data),
        completionDate: existing.completionDate ?? completedAt,
        sendStatus: "SENT",
        errorMessage: null,
      });

      this.logger.info({ analysisId: id, channel }, "predictions applied");
      return this.requireAnalysis(id);
    });
  }

  /** Records the user's verdict on a channel's top prediction. */
  async setFeedback(id: number, channel: PredictionChannel, value: boolean | null): Promise<AnalysisRecord> {
    return this.locks.runExclusive(id, async () => {
      const existing = await this.requireStored(id);
      if (existing.channels[channel].predictions === null) {
        throw new ValidationError(`Cannot set ${channel} feedback: no ${channel} predictions yet`);
      }

      await this.store.update(id, { feedback: channelPatch(channel, value) });
      return this.requireAnalysis(id);
    });
  }

  async recordInferenceFailure(id: number, message: string): Promise<AnalysisRecord> {
    return this.locks.runExclusive(id, async () => {
      const existing = await this.requireStored(id);
      if (!canSendStatusTransition(existing.sendStatus, "ERROR")) {
        throw new InvalidTransitionError(`Cannot mark analysis ${id} as failed from ${existing.sendStatus}`);
      }

      await this.store.update(id, { sendStatus: "ERROR", errorMessage: message });
      this.logger.warn({ analysisId: id, message }, "inference failed");
      return this.requireAnalysis(id);
    });
  }

  /** Resets a failed analysis so it can be dispatched again. */
  async markPending(id: number): Promise<AnalysisRecord> {
    return this.locks.runExclusive(id, async () => {
      const existing = await this.requireStored(id);
      if (existing.sendStatus !== "ERROR" || !canSendStatusTransition(existing.sendStatus, "PENDING")) {
        throw new InvalidTransitionError(`Can only retry failed analyses (analysis ${id} is ${existing.sendStatus})`);
      }

      await this.store.update(id, { sendStatus: "PENDING", errorMessage: null });
      return this.requireAnalysis(id);
    });
  }

  // ─── Reads ──────────────────────────────────────────────────────────────────

  async getAnalysisById(id: number): Promise<AnalysisRecord | null> {
    const stored = await this.store.getById(id);
    if (!stored) {
      return null;
    }
    return { ...stored, tags: await this.tags.getTagsByAnalysisId(id) };
  }

  async queryAll(query: AnalysisQuery = {}): Promise<AnalysisRecord[]> {
    const stored = await this.store.queryAll(query);
    const tagsById = await this.tags.getTagsByAnalysisIds(stored.map((analysis) => analysis.id));
    return stored.map((analysis) => ({ ...analysis, tags: tagsById.get(analysis.id) ?? [] }));
  }

  /** Newest first. */
  async getRecentAnalyses(limit = RECENT_ANALYSES_LIMIT_DEFAULT): Promise<AnalysisRecord[]> {
    return this.queryAll({ orderBy: { column: "creationDate", direction: "desc" }, limit });
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  private async requireStored(id: number): Promise<StoredAnalysis> {
    const existing = await this.store.getById(id);
    if (!existing) {
      throw new NotFoundError(`Analysis ${id} not found`);
    }
    return existing;
  }

  private async requireAnalysis(id: number): Promise<AnalysisRecord> {
    const analysis = await this.getAnalysisById(id);
    if (!analysis) {
      throw new NotFoundError(`Analysis ${id} not found`);
    }
    return analysis;
  }

  private async rollbackInsert(id: number, reason: unknown): Promise<void> {
    try {
      await this.store.delete(id);
    } catch (err) {
      // The row stays behind pointing at the source; findUnresolved() reports it.
      this.logger.error({ analysisId: id, err, reason }, "rollback after failed relocation did not complete");
      return;
    }

    try {
      await this.vault.delete(id);
    } catch (err) {
      this.logger.warn({ analysisId: id, err }, "partial vault directory left after rollback");
    }
    this.logger.warn({ analysisId: id, err: reason }, "audio relocation failed; insert rolled back");
  }
}

function channelPatch<T>(channel: PredictionChannel, value: T): Partial<Record<PredictionChannel, T>> {
  const patch: Partial<Record<PredictionChannel, T>> = {};
  patch[channel] = value;
  return patch;
}

async function assertReadable(sourcePath: string): Promise<void> {
  if (!sourcePath.trim()) {
    throw new ValidationError("Source audio path must not be empty");
  }
  try {
    await access(sourcePath, constants.R_OK);
  } catch {
    throw new ValidationError(`Source audio file "${sourcePath}" does not exist or is not readable`);
  }
}
