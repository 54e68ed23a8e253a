import { and, asc, eq, inArray } from "drizzle-orm";
import type { Tag } from "@voicelens/shared";
import { NotFoundError, StorageError, describeError } from "../lib/errors.js";
import type { VoiceLensDatabase } from "./index.js";
import { analysisTags, audioAnalysis, tags } from "./schema.js";

/** User-defined labels and their many-to-many link to analyses. */
export interface TagStore {
  /** Returns the existing tag when the name is already taken. */
  saveTag(name: string): Promise<Tag>;
  getAllTags(): Promise<Tag[]>;
  deleteTag(id: number): Promise<boolean>;
  attachTag(analysisId: number, tagId: number): Promise<void>;
  detachTag(analysisId: number, tagId: number): Promise<boolean>;
  getTagsByAnalysisId(analysisId: number): Promise<Tag[]>;
  getTagsByAnalysisIds(analysisIds: readonly number[]): Promise<Map<number, Tag[]>>;
}

export class SqliteTagStore implements TagStore {
  constructor(private readonly db: VoiceLensDatabase) {}

  async saveTag(name: string): Promise<Tag> {
    try {
      this.db.insert(tags).values({ name }).onConflictDoNothing({ target: tags.name }).run();
      const [row] = await this.db.select().from(tags).where(eq(tags.name, name)).limit(1);
      if (!row) {
        throw new StorageError(`Tag "${name}" missing after insert`);
      }
      return row;
    } catch (cause) {
      if (cause instanceof StorageError) throw cause;
      throw new StorageError(`Failed to save tag "${name}": ${describeError(cause)}`, null, { cause });
    }
  }

  async getAllTags(): Promise<Tag[]> {
    return this.db.select().from(tags).orderBy(asc(tags.name));
  }

  async deleteTag(id: number): Promise<boolean> {
    const result = this.db.delete(tags).where(eq(tags.id, id)).run();
    return result.changes > 0;
  }

  async attachTag(analysisId: number, tagId: number): Promise<void> {
    const [analysis] = await this.db
      .select({ id: audioAnalysis.id })
      .from(audioAnalysis)
      .where(eq(audioAnalysis.id, analysisId))
      .limit(1);
    if (!analysis) {
      throw new NotFoundError(`Analysis ${analysisId} not found`);
    }

    const [tag] = await this.db.select({ id: tags.id }).from(tags).where(eq(tags.id, tagId)).limit(1);
    if (!tag) {
      throw new NotFoundError(`Tag ${tagId} not found`);
    }

    this.db.insert(analysisTags).values({ analysisId, tagId }).onConflictDoNothing().run();
  }

  async detachTag(analysisId: number, tagId: number): Promise<boolean> {
    const result = this.db
      .delete(analysisTags)
      .where(and(eq(analysisTags.analysisId, analysisId), eq(analysisTags.tagId, tagId)))
      .run();
    return result.changes > 0;
  }

  async getTagsByAnalysisId(analysisId: number): Promise<Tag[]> {
    const grouped = await this.getTagsByAnalysisIds([analysisId]);
    return grouped.get(analysisId) ?? [];
  }

  async getTagsByAnalysisIds(analysisIds: readonly number[]): Promise<Map<number, Tag[]>> {
    const grouped = new Map<number, Tag[]>();
    if (analysisIds.length === 0) {
      return grouped;
    }

    const rows = await this.db
      .select({ analysisId: analysisTags.analysisId, id: tags.id, name: tags.name })
      .from(analysisTags)
      .innerJoin(tags, eq(analysisTags.tagId, tags.id))
      .where(inArray(analysisTags.analysisId, [...analysisIds]))
      .orderBy(asc(tags.name));

    for (const row of rows) {
      const existing = grouped.get(row.analysisId) ?? [];
      existing.push({ id: row.id, name: row.name });
      grouped.set(row.analysisId, existing);
    }
    return grouped;
  }
}
