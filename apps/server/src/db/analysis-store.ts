import { asc, desc, eq } from "drizzle-orm";
import {
  PREDICTION_CHANNELS,
  decodeProbabilityMap,
  encodeProbabilityMap,
  isoDatetimeSchema,
  sendStatusFromCode,
  sendStatusToCode,
  type AnalysisRecord,
  type ChannelResults,
  type PredictionChannel,
  type ProbabilityMap,
  type SendStatus,
} from "@voicelens/shared";
import { StorageError, describeError } from "../lib/errors.js";
import type { VoiceLensDatabase } from "./index.js";
import { audioAnalysis, type AudioAnalysisInsert, type AudioAnalysisRow } from "./schema.js";

/** An analysis as the store holds it; tags live in their own table. */
export type StoredAnalysis = Omit<AnalysisRecord, "tags">;

export interface NewAnalysis {
  title: string;
  description: string | null;
  sendStatus: SendStatus;
  audioPath: string;
  creationDate: string;
}

export interface AnalysisUpdate {
  title?: string;
  description?: string | null;
  sendStatus?: SendStatus;
  errorMessage?: string | null;
  audioPath?: string;
  completionDate?: string | null;
  predictions?: Partial<Record<PredictionChannel, ProbabilityMap | null>>;
  feedback?: Partial<Record<PredictionChannel, boolean | null>>;
}

export type AnalysisOrderColumn = "creationDate" | "completionDate" | "title";

export interface AnalysisQuery {
  sendStatus?: SendStatus;
  orderBy?: { column: AnalysisOrderColumn; direction: "asc" | "desc" };
  limit?: number;
}

/** Structured storage for analyses. The only place identifiers are assigned. */
export interface AnalysisStore {
  insert(analysis: NewAnalysis): Promise<number>;
  /** Field-level update; resolves false when no row has this id. */
  update(id: number, fields: AnalysisUpdate): Promise<boolean>;
  getById(id: number): Promise<StoredAnalysis | null>;
  queryAll(query?: AnalysisQuery): Promise<StoredAnalysis[]>;
  /** Resolves false when no row had this id. */
  delete(id: number): Promise<boolean>;
}

const RESULT_COLUMNS = {
  AGE: "ageResult",
  GENDER: "genderResult",
  NATIONALITY: "nationalityResult",
  EMOTION: "emotionResult",
} as const satisfies Record<PredictionChannel, keyof AudioAnalysisRow>;

const FEEDBACK_COLUMNS = {
  AGE: "ageFeedback",
  GENDER: "genderFeedback",
  NATIONALITY: "nationalityFeedback",
  EMOTION: "emotionFeedback",
} as const satisfies Record<PredictionChannel, keyof AudioAnalysisRow>;

const ORDER_COLUMNS = {
  creationDate: audioAnalysis.creationDate,
  completionDate: audioAnalysis.completionDate,
  title: audioAnalysis.title,
} as const;

/** Maps a Drizzle row to the domain shape, decoding the codec columns. */
function rowToAnalysis(row: AudioAnalysisRow): StoredAnalysis {
  const channel = (name: PredictionChannel) => {
    const predictions = decodeProbabilityMap(row[RESULT_COLUMNS[name]]);
    // Feedback on a channel without predictions is meaningless; never surface it.
    const feedback = predictions === null ? null : row[FEEDBACK_COLUMNS[name]];
    return { predictions, feedback };
  };

  const channels: ChannelResults = {
    AGE: channel("AGE"),
    GENDER: channel("GENDER"),
    NATIONALITY: channel("NATIONALITY"),
    EMOTION: channel("EMOTION"),
  };

  // completionDate tracks readable predictions: a row whose result columns
  // all decoded to null reads as not completed, and a populated one without a
  // usable date falls back to its creation date.
  const hasPredictions = PREDICTION_CHANNELS.some((name) => channels[name].predictions !== null);
  const storedCompletion = isoDatetimeSchema.safeParse(row.completionDate).success ? row.completionDate : null;
  const completionDate = hasPredictions ? (storedCompletion ?? row.creationDate) : null;

  // Unknown codes come from a newer/older app version; surface them as failures.
  const sendStatus = sendStatusFromCode(row.sendStatus) ?? "ERROR";

  return {
    id: row.id,
    title: row.title,
    description: row.description,
    sendStatus,
    errorMessage: sendStatus === "ERROR" ? row.errorMessage : null,
    audioPath: row.recordingPath,
    creationDate: row.creationDate,
    completionDate,
    channels,
  };
}

function updateToRow(fields: AnalysisUpdate): Partial<AudioAnalysisInsert> {
  const values: Partial<AudioAnalysisInsert> = {};

  if (fields.title !== undefined) values.title = fields.title;
  if (fields.description !== undefined) values.description = fields.description;
  if (fields.sendStatus !== undefined) values.sendStatus = sendStatusToCode(fields.sendStatus);
  if (fields.errorMessage !== undefined) values.errorMessage = fields.errorMessage;
  if (fields.audioPath !== undefined) values.recordingPath = fields.audioPath;
  if (fields.completionDate !== undefined) values.completionDate = fields.completionDate;

  for (const channel of PREDICTION_CHANNELS) {
    const map = fields.predictions?.[channel];
    if (map !== undefined) {
      values[RESULT_COLUMNS[channel]] = encodeProbabilityMap(map);
    }

    const flag = fields.feedback?.[channel];
    if (flag !== undefined) {
      values[FEEDBACK_COLUMNS[channel]] = flag;
    }
  }

  return values;
}

export class SqliteAnalysisStore implements AnalysisStore {
  constructor(private readonly db: VoiceLensDatabase) {}

  async insert(analysis: NewAnalysis): Promise<number> {
    let inserted: { id: number }[];
    try {
      inserted = this.db
        .insert(audioAnalysis)
        .values({
          title: analysis.title,
          description: analysis.description,
          sendStatus: sendStatusToCode(analysis.sendStatus),
          recordingPath: analysis.audioPath,
          creationDate: analysis.creationDate,
        })
        .returning({ id: audioAnalysis.id })
        .all();
    } catch (cause) {
      throw new StorageError(`Failed to insert analysis: ${describeError(cause)}`, null, { cause });
    }

    const [row] = inserted;
    if (!row) {
      throw new StorageError("Insert returned no id");
    }
    return row.id;
  }

  async update(id: number, fields: AnalysisUpdate): Promise<boolean> {
    const values = updateToRow(fields);
    if (Object.keys(values).length === 0) {
      return (await this.getById(id)) !== null;
    }

    try {
      const result = this.db.update(audioAnalysis).set(values).where(eq(audioAnalysis.id, id)).run();
      return result.changes > 0;
    } catch (cause) {
      throw new StorageError(`Failed to update analysis ${id}: ${describeError(cause)}`, id, { cause });
    }
  }

  async getById(id: number): Promise<StoredAnalysis | null> {
    try {
      const rows = await this.db
        .select()
        .from(audioAnalysis)
        .where(eq(audioAnalysis.id, id))
        .limit(1);
      const [row] = rows;
      return row ? rowToAnalysis(row) : null;
    } catch (cause) {
      throw new StorageError(`Failed to read analysis ${id}: ${describeError(cause)}`, id, { cause });
    }
  }

  async queryAll(query: AnalysisQuery = {}): Promise<StoredAnalysis[]> {
    const { column, direction } = query.orderBy ?? { column: "creationDate", direction: "asc" };
    const order = direction === "asc" ? asc : desc;

    try {
      let builder = this.db.select().from(audioAnalysis).$dynamic();
      if (query.sendStatus !== undefined) {
        builder = builder.where(eq(audioAnalysis.sendStatus, sendStatusToCode(query.sendStatus)));
      }
      // Rows created within the same millisecond keep insertion order.
      builder = builder.orderBy(order(ORDER_COLUMNS[column]), order(audioAnalysis.id));
      if (query.limit !== undefined) {
        builder = builder.limit(query.limit);
      }

      const rows = await builder;
      return rows.map(rowToAnalysis);
    } catch (cause) {
      throw new StorageError(`Failed to query analyses: ${describeError(cause)}`, null, { cause });
    }
  }

  async delete(id: number): Promise<boolean> {
    try {
      const result = this.db.delete(audioAnalysis).where(eq(audioAnalysis.id, id)).run();
      return result.changes > 0;
    } catch (cause) {
      throw new StorageError(`Failed to delete analysis ${id}: ${describeError(cause)}`, id, { cause });
    }
  }
}
