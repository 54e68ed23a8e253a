import { index, integer, primaryKey, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const audioAnalysis = sqliteTable(
  "AudioAnalysis",
  {
    id: integer("_id").primaryKey({ autoIncrement: true }),
    title: text("TITLE").notNull(),
    description: text("DESCRIPTION"),
    // 0 = pending, 1 = sent, 2 = error
    sendStatus: integer("SEND_STATUS").notNull(),
    errorMessage: text("ERROR_MESSAGE"),
    // Temporary capture path until the vault copy is committed.
    recordingPath: text("RECORDING_PATH").notNull(),
    creationDate: text("CREATION_DATE").notNull(),
    completionDate: text("COMPLETION_DATE"),
    // "[label:confidence,...]" — see encodeProbabilityMap
    ageResult: text("AGE_RESULT"),
    genderResult: text("GENDER_RESULT"),
    nationalityResult: text("NATIONALITY_RESULT"),
    emotionResult: text("EMOTION_RESULT"),
    // SQLite stores booleans as integer (0/1); NULL means no feedback given
    ageFeedback: integer("AGE_USER_FEEDBACK", { mode: "boolean" }),
    genderFeedback: integer("GENDER_USER_FEEDBACK", { mode: "boolean" }),
    nationalityFeedback: integer("NATIONALITY_USER_FEEDBACK", { mode: "boolean" }),
    emotionFeedback: integer("EMOTION_USER_FEEDBACK", { mode: "boolean" }),
  },
  (table) => ({
    creationDateIdx: index("audio_analysis_creation_date_idx").on(table.creationDate),
    sendStatusIdx: index("audio_analysis_send_status_idx").on(table.sendStatus),
  }),
);

export const tags = sqliteTable("Tag", {
  id: integer("_id").primaryKey({ autoIncrement: true }),
  name: text("NAME").notNull().unique(),
});

export const analysisTags = sqliteTable(
  "AudioAnalysisTag",
  {
    analysisId: integer("ANALYSIS_ID")
      .notNull()
      .references(() => audioAnalysis.id, { onDelete: "cascade" }),
    tagId: integer("TAG_ID")
      .notNull()
      .references(() => tags.id, { onDelete: "cascade" }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.analysisId, table.tagId] }),
  }),
);

export type AudioAnalysisRow = typeof audioAnalysis.$inferSelect;
export type AudioAnalysisInsert = typeof audioAnalysis.$inferInsert;
