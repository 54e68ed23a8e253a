import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema.js";

export type VoiceLensDatabase = BetterSQLite3Database<typeof schema>;

// Mirrors ./schema.ts. Every statement is idempotent so it runs on each open.
const BOOTSTRAP_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS AudioAnalysis (
    _id INTEGER PRIMARY KEY AUTOINCREMENT,
    TITLE TEXT NOT NULL,
    DESCRIPTION TEXT,
    SEND_STATUS INTEGER NOT NULL,
    ERROR_MESSAGE TEXT,
    RECORDING_PATH TEXT NOT NULL,
    CREATION_DATE TEXT NOT NULL,
    COMPLETION_DATE TEXT,
    AGE_RESULT TEXT,
    GENDER_RESULT TEXT,
    NATIONALITY_RESULT TEXT,
    EMOTION_RESULT TEXT,
    AGE_USER_FEEDBACK INTEGER,
    GENDER_USER_FEEDBACK INTEGER,
    NATIONALITY_USER_FEEDBACK INTEGER,
    EMOTION_USER_FEEDBACK INTEGER
  )`,
  `CREATE INDEX IF NOT EXISTS audio_analysis_creation_date_idx ON AudioAnalysis (CREATION_DATE)`,
  `CREATE INDEX IF NOT EXISTS audio_analysis_send_status_idx ON AudioAnalysis (SEND_STATUS)`,
  `CREATE TABLE IF NOT EXISTS Tag (
    _id INTEGER PRIMARY KEY AUTOINCREMENT,
    NAME TEXT NOT NULL UNIQUE
  )`,
  `CREATE TABLE IF NOT EXISTS AudioAnalysisTag (
    ANALYSIS_ID INTEGER NOT NULL REFERENCES AudioAnalysis(_id) ON DELETE CASCADE,
    TAG_ID INTEGER NOT NULL REFERENCES Tag(_id) ON DELETE CASCADE,
    PRIMARY KEY (ANALYSIS_ID, TAG_ID)
  )`,
] as const;

export interface OpenedDatabase {
  db: VoiceLensDatabase;
  close(): void;
}

/**
 * Opens (or creates) the SQLite file and brings the schema up to date.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(filename: string): OpenedDatabase {
  const sqlite = new Database(filename);

  // WAL for concurrent reads on a local file; no-op for in-memory databases.
  sqlite.pragma("journal_mode = WAL");
  // Cascades from AudioAnalysis to AudioAnalysisTag rely on this.
  sqlite.pragma("foreign_keys = ON");

  for (const statement of BOOTSTRAP_STATEMENTS) {
    sqlite.exec(statement);
  }

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
