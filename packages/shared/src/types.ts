// ─── Domain types ─────────────────────────────────────────────────────────────
// In-memory model of an analysis and the recording session that produces it.

export type SendStatus = "PENDING" | "SENT" | "ERROR";

export type PredictionChannel = "AGE" | "GENDER" | "NATIONALITY" | "EMOTION";

/** Label → confidence (0–1). Keys are unique by construction. */
export type ProbabilityMap = Readonly<Record<string, number>>;

export interface ChannelResult {
  predictions: ProbabilityMap | null;
  /** User confirmed (true) or rejected (false) the top prediction. */
  feedback: boolean | null;
}

export type ChannelResults = Readonly<Record<PredictionChannel, ChannelResult>>;

export interface Tag {
  id: number;
  name: string;
}

export interface AnalysisRecord {
  id: number;
  title: string;
  description: string | null;
  sendStatus: SendStatus;
  errorMessage: string | null;
  audioPath: string;
  creationDate: string; // ISO 8601
  completionDate: string | null;
  channels: ChannelResults;
  tags: Tag[];
}

export type RecordingSessionState = "IDLE" | "RECORDING" | "PAUSED" | "COMPLETED" | "DISCARDED";

export type SessionAction = "start" | "pause" | "resume" | "stop" | "restart" | "cancel" | "save";

export interface SessionSnapshot {
  state: RecordingSessionState;
  elapsedSeconds: number;
  remainingSeconds: number;
  maxSeconds: number;
  tempFilePath: string | null;
  savedAnalysisId: number | null;
  /** Last recoverable capture-device failure, cleared by the next successful action. */
  lastError: string | null;
}

export interface InferenceResult {
  channel: PredictionChannel;
  predictions: ProbabilityMap;
  completedAt: string;
}

export interface HealthResponse {
  status: "ok";
}
