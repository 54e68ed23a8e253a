import type { PredictionChannel, SendStatus } from "./types.js";

/** Hard time box for a single capture session, in seconds. */
export const MAX_RECORDING_SECONDS = 30;

/** Countdown resolution. */
export const SESSION_TICK_MS = 1000;

export const PREDICTION_CHANNELS: readonly PredictionChannel[] = [
  "AGE",
  "GENDER",
  "NATIONALITY",
  "EMOTION",
];

/** Numeric codes persisted in SEND_STATUS. */
export const SEND_STATUS_CODES: Readonly<Record<SendStatus, number>> = {
  PENDING: 0,
  SENT: 1,
  ERROR: 2,
};

/** Extensions accepted by the upload flow. */
export const SUPPORTED_UPLOAD_FORMATS = ["mp3", "wav", "m4a"] as const;

export const RECENT_ANALYSES_LIMIT_DEFAULT = 5;

/** Name of the per-analysis directory inside the vault: recording_<id>. */
export const VAULT_DIR_PREFIX = "recording_";

/** Base name of the single audio artifact inside a vault directory. */
export const VAULT_FILE_BASENAME = "recording";
