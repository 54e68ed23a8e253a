// ─── Domain types ─────────────────────────────────────────────────────────────
export type {
  SendStatus,
  PredictionChannel,
  ProbabilityMap,
  ChannelResult,
  ChannelResults,
  Tag,
  AnalysisRecord,
  RecordingSessionState,
  SessionAction,
  SessionSnapshot,
  InferenceResult,
  HealthResponse,
} from "./types.js";

export {
  isoDatetimeSchema,
  sendStatusSchema,
  predictionChannelSchema,
  probabilityLabelSchema,
  probabilityMapSchema,
  channelResultSchema,
  channelResultsSchema,
  tagSchema,
  analysisRecordSchema,
  inferenceResultSchema,
  applyPredictionsBodySchema,
  feedbackBodySchema,
  createTagBodySchema,
  analysesQuerySchema,
  healthResponseSchema,
  analysesListResponseSchema,
  analysisDetailResponseSchema,
  tagsListResponseSchema,
  tagDetailResponseSchema,
  deleteAnalysisResponseSchema,
  errorResponseSchema,
} from "./schemas.js";
export type {
  SendStatusFromSchema,
  PredictionChannelFromSchema,
  ProbabilityMapFromSchema,
  TagFromSchema,
  AnalysisRecordFromSchema,
  InferenceResultFromSchema,
  FeedbackBodyFromSchema,
  AnalysesQueryFromSchema,
  HealthResponseFromSchema,
  ErrorResponseFromSchema,
} from "./schemas.js";

// ─── Probability map codec ────────────────────────────────────────────────────
export {
  encodeProbabilityMap,
  decodeProbabilityMap,
  parseProbabilityMap,
} from "./probabilityMap.js";
export type { ProbabilityMapParse } from "./probabilityMap.js";

// ─── State machines ───────────────────────────────────────────────────────────
export {
  VALID_SESSION_ACTIONS,
  VALID_SESSION_TRANSITIONS,
  VALID_SEND_STATUS_TRANSITIONS,
  canSessionTransition,
  isSessionActionAllowed,
  canSendStatusTransition,
  sendStatusFromCode,
  sendStatusToCode,
} from "./stateMachine.js";

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  MAX_RECORDING_SECONDS,
  SESSION_TICK_MS,
  PREDICTION_CHANNELS,
  SEND_STATUS_CODES,
  SUPPORTED_UPLOAD_FORMATS,
  RECENT_ANALYSES_LIMIT_DEFAULT,
  VAULT_DIR_PREFIX,
  VAULT_FILE_BASENAME,
} from "./constants.js";
