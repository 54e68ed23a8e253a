import { SEND_STATUS_CODES } from "./constants.js";
import type { RecordingSessionState, SendStatus, SessionAction } from "./types.js";

/**
 * Actions a recording session accepts in each state.
 *
 * - start only from IDLE
 * - pause/resume toggle RECORDING ⇄ PAUSED
 * - stop (manual) completes a RECORDING or PAUSED capture
 * - restart discards the capture and starts a new one
 * - cancel discards from anywhere but DISCARDED
 * - save is only meaningful once the capture is COMPLETED
 */
export const VALID_SESSION_ACTIONS: Readonly<
  Record<RecordingSessionState, ReadonlyArray<SessionAction>>
> = {
  IDLE: ["start", "cancel"],
  RECORDING: ["pause", "stop", "restart", "cancel"],
  PAUSED: ["resume", "stop", "restart", "cancel"],
  COMPLETED: ["restart", "cancel", "save"],
  DISCARDED: [],
};

/** Valid state changes for a session, including the automatic timeExpired → COMPLETED. */
export const VALID_SESSION_TRANSITIONS: Readonly<
  Record<RecordingSessionState, ReadonlyArray<RecordingSessionState>>
> = {
  IDLE: ["RECORDING", "DISCARDED"],
  RECORDING: ["PAUSED", "COMPLETED", "IDLE", "DISCARDED"],
  PAUSED: ["RECORDING", "COMPLETED", "IDLE", "DISCARDED"],
  COMPLETED: ["IDLE", "DISCARDED"],
  DISCARDED: [],
};

export function canSessionTransition(from: RecordingSessionState, to: RecordingSessionState): boolean {
  return VALID_SESSION_TRANSITIONS[from].includes(to);
}

export function isSessionActionAllowed(state: RecordingSessionState, action: SessionAction): boolean {
  return VALID_SESSION_ACTIONS[state].includes(action);
}

/**
 * Valid sendStatus changes for an analysis:
 * - PENDING → SENT (results arrived) or ERROR (inference failed)
 * - ERROR → PENDING (retry) or SENT (late results)
 * - SENT → SENT (further channels arriving out of order)
 */
export const VALID_SEND_STATUS_TRANSITIONS: Readonly<Record<SendStatus, ReadonlyArray<SendStatus>>> = {
  PENDING: ["SENT", "ERROR"],
  SENT: ["SENT", "ERROR"],
  ERROR: ["PENDING", "SENT"],
};

export function canSendStatusTransition(from: SendStatus, to: SendStatus): boolean {
  return VALID_SEND_STATUS_TRANSITIONS[from].includes(to);
}

/** Maps a persisted SEND_STATUS integer back to its tag; unknown codes yield null. */
export function sendStatusFromCode(code: number): SendStatus | null {
  const match = Object.entries(SEND_STATUS_CODES).find(([, value]) => value === code);
  if (!match) {
    return null;
  }
  const [status] = match;
  return status === "PENDING" || status === "SENT" || status === "ERROR" ? status : null;
}

export function sendStatusToCode(status: SendStatus): number {
  return SEND_STATUS_CODES[status];
}
