import { randomUUID } from "node:crypto";
import path from "node:path";
import {
  MAX_RECORDING_SECONDS,
  SESSION_TICK_MS,
  canSessionTransition,
  isSessionActionAllowed,
  type AnalysisRecord,
  type RecordingSessionState,
  type SessionAction,
  type SessionSnapshot,
} from "@voicelens/shared";
import { InvalidTransitionError, ValidationError, describeError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import type { CreateAnalysisInput } from "./persistence-coordinator.js";

/** Microphone (or any audio source) that writes into a file it is given. */
export interface CaptureDevice {
  start(outputPath: string): Promise<void>;
  pause(): Promise<void>;
  resume(): Promise<void>;
  stop(): Promise<void>;
}

/** The part of the coordinator a session hands its capture to. */
export interface AnalysisSaver {
  createAnalysis(input: CreateAnalysisInput): Promise<AnalysisRecord>;
}

export type SessionListener = (snapshot: SessionSnapshot) => void;

export interface RecordingSessionOptions {
  device: CaptureDevice;
  saver: AnalysisSaver;
  logger: Logger;
  tmpDir: string;
  maxSeconds?: number;
  tickMs?: number;
  createId?: () => string;
}

/**
 * One time-boxed capture, from IDLE to a saved analysis (or DISCARDED).
 *
 * Actions queue behind each other, so at most one transition is in flight.
 * The countdown is a single interval owned by the session; every tick checks
 * its generation before touching state, so no tick lands after a pause, stop
 * or cancel.
 */
export class RecordingSession {
  private readonly device: CaptureDevice;
  private readonly saver: AnalysisSaver;
  private readonly logger: Logger;
  private readonly tmpDir: string;
  private readonly maxSeconds: number;
  private readonly tickMs: number;
  private readonly createId: () => string;

  private state: RecordingSessionState = "IDLE";
  private elapsedSeconds = 0;
  private tempFilePath: string | null = null;
  private savedAnalysisId: number | null = null;
  private lastError: string | null = null;

  private timer: ReturnType<typeof setInterval> | null = null;
  private generation = 0;
  private queue: Promise<void> = Promise.resolve();
  private readonly listeners = new Set<SessionListener>();

  constructor(options: RecordingSessionOptions) {
    this.device = options.device;
    this.saver = options.saver;
    this.logger = options.logger;
    this.tmpDir = options.tmpDir;
    this.maxSeconds = options.maxSeconds ?? MAX_RECORDING_SECONDS;
    this.tickMs = options.tickMs ?? SESSION_TICK_MS;
    this.createId = options.createId ?? randomUUID;

    if (!Number.isInteger(this.maxSeconds) || this.maxSeconds <= 0) {
      throw new ValidationError(`maxSeconds must be a positive integer, got ${this.maxSeconds}`);
    }
  }

  getSnapshot(): SessionSnapshot {
    return {
      state: this.state,
      elapsedSeconds: this.elapsedSeconds,
      remainingSeconds: Math.min(Math.max(this.maxSeconds - this.elapsedSeconds, 0), this.maxSeconds),
      maxSeconds: this.maxSeconds,
      tempFilePath: this.tempFilePath,
      savedAnalysisId: this.savedAnalysisId,
      lastError: this.lastError,
    };
  }

  /** Calls `listener` after every change. Returns the unsubscribe function. */
  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves once every queued action has finished. */
  settled(): Promise<void> {
    return this.queue;
  }

  // ─── Actions ────────────────────────────────────────────────────────────────

  start(): Promise<SessionSnapshot> {
    return this.enqueue("start", () => this.beginCapture());
  }

  pause(): Promise<SessionSnapshot> {
    return this.enqueue("pause", async () => {
      this.stopTicking();
      try {
        await this.device.pause();
      } catch (err) {
        this.reportDeviceError("pause", err);
        this.startTicking();
        return this.getSnapshot();
      }
      this.lastError = null;
      this.transition("PAUSED");
      return this.getSnapshot();
    });
  }

  resume(): Promise<SessionSnapshot> {
    return this.enqueue("resume", async () => {
      try {
        await this.device.resume();
      } catch (err) {
        this.reportDeviceError("resume", err);
        return this.getSnapshot();
      }
      this.lastError = null;
      this.transition("RECORDING");
      this.startTicking();
      return this.getSnapshot();
    });
  }

  /** Manual stop before the time box runs out. */
  stop(): Promise<SessionSnapshot> {
    return this.enqueue("stop", async () => {
      this.stopTicking();
      await this.releaseDevice("stop");
      this.transition("COMPLETED");
      this.logger.info({ elapsedSeconds: this.elapsedSeconds, tempFilePath: this.tempFilePath }, "capture stopped");
      return this.getSnapshot();
    });
  }

  /** Drops the current capture and starts a new one in a fresh temp file. */
  restart(): Promise<SessionSnapshot> {
    return this.enqueue("restart", async () => {
      this.stopTicking();
      if (this.state === "RECORDING" || this.state === "PAUSED") {
        await this.releaseDevice("restart");
      }
      this.elapsedSeconds = 0;
      this.tempFilePath = null;
      this.transition("IDLE");
      return this.beginCapture();
    });
  }

  /** Terminal. The temp file is left for the caller to clean up. */
  cancel(): Promise<SessionSnapshot> {
    return this.enqueue("cancel", async () => {
      this.stopTicking();
      if (this.state === "RECORDING" || this.state === "PAUSED") {
        await this.releaseDevice("cancel");
      }
      this.transition("DISCARDED");
      this.logger.info({ tempFilePath: this.tempFilePath }, "capture discarded");
      return this.getSnapshot();
    });
  }

  /**
   * Hands the completed capture to the coordinator. Failures propagate and
   * leave the session COMPLETED so saving can be retried.
   */
  save(title: string, description: string | null = null): Promise<AnalysisRecord> {
    return this.enqueue("save", async () => {
      if (this.savedAnalysisId !== null) {
        throw new InvalidTransitionError(`Capture already saved as analysis ${this.savedAnalysisId}`);
      }
      if (!title.trim()) {
        throw new ValidationError("Title must not be empty");
      }
      const sourcePath = this.tempFilePath;
      if (sourcePath === null) {
        throw new ValidationError("No captured audio to save");
      }

      let record: AnalysisRecord;
      try {
        record = await this.saver.createAnalysis({ title, description, sourcePath });
      } catch (err) {
        this.logger.warn({ err, sourcePath }, "saving capture failed; session stays completed");
        throw err;
      }

      this.savedAnalysisId = record.id;
      this.notify();
      return record;
    });
  }

  /** Stops the countdown and drops listeners. Does not touch the device. */
  dispose(): void {
    this.stopTicking();
    this.listeners.clear();
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private enqueue<T>(action: SessionAction, task: () => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      if (!isSessionActionAllowed(this.state, action)) {
        throw new InvalidTransitionError(`Cannot ${action} a session that is ${this.state}`);
      }
      return task();
    };
    const result = this.queue.then(run);
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private async beginCapture(): Promise<SessionSnapshot> {
    const outputPath = path.join(this.tmpDir, `recording-${this.createId()}.aac`);
    try {
      await this.device.start(outputPath);
    } catch (err) {
      this.reportDeviceError("start", err);
      return this.getSnapshot();
    }

    this.tempFilePath = outputPath;
    this.elapsedSeconds = 0;
    this.savedAnalysisId = null;
    this.lastError = null;
    this.transition("RECORDING");
    this.startTicking();
    this.logger.info({ tempFilePath: outputPath, maxSeconds: this.maxSeconds }, "capture started");
    return this.getSnapshot();
  }

  private startTicking(): void {
    this.stopTicking();
    const generation = this.generation;
    this.timer = setInterval(() => this.tick(generation), this.tickMs);
  }

  private stopTicking(): void {
    this.generation += 1;
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private tick(generation: number): void {
    if (generation !== this.generation || this.state !== "RECORDING") {
      return;
    }

    this.elapsedSeconds = Math.min(this.elapsedSeconds + 1, this.maxSeconds);
    if (this.elapsedSeconds < this.maxSeconds) {
      this.notify();
      return;
    }

    // Time box reached: complete now, release the device behind any queued action.
    this.stopTicking();
    this.transition("COMPLETED");
    this.logger.info({ tempFilePath: this.tempFilePath }, "capture time limit reached");
    const release = this.queue.then(() => this.releaseDevice("timeExpired"));
    this.queue = release;
  }

  /** Stops the device; a failure is reported, the capture on disk is kept. */
  private async releaseDevice(reason: string): Promise<void> {
    try {
      await this.device.stop();
    } catch (err) {
      this.reportDeviceError(`stop (${reason})`, err);
    }
  }

  private transition(to: RecordingSessionState): void {
    if (!canSessionTransition(this.state, to)) {
      throw new InvalidTransitionError(`Session cannot move from ${this.state} to ${to}`);
    }
    this.state = to;
    this.notify();
  }

  private reportDeviceError(operation: string, err: unknown): void {
    this.lastError = `Capture device ${operation} failed: ${describeError(err)}`;
    this.logger.warn({ err, state: this.state }, `capture device ${operation} failed`);
    this.notify();
  }

  private notify(): void {
    const snapshot = this.getSnapshot();
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (err) {
        this.logger.error({ err }, "session listener threw");
      }
    }
  }
}
