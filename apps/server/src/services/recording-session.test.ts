import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import type { AnalysisRecord, SessionSnapshot } from "@voicelens/shared";
import { InvalidTransitionError, StorageError, ValidationError } from "../lib/errors.js";
import { silentLogger } from "../lib/logger.js";
import type { CreateAnalysisInput } from "./persistence-coordinator.js";
import { RecordingSession, type AnalysisSaver, type CaptureDevice } from "./recording-session.js";

const TMP_DIR = "/tmp/voicelens-session-test";

function fakeDevice() {
  return {
    start: vi.fn<(outputPath: string) => Promise<void>>().mockResolvedValue(undefined),
    pause: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
    resume: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
    stop: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
  } satisfies CaptureDevice;
}

function savedRecord(id: number, input: CreateAnalysisInput): AnalysisRecord {
  return {
    id,
    title: input.title,
    description: input.description ?? null,
    sendStatus: "PENDING",
    errorMessage: null,
    audioPath: `/vault/recording_${id}/recording.aac`,
    creationDate: "2026-03-01T10:00:00.000Z",
    completionDate: null,
    channels: {
      AGE: { predictions: null, feedback: null },
      GENDER: { predictions: null, feedback: null },
      NATIONALITY: { predictions: null, feedback: null },
      EMOTION: { predictions: null, feedback: null },
    },
    tags: [],
  };
}

let device: ReturnType<typeof fakeDevice>;
let createAnalysis: Mock<(input: CreateAnalysisInput) => Promise<AnalysisRecord>>;
let session: RecordingSession;
let ids: number;

beforeEach(() => {
  vi.useFakeTimers();
  device = fakeDevice();
  createAnalysis = vi.fn<(input: CreateAnalysisInput) => Promise<AnalysisRecord>>(async (input) =>
    savedRecord(7, input),
  );
  const saver: AnalysisSaver = { createAnalysis };
  ids = 0;
  session = new RecordingSession({
    device,
    saver,
    logger: silentLogger(),
    tmpDir: TMP_DIR,
    createId: () => `id-${++ids}`,
  });
});

afterEach(() => {
  session.dispose();
  vi.useRealTimers();
});

describe("RecordingSession countdown", () => {
  it("starts in IDLE with the full time box", () => {
    expect(session.getSnapshot()).toEqual({
      state: "IDLE",
      elapsedSeconds: 0,
      remainingSeconds: 30,
      maxSeconds: 30,
      tempFilePath: null,
      savedAnalysisId: null,
      lastError: null,
    });
  });

  it("writes to a fresh temp file on start", async () => {
    const snapshot = await session.start();

    expect(snapshot.state).toBe("RECORDING");
    expect(snapshot.tempFilePath).toBe(join(TMP_DIR, "recording-id-1.aac"));
    expect(device.start).toHaveBeenCalledWith(join(TMP_DIR, "recording-id-1.aac"));
  });

  it("completes by itself after 30 ticks", async () => {
    await session.start();

    await vi.advanceTimersByTimeAsync(29_000);
    expect(session.getSnapshot().state).toBe("RECORDING");
    expect(session.getSnapshot().remainingSeconds).toBe(1);

    await vi.advanceTimersByTimeAsync(1_000);
    await session.settled();

    const snapshot = session.getSnapshot();
    expect(snapshot.state).toBe("COMPLETED");
    expect(snapshot.elapsedSeconds).toBe(30);
    expect(snapshot.remainingSeconds).toBe(0);
    expect(device.stop).toHaveBeenCalledTimes(1);
  });

  it("keeps elapsed time across pause and resume", async () => {
    await session.start();
    await vi.advanceTimersByTimeAsync(5_000);

    await session.pause();
    await vi.advanceTimersByTimeAsync(10_000);
    expect(session.getSnapshot()).toMatchObject({ state: "PAUSED", elapsedSeconds: 5 });

    await session.resume();
    await vi.advanceTimersByTimeAsync(5_000);

    expect(session.getSnapshot()).toMatchObject({
      state: "RECORDING",
      elapsedSeconds: 10,
      remainingSeconds: 20,
    });
  });

  it("stops ticking once cancelled", async () => {
    await session.start();
    await vi.advanceTimersByTimeAsync(3_000);

    await session.cancel();
    await vi.advanceTimersByTimeAsync(60_000);

    expect(session.getSnapshot()).toMatchObject({ state: "DISCARDED", elapsedSeconds: 3 });
    expect(device.stop).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("honours a custom time box", async () => {
    session.dispose();
    session = new RecordingSession({
      device,
      saver: { createAnalysis },
      logger: silentLogger(),
      tmpDir: TMP_DIR,
      maxSeconds: 3,
    });

    await session.start();
    await vi.advanceTimersByTimeAsync(3_000);

    expect(session.getSnapshot()).toMatchObject({ state: "COMPLETED", remainingSeconds: 0 });
  });
});

describe("RecordingSession transitions", () => {
  it("completes on manual stop", async () => {
    await session.start();
    await vi.advanceTimersByTimeAsync(4_000);

    const snapshot = await session.stop();

    expect(snapshot).toMatchObject({ state: "COMPLETED", elapsedSeconds: 4, remainingSeconds: 26 });
    expect(device.stop).toHaveBeenCalledTimes(1);
  });

  it("completes from PAUSED", async () => {
    await session.start();
    await session.pause();

    expect((await session.stop()).state).toBe("COMPLETED");
  });

  it("rejects actions the current state does not accept", async () => {
    await expect(session.pause()).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(session.save("early")).rejects.toBeInstanceOf(InvalidTransitionError);

    await session.start();
    await expect(session.start()).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(session.resume()).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it("restarts a completed capture into a new temp file", async () => {
    await session.start();
    await vi.advanceTimersByTimeAsync(6_000);
    await session.stop();

    const snapshot = await session.restart();

    expect(snapshot).toMatchObject({
      state: "RECORDING",
      elapsedSeconds: 0,
      tempFilePath: join(TMP_DIR, "recording-id-2.aac"),
    });
    expect(device.start).toHaveBeenCalledTimes(2);
  });

  it("is terminal once discarded", async () => {
    await session.cancel();

    expect(session.getSnapshot().state).toBe("DISCARDED");
    await expect(session.start()).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(session.cancel()).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it("notifies subscribers on every tick", async () => {
    const seen: SessionSnapshot[] = [];
    const unsubscribe = session.subscribe((snapshot) => seen.push(snapshot));

    await session.start();
    await vi.advanceTimersByTimeAsync(2_000);
    unsubscribe();
    await vi.advanceTimersByTimeAsync(2_000);

    expect(seen.map((snapshot) => [snapshot.state, snapshot.elapsedSeconds])).toEqual([
      ["RECORDING", 0],
      ["RECORDING", 1],
      ["RECORDING", 2],
    ]);
  });
});

describe("RecordingSession device failures", () => {
  it("stays IDLE and reports when the device cannot start", async () => {
    device.start.mockRejectedValueOnce(new Error("microphone busy"));

    const snapshot = await session.start();

    expect(snapshot).toMatchObject({
      state: "IDLE",
      tempFilePath: null,
      lastError: "Capture device start failed: microphone busy",
    });
    expect(vi.getTimerCount()).toBe(0);

    expect((await session.start()).state).toBe("RECORDING");
    expect(session.getSnapshot().lastError).toBeNull();
  });

  it("keeps recording when pause fails", async () => {
    device.pause.mockRejectedValueOnce(new Error("driver error"));
    await session.start();

    const snapshot = await session.pause();
    await vi.advanceTimersByTimeAsync(2_000);

    expect(snapshot).toMatchObject({ state: "RECORDING", lastError: "Capture device pause failed: driver error" });
    expect(session.getSnapshot().elapsedSeconds).toBe(2);
  });

  it("stays PAUSED when resume fails", async () => {
    device.resume.mockRejectedValueOnce(new Error("gone"));
    await session.start();
    await session.pause();

    const snapshot = await session.resume();

    expect(snapshot).toMatchObject({ state: "PAUSED", lastError: "Capture device resume failed: gone" });
  });
});

describe("RecordingSession.save", () => {
  it("hands the capture to the coordinator", async () => {
    await session.start();
    await session.stop();

    const record = await session.save("Voice note", "in the car");

    expect(createAnalysis).toHaveBeenCalledWith({
      title: "Voice note",
      description: "in the car",
      sourcePath: join(TMP_DIR, "recording-id-1.aac"),
    });
    expect(record.id).toBe(7);
    expect(session.getSnapshot()).toMatchObject({ state: "COMPLETED", savedAnalysisId: 7 });
  });

  it("rejects a blank title without calling the coordinator", async () => {
    await session.start();
    await session.stop();

    await expect(session.save("  ")).rejects.toBeInstanceOf(ValidationError);
    expect(createAnalysis).not.toHaveBeenCalled();
  });

  it("stays COMPLETED after a failed save so it can be retried", async () => {
    createAnalysis.mockRejectedValueOnce(new StorageError("database locked"));
    await session.start();
    await session.stop();

    await expect(session.save("Retry me")).rejects.toBeInstanceOf(StorageError);
    expect(session.getSnapshot()).toMatchObject({ state: "COMPLETED", savedAnalysisId: null });

    const record = await session.save("Retry me");
    expect(record.title).toBe("Retry me");
  });

  it("refuses to save the same capture twice", async () => {
    await session.start();
    await session.stop();
    await session.save("Once");

    await expect(session.save("Twice")).rejects.toBeInstanceOf(InvalidTransitionError);
    expect(createAnalysis).toHaveBeenCalledTimes(1);
  });
});
