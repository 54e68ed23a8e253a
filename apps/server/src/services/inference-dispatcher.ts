import { inferenceResultSchema, type AnalysisRecord, type InferenceResult } from "@voicelens/shared";
import { InvalidTransitionError, NotFoundError, describeError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import type { PersistenceCoordinator } from "./persistence-coordinator.js";

/** Remote model that turns an audio file into per-channel predictions. */
export interface InferenceClient {
  predict(audioPath: string): Promise<InferenceResult[]>;
}

type DispatchCoordinator = Pick<
  PersistenceCoordinator,
  "getAnalysisById" | "applyPredictions" | "recordInferenceFailure" | "markPending"
>;

/**
 * Sends a stored analysis to the inference client and writes the results
 * back through the coordinator. Failures end up on the record (ERROR +
 * message) rather than being thrown.
 */
export class InferenceDispatcher {
  constructor(
    private readonly coordinator: DispatchCoordinator,
    private readonly client: InferenceClient,
    private readonly logger: Logger,
  ) {}

  async dispatch(id: number): Promise<AnalysisRecord> {
    const analysis = await this.coordinator.getAnalysisById(id);
    if (!analysis) {
      throw new NotFoundError(`Analysis ${id} not found`);
    }

    let results: InferenceResult[];
    try {
      const raw = await this.client.predict(analysis.audioPath);
      results = raw.map((result) => inferenceResultSchema.parse(result));
    } catch (err) {
      this.logger.warn({ analysisId: id, err }, "inference request failed");
      return this.coordinator.recordInferenceFailure(id, describeError(err));
    }

    if (results.length === 0) {
      return this.coordinator.recordInferenceFailure(id, "Inference returned no results");
    }

    let latest = analysis;
    for (const result of results) {
      latest = await this.coordinator.applyPredictions(id, result.channel, result.predictions, result.completedAt);
    }
    this.logger.info(
      { analysisId: id, channels: results.map((result) => result.channel) },
      "inference results applied",
    );
    return latest;
  }

  /** Only for analyses whose last attempt failed. */
  async retry(id: number): Promise<AnalysisRecord> {
    const analysis = await this.coordinator.getAnalysisById(id);
    if (!analysis) {
      throw new NotFoundError(`Analysis ${id} not found`);
    }
    if (analysis.sendStatus !== "ERROR") {
      throw new InvalidTransitionError(`Can only retry failed analyses (analysis ${id} is ${analysis.sendStatus})`);
    }

    await this.coordinator.markPending(id);
    return this.dispatch(id);
  }
}

/** Stand-in used when the process has no inference backend to talk to. */
export const unconfiguredInferenceClient: InferenceClient = {
  predict: () => Promise.reject(new Error("No inference backend configured")),
};
