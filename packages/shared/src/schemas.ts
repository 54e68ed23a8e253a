import { z } from "zod";
import { PREDICTION_CHANNELS } from "./constants.js";

// ─── Primitives ───────────────────────────────────────────────────────────────

const ISO_DATETIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(?:Z|[+-](\d{2}):(\d{2}))$/;

/** Shape check plus calendar check: month, day-of-month, hour, minute, second and offset in range. */
function isRealDatetime(value: string): boolean {
  const match = ISO_DATETIME_PATTERN.exec(value);
  if (!match) {
    return false;
  }

  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  const offsetHour = match[7] === undefined ? 0 : Number(match[7]);
  const offsetMinute = match[8] === undefined ? 0 : Number(match[8]);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    return false;
  }
  if (hour > 23 || minute > 59 || second > 59 || offsetHour > 23 || offsetMinute > 59) {
    return false;
  }

  const calendarDay = new Date(Date.UTC(year, month - 1, day));
  return (
    calendarDay.getUTCFullYear() === year &&
    calendarDay.getUTCMonth() === month - 1 &&
    calendarDay.getUTCDate() === day &&
    !Number.isNaN(Date.parse(value))
  );
}

export const isoDatetimeSchema = z.string().refine(isRealDatetime, "Must be ISO 8601 datetime");

export const sendStatusSchema = z.enum(["PENDING", "SENT", "ERROR"]);

export type SendStatusFromSchema = z.infer<typeof sendStatusSchema>;

export const predictionChannelSchema = z.enum(["AGE", "GENDER", "NATIONALITY", "EMOTION"]);

export type PredictionChannelFromSchema = z.infer<typeof predictionChannelSchema>;

/**
 * A label must survive the `[k:v,...]` text encoding: no delimiter characters
 * and no surrounding whitespace (decoding trims).
 */
export const probabilityLabelSchema = z
  .string()
  .regex(/^[^\s,:[\]](?:[^,:[\]]*[^\s,:[\]])?$/, "Label must not contain , : [ ] or surrounding whitespace")
  .refine((label) => label !== "__proto__", "Label must not be __proto__");

export const probabilityMapSchema = z.record(
  probabilityLabelSchema,
  z.number().finite().min(0).max(1),
);

export type ProbabilityMapFromSchema = z.infer<typeof probabilityMapSchema>;

// ─── Domain schemas ───────────────────────────────────────────────────────────

export const channelResultSchema = z
  .object({
    predictions: probabilityMapSchema.nullable(),
    feedback: z.boolean().nullable(),
  })
  .refine((value) => value.feedback === null || value.predictions !== null, {
    message: "feedback requires a prediction map",
    path: ["feedback"],
  });

export const channelResultsSchema = z.object({
  AGE: channelResultSchema,
  GENDER: channelResultSchema,
  NATIONALITY: channelResultSchema,
  EMOTION: channelResultSchema,
});

export const tagSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
});

export type TagFromSchema = z.infer<typeof tagSchema>;

export const analysisRecordSchema = z
  .object({
    id: z.number().int().positive(),
    title: z.string().min(1),
    description: z.string().nullable(),
    sendStatus: sendStatusSchema,
    errorMessage: z.string().nullable(),
    audioPath: z.string().min(1),
    creationDate: isoDatetimeSchema,
    completionDate: isoDatetimeSchema.nullable(),
    channels: channelResultsSchema,
    tags: z.array(tagSchema),
  })
  .superRefine((value, context) => {
    const hasPredictions = PREDICTION_CHANNELS.some(
      (channel) => value.channels[channel].predictions !== null,
    );

    if (hasPredictions !== (value.completionDate !== null)) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: "completionDate must be set exactly when a prediction channel is populated",
        path: ["completionDate"],
      });
    }

    if (value.errorMessage !== null && value.sendStatus !== "ERROR") {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: "errorMessage is only allowed when sendStatus is ERROR",
        path: ["errorMessage"],
      });
    }
  });

export type AnalysisRecordFromSchema = z.infer<typeof analysisRecordSchema>;

export const inferenceResultSchema = z.object({
  channel: predictionChannelSchema,
  predictions: probabilityMapSchema,
  completedAt: isoDatetimeSchema,
});

export type InferenceResultFromSchema = z.infer<typeof inferenceResultSchema>;

// ─── HTTP bodies ──────────────────────────────────────────────────────────────

export const applyPredictionsBodySchema = inferenceResultSchema;

export const feedbackBodySchema = z.object({
  channel: predictionChannelSchema,
  value: z.boolean(),
});

export type FeedbackBodyFromSchema = z.infer<typeof feedbackBodySchema>;

export const createTagBodySchema = z.object({
  name: z.string().trim().min(1).max(64),
});

export const analysesQuerySchema = z.object({
  status: sendStatusSchema.optional(),
  limit: z.coerce.number().int().positive().max(500).optional(),
  orderBy: z.enum(["creationDate", "completionDate", "title"]).optional(),
  direction: z.enum(["asc", "desc"]).optional(),
});

export type AnalysesQueryFromSchema = z.infer<typeof analysesQuerySchema>;

// ─── HTTP responses ───────────────────────────────────────────────────────────

export const healthResponseSchema = z.object({
  status: z.literal("ok"),
});

export type HealthResponseFromSchema = z.infer<typeof healthResponseSchema>;

export const analysesListResponseSchema = z.object({
  analyses: z.array(analysisRecordSchema),
});

export const analysisDetailResponseSchema = z.object({
  analysis: analysisRecordSchema,
});

export const tagsListResponseSchema = z.object({
  tags: z.array(tagSchema),
});

export const tagDetailResponseSchema = z.object({
  tag: tagSchema,
});

export const deleteAnalysisResponseSchema = z.object({
  deleted: z.literal(true),
  orphanedDirectory: z.boolean(),
});

export const errorResponseSchema = z.object({
  error: z.string(),
  code: z.string(),
});

export type ErrorResponseFromSchema = z.infer<typeof errorResponseSchema>;
