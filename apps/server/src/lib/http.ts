import type { Context } from "hono";
import type { z } from "zod";
import { ValidationError } from "./errors.js";

/**
 * Parses a positive integer path parameter (e.g. ":id" in "/api/analyses/:id").
 * Returns null for anything else, including "01", "1.5" and values beyond
 * Number.MAX_SAFE_INTEGER.
 */
export function parsePositiveId(raw: string | undefined): number | null {
  if (raw === undefined || !/^[1-9]\d*$/.test(raw)) {
    return null;
  }
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : null;
}

export function requireIdParam(c: Context, name: string): number {
  const raw = c.req.param(name);
  const id = parsePositiveId(raw);
  if (id === null) {
    throw new ValidationError(`Path parameter "${name}" must be a positive integer, got "${raw ?? ""}"`);
  }
  return id;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, what: string): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${what}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export async function readJsonBody<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch (cause) {
    throw new ValidationError("Request body must be valid JSON", { cause });
  }
  return parseWith(schema, raw, "request body");
}

/** Response payloads go through the shared schemas; a mismatch is a server bug. */
export function validateResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, what: string): T {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Invalid ${what} payload: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}
