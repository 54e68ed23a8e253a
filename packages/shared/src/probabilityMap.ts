import { probabilityLabelSchema, probabilityMapSchema } from "./schemas.js";
import type { ProbabilityMap } from "./types.js";

/**
 * Text encoding of a label → confidence map, stored in the *_RESULT columns:
 * `[k1:v1,k2:v2]`, `[]` for an empty map, SQL NULL for no map at all.
 */

export type ProbabilityMapParse =
  | { kind: "parsed"; map: ProbabilityMap }
  | { kind: "partial"; map: ProbabilityMap; dropped: string[] }
  | { kind: "unparseable" };

const NUMBER_PATTERN = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

/**
 * Encodes a map. Throws on a map that could not be decoded back to itself
 * (labels containing delimiters, non-finite or out-of-range values).
 */
export function encodeProbabilityMap(map: ProbabilityMap): string;
export function encodeProbabilityMap(map: ProbabilityMap | null): string | null;
export function encodeProbabilityMap(map: ProbabilityMap | null): string | null {
  if (map === null) {
    return null;
  }

  const validated = probabilityMapSchema.safeParse(map);
  if (!validated.success) {
    throw new Error(`Cannot encode probability map: ${validated.error.message}`);
  }

  const body = Object.entries(validated.data)
    .map(([label, confidence]) => `${label}:${String(confidence)}`)
    .join(",");
  return `[${body}]`;
}

/**
 * Best-effort parse that reports which pairs were dropped. Stored values may
 * come from older schema versions, so nothing here throws.
 */
export function parseProbabilityMap(raw: string | null | undefined): ProbabilityMapParse {
  if (raw === null || raw === undefined) {
    return { kind: "unparseable" };
  }

  const trimmed = raw.trim();
  if (trimmed.length < 2 || !trimmed.startsWith("[") || !trimmed.endsWith("]")) {
    return { kind: "unparseable" };
  }

  const body = trimmed.slice(1, -1);
  if (body.trim() === "") {
    return { kind: "parsed", map: {} };
  }

  const entries = new Map<string, number>();
  const dropped: string[] = [];

  for (const pair of body.split(",")) {
    const separator = pair.indexOf(":");
    if (separator < 0) {
      dropped.push(pair);
      continue;
    }

    // Pairs the encoder could never have written (bad label, repeated label,
    // confidence outside 0..1) are dropped like unparseable ones.
    const label = pair.slice(0, separator).trim();
    const rawValue = pair.slice(separator + 1).trim();
    if (!probabilityLabelSchema.safeParse(label).success || entries.has(label) || !NUMBER_PATTERN.test(rawValue)) {
      dropped.push(pair);
      continue;
    }

    const value = Number.parseFloat(rawValue);
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      dropped.push(pair);
      continue;
    }

    entries.set(label, value);
  }

  const map: ProbabilityMap = Object.fromEntries(entries);
  return dropped.length === 0 ? { kind: "parsed", map } : { kind: "partial", map, dropped };
}

/**
 * Decodes a stored value; malformed input yields null ("no prediction"), and
 * so does a non-empty value none of whose pairs survived.
 */
export function decodeProbabilityMap(raw: string | null | undefined): ProbabilityMap | null {
  const result = parseProbabilityMap(raw);
  if (result.kind === "unparseable") {
    return null;
  }
  if (result.kind === "partial" && Object.keys(result.map).length === 0) {
    return null;
  }
  return result.map;
}
