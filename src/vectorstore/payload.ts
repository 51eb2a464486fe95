/**
 * payload.ts - Validation of payloads read back from a vector database
 *
 * Backends hand back loosely typed payloads (Qdrant: Record<string, unknown>,
 * Chroma: flat metadata). Both go through parsePayload() so the rest of the
 * code only ever sees an ImagePayload. Points without a string `filename` are
 * not images this project manages and are skipped by the backends.
 */

import { z } from "zod";
import type { ImagePayload } from "./types";

const payloadSchema = z.object({
  filename: z.string(),
  ocr_text: z.string().optional(),
  nid: z.number().nullable().optional(),
  delta: z.number().nullable().optional(),
});

export function parsePayload(raw: unknown): ImagePayload | undefined {
  const parsed = payloadSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Narrows a vector returned by a backend to a dense number[].
 * Named or multi-vector shapes are not used by this project.
 */
export function asDenseVector(raw: unknown): number[] | undefined {
  if (!Array.isArray(raw)) return undefined;
  const out: number[] = [];
  for (const value of raw) {
    if (typeof value !== "number") return undefined;
    out.push(value);
  }
  return out;
}

/**
 * Drops undefined fields so a partial payload update never writes them.
 */
export function definedFields(
  payload: Partial<ImagePayload>
): Record<string, string | number | null> {
  const out: Record<string, string | number | null> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}
