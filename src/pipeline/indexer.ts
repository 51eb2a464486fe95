/**
 * indexer.ts - Turns images in the object store into vector index points
 *
 * Two entry points share one core routine (fetch -> embed -> optional OCR ->
 * point under the stable id):
 *
 * - indexAll(): walks every image key under the prefix. Keys that already have
 *   a point are skipped unless `force` is set. New points are buffered and
 *   written in batches of `batchSize`, plus one final flush.
 * - indexOne(): indexes one explicit key right away, always overwriting.
 *
 * Point ids come from pointIdFor(key), so writing the same key twice replaces
 * the point instead of adding a second one. When an existing point for the key
 * sits under another id (written before stable ids), that old point is deleted
 * after the new one is stored. Re-indexing keeps the point's nid and delta.
 *
 * Failure policy for indexAll(): fetching, decoding, embedding, or OCR of one
 * key is an item failure. It is logged, recorded in `failed`, and the loop moves
 * on; the key has no point, so the next run picks it up again. Vector index
 * errors (lookup, upsert) abort the run.
 */

import { ImageScoutError, InternalError, NotFoundError, errorMessage } from "../errors";
import { canonicalKey, isIndexableKey, pointIdFor } from "../keys";
import {
  filenameFilter,
  type ImagePayload,
  type PointId,
  type StoredPoint,
  type VectorPoint,
} from "../vectorstore";
import type {
  IndexAllOptions,
  IndexAllResult,
  IndexOneResult,
  IndexerDeps,
} from "./types";

/** Points per upsert call in bulk mode. */
export const DEFAULT_BATCH_SIZE = 50;

/**
 * Indexes every image under the prefix that has no point yet (or every image,
 * with `force`).
 *
 * @returns processed / skipped counts and the keys that failed
 * @throws if the vector index fails; points already flushed stay written
 */
export async function indexAll(options: IndexAllOptions): Promise<IndexAllResult> {
  const onProgress = options.onProgress ?? console.log;
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  const { objectStore, vectorIndex, prefix } = options;

  const result: IndexAllResult = { processed: 0, skipped: 0, failed: [] };
  let buffer: VectorPoint[] = [];
  let staleIds: PointId[] = [];

  const flush = async (): Promise<void> => {
    if (buffer.length === 0) return;
    await vectorIndex.upsert(buffer);
    await vectorIndex.delete(staleIds);
    result.processed += buffer.length;
    onProgress(`Indexed batch of ${buffer.length} (${result.processed} total).`);
    buffer = [];
    staleIds = [];
  };

  onProgress(`Indexing images under "${prefix}"${options.force ? " (force)" : ""}...`);

  for await (const keys of objectStore.listKeys(prefix)) {
    for (const key of keys) {
      if (!isIndexableKey(key, prefix)) continue;

      const existing = await findPoint(options, key);
      if (existing && !options.force) {
        result.skipped++;
        continue;
      }

      try {
        const bytes = await objectStore.getObject(key);
        const point = await buildPoint(options, key, bytes, existing);
        buffer.push(point);
        if (existing && existing.id !== point.id) staleIds.push(existing.id);
      } catch (error) {
        const message = errorMessage(error);
        result.failed.push({ key, message });
        onProgress(`Failed to index ${key}: ${message}`);
      }

      if (buffer.length >= batchSize) await flush();
    }
  }
  await flush();

  onProgress(
    `Indexing complete: ${result.processed} processed, ${result.skipped} skipped, ${result.failed.length} failed.`
  );
  return result;
}

/**
 * Indexes one key immediately, overwriting any existing point for it.
 * A bare filename is prefixed first.
 *
 * @throws NotFoundError if the object cannot be fetched
 * @throws InternalError for any other failure that is not already an
 *         ImageScoutError (decoding, embedding, writing)
 */
export async function indexOne(key: string, deps: IndexerDeps): Promise<IndexOneResult> {
  const onProgress = deps.onProgress ?? console.log;
  const canonical = canonicalKey(key, deps.prefix);

  let bytes: Uint8Array;
  try {
    bytes = await deps.objectStore.getObject(canonical);
  } catch (error) {
    throw new NotFoundError(`Image '${canonical}' could not be fetched: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  try {
    const existing = await findPoint(deps, canonical);
    const point = await buildPoint(deps, canonical, bytes, existing);
    await deps.vectorIndex.upsert([point]);
    if (existing && existing.id !== point.id) {
      await deps.vectorIndex.delete([existing.id]);
    }
    onProgress(`Indexed ${canonical}.`);
    return { key: canonical, pointId: pointIdFor(canonical) };
  } catch (error) {
    if (error instanceof ImageScoutError) throw error;
    throw new InternalError(`Indexing '${canonical}' failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

async function findPoint(deps: IndexerDeps, key: string): Promise<StoredPoint | undefined> {
  const [point] = await deps.vectorIndex.findByFilter(filenameFilter(key), { limit: 1 });
  return point;
}

/**
 * Embeds the bytes and assembles the point. nid/delta are copied from the
 * point being replaced, if any; payload sync owns those fields.
 */
async function buildPoint(
  deps: IndexerDeps,
  key: string,
  bytes: Uint8Array,
  existing: StoredPoint | undefined
): Promise<VectorPoint> {
  const vector = await deps.embedding.encodeImage(bytes);

  const payload: ImagePayload = { filename: key };
  if (deps.ocr) payload.ocr_text = await deps.ocr.recognize(bytes);
  if (existing?.payload.nid !== undefined) payload.nid = existing.payload.nid;
  if (existing?.payload.delta !== undefined) payload.delta = existing.payload.delta;

  return { id: pointIdFor(key), vector, payload };
}
