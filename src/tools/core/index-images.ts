/**
 * index-images core - Bulk and single-image indexing
 *
 * index_images starts a bulk run as a background job and returns its snapshot
 * right away; only one bulk run is active per process. index_image indexes one
 * key synchronously and returns the key it wrote.
 */

import { z } from "zod";
import type { ServiceContext } from "../../context";
import {
  indexAll,
  indexOne,
  type IndexAllResult,
  type IndexOneResult,
  type IndexerDeps,
  type JobRunner,
  type JobSnapshot,
  type ProgressCallback,
} from "../../pipeline";
import { traceOperation } from "../../tracing/tool-tracing";

export const indexImagesSchema = z.object({
  force: z
    .boolean()
    .default(false)
    .describe("Re-embed images that already have a point (default false)"),
});

export type IndexImagesInput = z.infer<typeof indexImagesSchema>;

export const indexImagesDescription = `Index every image in the object store that is not in the vector index yet.

Runs in the background and returns a job snapshot immediately; poll job_status with the returned id. With force=true, already indexed images are embedded again and overwritten in place. Starting a run while one is active returns the active run.`;

export const indexImageSchema = z.object({
  key: z
    .string()
    .min(1)
    .describe("Filename or full key of the image (e.g. 'a.jpg' or 'totenbilder/a.jpg')"),
});

export type IndexImageInput = z.infer<typeof indexImageSchema>;

export const indexImageDescription = `Index one image right away, overwriting any existing point for it. Returns the canonical key that was indexed.`;

/**
 * Runs a bulk index in the foreground (CLI) or inside a job (MCP).
 */
export async function runIndexAll(
  context: ServiceContext,
  input: IndexImagesInput,
  onProgress: ProgressCallback = console.log
): Promise<IndexAllResult> {
  return traceOperation("index_all", { "index.force": input.force }, async (span) => {
    const deps = await resolveIndexerDeps(context, onProgress);
    const result = await indexAll({
      ...deps,
      force: input.force,
      batchSize: context.config.pipeline.batchSize,
    });
    span.setAttributes({
      "index.processed": result.processed,
      "index.skipped": result.skipped,
      "index.failed": result.failed.length,
    });
    return result;
  });
}

export function startIndexAll(
  context: ServiceContext,
  jobs: JobRunner,
  input: IndexImagesInput,
  onProgress?: ProgressCallback
): JobSnapshot {
  return jobs.start("index_all", () => runIndexAll(context, input, onProgress), {
    exclusive: true,
  });
}

export async function runIndexOne(
  context: ServiceContext,
  input: IndexImageInput,
  onProgress: ProgressCallback = console.log
): Promise<IndexOneResult> {
  return traceOperation("index_one", { "index.key": input.key }, async () => {
    const deps = await resolveIndexerDeps(context, onProgress);
    return indexOne(input.key, deps);
  });
}

/**
 * Resolves everything indexing needs. Any unavailable dependency fails the
 * call before a single image is read.
 */
async function resolveIndexerDeps(
  context: ServiceContext,
  onProgress: ProgressCallback
): Promise<IndexerDeps> {
  const [objectStore, vectorIndex, embedding, ocr] = await Promise.all([
    context.objectStore.get(),
    context.vectorIndex.get(),
    context.embedding.get(),
    context.ocr.get(),
  ]);
  return {
    objectStore,
    vectorIndex,
    embedding,
    ocr,
    prefix: context.config.imagePrefix,
    onProgress,
  };
}
