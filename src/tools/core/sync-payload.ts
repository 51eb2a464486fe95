/**
 * sync-payload core - Copies nid/delta from the metadata table to the index
 *
 * Over MCP every sync runs as a background job. A full sync is exclusive, one
 * at a time per process; single-filename syncs run side by side. The CLI
 * calls runSyncPayload directly and waits.
 */

import { z } from "zod";
import type { ServiceContext } from "../../context";
import { InvalidArgumentError } from "../../errors";
import {
  syncPayload,
  type JobRunner,
  type JobSnapshot,
  type ProgressCallback,
  type SyncPayloadResult,
} from "../../pipeline";
import { traceOperation } from "../../tracing/tool-tracing";

export const syncPayloadSchema = z.object({
  filename: z
    .string()
    .optional()
    .describe("Sync only this image (bare filename or full key)"),
  all: z.boolean().optional().describe("Sync every row of the metadata table"),
});

export type SyncPayloadInput = z.infer<typeof syncPayloadSchema>;

export const syncPayloadDescription = `Copy nid and delta from the metadata table into the vector index, so delta filters in search see current values.

Give exactly one of: filename (one image) or all=true (every row). Both run in the background and return a job snapshot; poll job_status for the tally. Only one full sync runs at a time. Images without a point are counted as skipped.`;

export async function runSyncPayload(
  context: ServiceContext,
  input: SyncPayloadInput,
  onProgress: ProgressCallback = console.log
): Promise<SyncPayloadResult> {
  return traceOperation(
    "sync_payload",
    { "sync.filename": input.filename, "sync.all": input.all === true },
    async (span) => {
      validate(input);
      const [metadataStore, vectorIndex] = await Promise.all([
        context.metadataStore.get(),
        context.vectorIndex.get(),
      ]);
      const result = await syncPayload({
        metadataStore,
        vectorIndex,
        prefix: context.config.imagePrefix,
        filename: input.filename,
        all: input.all,
        onProgress,
      });
      span.setAttributes({
        "sync.success": result.success,
        "sync.skipped": result.skipped,
        "sync.errors": result.errors.length,
      });
      return result;
    }
  );
}

/**
 * Starts a sync as a background job. A sync of every row is exclusive.
 * @throws InvalidArgumentError before the job starts if the input is invalid
 */
export function startSyncPayload(
  context: ServiceContext,
  jobs: JobRunner,
  input: SyncPayloadInput,
  onProgress?: ProgressCallback
): JobSnapshot {
  validate(input);
  return jobs.start("sync_payload", () => runSyncPayload(context, input, onProgress), {
    exclusive: input.all === true,
  });
}

function validate(input: SyncPayloadInput): void {
  const hasFilename = Boolean(input.filename?.trim());
  if (hasFilename === (input.all === true)) {
    throw new InvalidArgumentError("Specify exactly one of filename or all");
  }
}
