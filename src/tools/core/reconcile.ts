/**
 * reconcile core - Reports images that are missing from the vector index
 *
 * Resolves the stores from the ServiceContext and runs the three-way diff.
 * An object store that is not configured (or failed to start) does not fail
 * the report: the missing keys are returned unpartitioned and
 * objectStoreChecked is false. The metadata store and the vector index are
 * required.
 */

import { z } from "zod";
import type { ServiceContext } from "../../context";
import { UnavailableError } from "../../errors";
import {
  reconcile,
  summarizeReport,
  type ProgressCallback,
  type ReconciliationSummary,
} from "../../pipeline";
import type { ObjectStore } from "../../stores/object-store";
import { traceOperation } from "../../tracing/tool-tracing";

/** reconcile takes no parameters. */
export const reconcileSchema = z.object({});

export const reconcileDescription = `Compare the metadata table, the vector index and the object store.

Returns counts of images in the metadata table and in the index, how many are missing from the index, and how those split into "ready to index" (the file exists in the object store) and "missing in object store". Up to 500 sorted example filenames are included per category. Read-only.`;

export async function runReconcile(
  context: ServiceContext,
  onProgress: ProgressCallback = console.log
): Promise<ReconciliationSummary> {
  return traceOperation("reconcile", {}, async (span) => {
    const [metadataStore, vectorIndex] = await Promise.all([
      context.metadataStore.get(),
      context.vectorIndex.get(),
    ]);
    const objectStore = await optionalObjectStore(context, onProgress);

    const report = await reconcile({
      metadataStore,
      vectorIndex,
      objectStore,
      prefix: context.config.imagePrefix,
      scrollPageSize: context.config.pipeline.scrollPageSize,
      onProgress,
    });

    span.setAttributes({
      "reconcile.missing_in_index": report.missingInIndex.size,
      "reconcile.ready_to_index": report.readyToIndex.size,
      "reconcile.missing_in_object_store": report.missingInObjectStore.size,
      "reconcile.object_store_checked": report.objectStoreChecked,
    });
    return summarizeReport(report);
  });
}

async function optionalObjectStore(
  context: ServiceContext,
  onProgress: ProgressCallback
): Promise<ObjectStore | undefined> {
  try {
    return await context.objectStore.get();
  } catch (error) {
    if (!(error instanceof UnavailableError)) throw error;
    onProgress(error.message);
    return undefined;
  }
}
