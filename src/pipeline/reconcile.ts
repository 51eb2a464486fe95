/**
 * reconcile.ts - Three-way diff across metadata, vector index, and object store
 *
 * Answers "which images should be indexed but are not, and can they be?":
 *
 * 1. Read every filename from the metadata table and normalize it to the
 *    canonical key (the table mixes "a.jpg" and "totenbilder/a.jpg")
 * 2. Scan the whole vector index, collecting payload filenames
 * 3. missingInIndex = metadata − index
 * 4. List the object store under the prefix
 * 5. Split missingInIndex into readyToIndex (object exists) and
 *    missingInObjectStore (object gone)
 *
 * Steps 4-5 are skipped when no object store is passed in; the report is then
 * flagged with objectStoreChecked: false. A store that is configured but fails
 * mid-listing aborts the whole run instead.
 *
 * Read-only: nothing is written to any store.
 */

import { canonicalKey } from "../keys";
import { scanIndex } from "./scan";
import type { ReconcileOptions, ReconciliationReport } from "./types";

/** Sample size for the lists in a ReconciliationSummary. */
export const RECONCILIATION_SAMPLE_SIZE = 500;

/**
 * Counts plus bounded, sorted samples of a report, for callers that
 * print or serialize it.
 */
export interface ReconciliationSummary {
  totalMetadata: number;
  totalIndexed: number;
  missingInIndex: number;
  readyToIndex: number;
  missingInObjectStore: number;
  objectStoreChecked: boolean;
  samples: {
    missingInIndex: string[];
    readyToIndex: string[];
    missingInObjectStore: string[];
  };
}

/**
 * Computes the reconciliation report.
 *
 * @throws whatever the metadata store, vector index, or object store throws;
 *         partial reports are never returned
 */
export async function reconcile(options: ReconcileOptions): Promise<ReconciliationReport> {
  const onProgress = options.onProgress ?? console.log;
  const { prefix } = options;

  // 1. Metadata filenames, canonical
  const metadataKeys = new Set(
    (await options.metadataStore.listFilenames()).map((filename) =>
      canonicalKey(filename, prefix)
    )
  );
  onProgress(`Metadata store: ${metadataKeys.size} images.`);

  // 2. Index filenames
  const indexedKeys = new Set<string>();
  for await (const points of scanIndex(options.vectorIndex, {
    pageSize: options.scrollPageSize,
  })) {
    for (const point of points) indexedKeys.add(point.payload.filename);
  }
  onProgress(`Vector index: ${indexedKeys.size} images.`);

  // 3. Missing from the index
  const missingInIndex = difference(metadataKeys, indexedKeys);

  const report: ReconciliationReport = {
    totalMetadata: metadataKeys.size,
    totalIndexed: indexedKeys.size,
    missingInIndex,
    readyToIndex: new Set(),
    missingInObjectStore: new Set(),
    objectStoreChecked: false,
  };

  if (!options.objectStore) {
    onProgress(
      `Object store unavailable: ${missingInIndex.size} images missing from the index, not checked against the bucket.`
    );
    return report;
  }

  // 4. Object store keys
  const objectKeys = new Set<string>();
  for await (const keys of options.objectStore.listKeys(prefix)) {
    for (const key of keys) objectKeys.add(key);
  }

  // 5. Partition
  for (const key of missingInIndex) {
    if (objectKeys.has(key)) report.readyToIndex.add(key);
    else report.missingInObjectStore.add(key);
  }
  report.objectStoreChecked = true;

  onProgress(
    `Reconciliation complete: ${missingInIndex.size} missing in index, ` +
      `${report.readyToIndex.size} ready to index, ` +
      `${report.missingInObjectStore.size} missing in object store.`
  );

  return report;
}

/**
 * Reduces a report to counts and the first `sampleSize` keys of each set,
 * sorted so repeated runs print the same sample.
 */
export function summarizeReport(
  report: ReconciliationReport,
  sampleSize: number = RECONCILIATION_SAMPLE_SIZE
): ReconciliationSummary {
  const sample = (keys: Set<string>) => [...keys].sort().slice(0, sampleSize);
  return {
    totalMetadata: report.totalMetadata,
    totalIndexed: report.totalIndexed,
    missingInIndex: report.missingInIndex.size,
    readyToIndex: report.readyToIndex.size,
    missingInObjectStore: report.missingInObjectStore.size,
    objectStoreChecked: report.objectStoreChecked,
    samples: {
      missingInIndex: sample(report.missingInIndex),
      readyToIndex: sample(report.readyToIndex),
      missingInObjectStore: sample(report.missingInObjectStore),
    },
  };
}

function difference(left: Set<string>, right: Set<string>): Set<string> {
  const out = new Set<string>();
  for (const value of left) {
    if (!right.has(value)) out.add(value);
  }
  return out;
}
