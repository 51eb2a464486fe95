/**
 * pipeline/index.ts - Public API for the indexing pipeline
 *
 * Re-exports everything other modules need from the pipeline.
 * Import from here, never directly from the operation files.
 *
 * Usage:
 *   import { reconcile, indexAll, syncPayload, type IndexAllResult } from "./pipeline";
 */

export type {
  ProgressCallback,
  ReconciliationReport,
  ReconcileOptions,
  IndexerDeps,
  IndexAllOptions,
  IndexAllResult,
  IndexOneResult,
  SyncPayloadOptions,
  SyncPayloadResult,
  MigrateIdsOptions,
  MigrationResult,
} from "./types";

export {
  reconcile,
  summarizeReport,
  RECONCILIATION_SAMPLE_SIZE,
  type ReconciliationSummary,
} from "./reconcile";
export { indexAll, indexOne, DEFAULT_BATCH_SIZE } from "./indexer";
export { syncPayload } from "./payload-sync";
export { migrateIds } from "./migrate";
export { scanIndex } from "./scan";
export { JobRunner, type JobSnapshot, type JobStatus, type JobRunnerOptions } from "./jobs";
