/**
 * types.ts - Shared data types for the indexing pipeline
 *
 * These types flow between the pipeline operations and the entry points:
 *
 * - reconcile()    produces ReconciliationReport
 * - indexAll()     produces IndexAllResult
 * - indexOne()     produces IndexOneResult
 * - syncPayload()  produces SyncPayloadResult
 * - migrateIds()   produces MigrationResult
 *
 * Every operation accepts an onProgress callback; it defaults to stdout.
 */

import type { ItemFailure } from "../errors";
import type { MetadataStore } from "../stores/metadata-store";
import type { ObjectStore } from "../stores/object-store";
import type { OcrEngine } from "../ocr";
import type { EmbeddingModel, VectorIndex } from "../vectorstore";

/** Progress and per-item error messages. */
export type ProgressCallback = (message: string) => void;

// ---------------------------------------------------------------------------
// Reconciliation
// ---------------------------------------------------------------------------

/**
 * Three-way diff between the metadata table, the vector index, and the
 * object store. All keys are canonical. Recomputed on demand, never stored.
 */
export interface ReconciliationReport {
  /** Distinct canonical keys in the metadata table */
  totalMetadata: number;
  /** Distinct filenames found in the vector index */
  totalIndexed: number;
  /** In metadata, not in the index */
  missingInIndex: Set<string>;
  /** missingInIndex ∩ object store keys */
  readyToIndex: Set<string>;
  /** missingInIndex − object store keys */
  missingInObjectStore: Set<string>;
  /**
   * False when the object store was unavailable. readyToIndex and
   * missingInObjectStore are then empty and missingInIndex is unpartitioned.
   */
  objectStoreChecked: boolean;
}

export interface ReconcileOptions {
  metadataStore: MetadataStore;
  vectorIndex: VectorIndex;
  /** Undefined when the object store is unavailable */
  objectStore?: ObjectStore;
  /** Canonical key prefix, e.g. "totenbilder/" */
  prefix: string;
  /** Vector index scan page size */
  scrollPageSize: number;
  onProgress?: ProgressCallback;
}

// ---------------------------------------------------------------------------
// Indexing
// ---------------------------------------------------------------------------

/**
 * Everything indexing needs. OCR is optional: without it `ocr_text` is not
 * written.
 */
export interface IndexerDeps {
  objectStore: ObjectStore;
  vectorIndex: VectorIndex;
  embedding: EmbeddingModel;
  ocr?: OcrEngine;
  prefix: string;
  onProgress?: ProgressCallback;
}

export interface IndexAllOptions extends IndexerDeps {
  /** Re-embed keys that already have a point */
  force?: boolean;
  /** Points per upsert call (default 50) */
  batchSize?: number;
}

export interface IndexAllResult {
  /** Keys embedded and written */
  processed: number;
  /** Keys that already had a point (only without force) */
  skipped: number;
  /** Keys that failed; they are retried by the next run */
  failed: ItemFailure[];
}

export interface IndexOneResult {
  /** The canonical key that was indexed */
  key: string;
  /** The point id it was written under */
  pointId: string;
}

// ---------------------------------------------------------------------------
// Payload sync
// ---------------------------------------------------------------------------

export interface SyncPayloadOptions {
  metadataStore: MetadataStore;
  vectorIndex: VectorIndex;
  prefix: string;
  /** Sync the one row for this filename (bare or prefixed) */
  filename?: string;
  /** Sync every row */
  all?: boolean;
  onProgress?: ProgressCallback;
}

/**
 * Tally of a payload sync. `success + skipped + errors.length === total`.
 */
export interface SyncPayloadResult {
  /** Metadata rows considered */
  total: number;
  /** Points whose nid/delta were overwritten */
  success: number;
  /** Rows with no point yet (indexing lag) */
  skipped: number;
  errors: ItemFailure[];
  /** 1 when a single filename was requested and no row exists for it */
  notFound: number;
}

// ---------------------------------------------------------------------------
// Id migration
// ---------------------------------------------------------------------------

export interface MigrateIdsOptions {
  vectorIndex: VectorIndex;
  scrollPageSize: number;
  /** Count what would change without writing */
  dryRun?: boolean;
  onProgress?: ProgressCallback;
}

export interface MigrationResult {
  /** Points read during the scan */
  scanned: number;
  /** Filenames re-keyed to their stable id */
  migrated: number;
  /** Extra points deleted (duplicates and the old ids of re-keyed points) */
  duplicatesRemoved: number;
}
