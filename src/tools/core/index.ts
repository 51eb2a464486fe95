/**
 * Core tools - Shared logic for the CLI and the MCP server
 *
 * This module re-exports all core tool functions, schemas, and descriptions.
 * Import from here when you need the shared logic without framework wrappers.
 *
 * Usage:
 *   import { searchImages, imageSearchSchema } from "./tools/core";
 */

export {
  searchImages,
  parseImageSearchInput,
  imageSearchSchema,
  imageSearchDescription,
  deltaFilter,
  imageUrl,
  DELTA_FILTERS,
  type DeltaFilter,
  type ImageSearchInput,
  type ImageSearchResult,
} from "./image-search";

export { runReconcile, reconcileSchema, reconcileDescription } from "./reconcile";

export {
  runIndexAll,
  startIndexAll,
  runIndexOne,
  indexImagesSchema,
  indexImagesDescription,
  indexImageSchema,
  indexImageDescription,
  type IndexImagesInput,
  type IndexImageInput,
} from "./index-images";

export {
  runSyncPayload,
  startSyncPayload,
  syncPayloadSchema,
  syncPayloadDescription,
  type SyncPayloadInput,
} from "./sync-payload";

export {
  runMigrateIds,
  migrateIdsSchema,
  parseMigrateIdsInput,
  type MigrateIdsInput,
} from "./migrate-ids";

export {
  jobStatus,
  jobStatusSchema,
  jobStatusDescription,
  type JobStatusInput,
} from "./job-status";
