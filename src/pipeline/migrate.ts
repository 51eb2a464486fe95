/**
 * migrate.ts - One-time move of existing points onto stable ids
 *
 * Collections written before ids were derived from the canonical key hold
 * points under random UUIDs or numeric record ids, sometimes more than one per
 * filename. This scan leaves exactly one point per filename, stored under
 * pointIdFor(filename):
 *
 * - the point already under the stable id is kept as is
 * - otherwise the first point seen is copied to the stable id
 * - every other point for that filename is deleted
 *
 * The scan finishes before anything is written, so deletes never move the
 * scroll cursor. Safe to run again: a migrated collection reports 0 / 0.
 */

import { pointIdFor } from "../keys";
import { filenameFilter, type PointId, type StoredPoint } from "../vectorstore";
import { scanIndex } from "./scan";
import type { MigrateIdsOptions, MigrationResult } from "./types";

export async function migrateIds(options: MigrateIdsOptions): Promise<MigrationResult> {
  const onProgress = options.onProgress ?? console.log;
  const { vectorIndex } = options;
  const dryRun = options.dryRun === true;

  const byFilename = new Map<string, PointId[]>();
  let scanned = 0;
  for await (const points of scanIndex(vectorIndex, { pageSize: options.scrollPageSize })) {
    for (const point of points) {
      scanned++;
      const ids = byFilename.get(point.payload.filename) ?? [];
      ids.push(point.id);
      byFilename.set(point.payload.filename, ids);
    }
  }
  onProgress(`Scanned ${scanned} points for ${byFilename.size} filenames.`);

  const result: MigrationResult = { scanned, migrated: 0, duplicatesRemoved: 0 };

  for (const [filename, ids] of byFilename) {
    const stableId = pointIdFor(filename);
    const extraIds = ids.filter((id) => id !== stableId);
    if (extraIds.length === 0) continue;

    if (!ids.includes(stableId)) {
      if (!dryRun) {
        const source = await loadWithVector(options, filename, extraIds[0]);
        await vectorIndex.upsert([{ id: stableId, vector: source.vector, payload: source.payload }]);
      }
      result.migrated++;
    }

    if (!dryRun) await vectorIndex.delete(extraIds);
    result.duplicatesRemoved += extraIds.length;
  }

  onProgress(
    `${dryRun ? "Dry run: would migrate" : "Migrated"} ${result.migrated} filenames, ` +
      `${dryRun ? "would remove" : "removed"} ${result.duplicatesRemoved} points.`
  );
  return result;
}

/**
 * Reads one point's vector back. The scan reads payloads only; vectors are
 * fetched for the points about to be copied, paging through every point
 * stored for the filename.
 */
async function loadWithVector(
  options: MigrateIdsOptions,
  filename: string,
  id: PointId | undefined
): Promise<StoredPoint & { vector: number[] }> {
  const pages = scanIndex(options.vectorIndex, {
    pageSize: options.scrollPageSize,
    filter: filenameFilter(filename),
    withVectors: true,
  });
  for await (const points of pages) {
    const point = points.find((candidate) => candidate.id === id);
    if (point?.vector) return { ...point, vector: point.vector };
    if (point) break;
  }
  throw new Error(`Point ${String(id)} for '${filename}' has no stored vector`);
}
