/**
 * payload-sync.ts - Copies nid/delta from the metadata table into point payloads
 *
 * The metadata table owns nid and delta. Search filters on the copies held in
 * the vector index payload, so after the table changes those copies are stale
 * until this runs. Staleness between runs is expected.
 *
 * For each row: normalize the filename, find the point by exact filename match,
 * and overwrite only `nid` and `delta` on it. A row with no point is skipped;
 * the image is simply not indexed yet. Each row is handled on its own, so one
 * failing update does not stop the others.
 */

import { InvalidArgumentError, errorMessage } from "../errors";
import { bareFilename, canonicalKey } from "../keys";
import type { MetadataRecord } from "../stores/metadata-store";
import { filenameFilter } from "../vectorstore";
import type { SyncPayloadOptions, SyncPayloadResult } from "./types";

/**
 * Syncs one filename or every row.
 *
 * @throws InvalidArgumentError unless exactly one of `filename` / `all` is given
 * @throws if the metadata store cannot be read
 */
export async function syncPayload(options: SyncPayloadOptions): Promise<SyncPayloadResult> {
  const onProgress = options.onProgress ?? console.log;
  const filename = options.filename?.trim() || undefined;
  const all = options.all === true;

  if ((filename === undefined) === !all) {
    throw new InvalidArgumentError("Specify exactly one of a filename or all rows");
  }

  const result: SyncPayloadResult = { total: 0, success: 0, skipped: 0, errors: [], notFound: 0 };

  const records = filename
    ? await findRecordsFor(options, filename)
    : await options.metadataStore.listRecords();

  if (filename && records.length === 0) {
    result.notFound = 1;
    onProgress(`No metadata row for ${filename}.`);
    return result;
  }

  result.total = records.length;
  onProgress(`Syncing payload for ${records.length} metadata rows...`);

  for (const record of records) {
    const key = canonicalKey(record.filename, options.prefix);
    try {
      const [point] = await options.vectorIndex.findByFilter(filenameFilter(key), { limit: 1 });
      if (!point) {
        result.skipped++;
        continue;
      }
      await options.vectorIndex.setPayload(point.id, { nid: record.nid, delta: record.delta });
      result.success++;
    } catch (error) {
      const message = errorMessage(error);
      result.errors.push({ key, message });
      onProgress(`Failed to sync ${key}: ${message}`);
    }
  }

  onProgress(
    `Payload sync complete: ${result.success} updated, ${result.skipped} skipped (vector not found), ${result.errors.length} errors.`
  );
  return result;
}

/**
 * The table may hold the bare or the prefixed spelling, so both are looked up.
 */
function findRecordsFor(
  options: SyncPayloadOptions,
  filename: string
): Promise<MetadataRecord[]> {
  const key = canonicalKey(filename, options.prefix);
  const spellings = new Set([bareFilename(key, options.prefix), key]);
  return options.metadataStore.findRecords([...spellings]);
}
