/**
 * scan.ts - Full cursor scan of the vector index
 */

import type { PayloadFilter, StoredPoint, VectorIndex } from "../vectorstore";

/**
 * Yields every point in the index (or every point matching `filter`), one
 * page at a time, following the backend's cursor until it reports no next
 * page.
 */
export async function* scanIndex(
  vectorIndex: VectorIndex,
  options: { pageSize: number; withVectors?: boolean; filter?: PayloadFilter }
): AsyncGenerator<StoredPoint[]> {
  let cursor: string | number | undefined;
  do {
    const page = await vectorIndex.scroll({
      cursor,
      limit: options.pageSize,
      filter: options.filter,
      withVectors: options.withVectors,
    });
    yield page.points;
    cursor = page.nextCursor;
  } while (cursor !== undefined);
}
