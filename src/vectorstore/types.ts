/**
 * types.ts - Vector index interfaces and types
 *
 * What this file does:
 * Defines the capability set the pipeline and search code use to talk to the
 * vector database. Nothing outside src/vectorstore imports a vector database
 * client directly; Qdrant and Chroma each live behind this interface.
 *
 * Key concepts:
 * - VectorPoint: one indexed image (id + 512-d embedding + payload)
 * - ImagePayload: the denormalized metadata copy used for filtering
 * - PayloadFilter: backend-neutral exact-match / range conditions
 * - VectorIndex: upsert, filtered lookup, cursor scan, payload update, ranked query
 */

/** Embedding dimension shared by the image and text encoders. */
export const EMBEDDING_DIMENSION = 512;

/** Point ids: a UUID string, or the relational record's numeric id. */
export type PointId = string | number;

/**
 * Payload stored with every point.
 *
 * `filename` is the canonical key and is set when the point is created.
 * `nid` and `delta` are copied from the metadata table by payload sync and
 * may be missing until the first sync has run.
 */
export interface ImagePayload {
  filename: string;
  ocr_text?: string;
  nid?: number | null;
  delta?: number | null;
}

export interface VectorPoint {
  id: PointId;
  vector: number[];
  payload: ImagePayload;
}

/**
 * A point returned by lookups and scans. The vector is only present when
 * the caller asked for it.
 */
export interface StoredPoint {
  id: PointId;
  payload: ImagePayload;
  vector?: number[];
}

/** A point returned by a similarity query. Higher score = more similar. */
export interface ScoredPoint {
  id: PointId;
  payload: ImagePayload;
  score: number;
}

/**
 * A single payload condition.
 *
 * - equals: exact match on a keyword or number field
 * - greaterThan: strict numeric range (value > n)
 */
export type PayloadCondition =
  | { field: keyof ImagePayload; equals: string | number }
  | { field: keyof ImagePayload; greaterThan: number };

/**
 * Conditions combined with AND. An empty list matches everything.
 */
export interface PayloadFilter {
  must: PayloadCondition[];
}

/**
 * Options for a cursor-based scan of the whole collection.
 */
export interface ScrollOptions {
  /** Opaque cursor returned by the previous page; omit for the first page */
  cursor?: string | number;
  /** Page size */
  limit: number;
  /** Optional filter applied to the scan */
  filter?: PayloadFilter;
  /** Include vectors in the returned points (default: false) */
  withVectors?: boolean;
}

export interface ScrollPage {
  points: StoredPoint[];
  /** Cursor for the next page; undefined when the scan is complete */
  nextCursor?: string | number;
}

export interface QueryOptions {
  filter?: PayloadFilter;
  limit: number;
  offset?: number;
}

/**
 * The main interface for vector index operations.
 *
 * Usage pattern:
 *   1. initialize(): ensure the collection and the filename index exist
 *   2. upsert(): add or overwrite points
 *   3. findByFilter() / scroll(): exact-match lookups and full scans
 *   4. setPayload(): overwrite selected payload fields on one point
 *   5. query(): ranked nearest-neighbor search, best first
 */
export interface VectorIndex {
  /**
   * Creates the collection (512-d, cosine) if it doesn't exist and ensures a
   * keyword index on payload `filename`. Idempotent.
   */
  initialize(): Promise<void>;

  /** Inserts or overwrites points by id. */
  upsert(points: VectorPoint[]): Promise<void>;

  /**
   * Returns up to `limit` points matching the filter, in storage order.
   */
  findByFilter(
    filter: PayloadFilter,
    options: { limit: number; withVectors?: boolean }
  ): Promise<StoredPoint[]>;

  /** Reads one page of a full scan. */
  scroll(options: ScrollOptions): Promise<ScrollPage>;

  /**
   * Overwrites only the given payload fields on one point; other fields
   * (filename, ocr_text) are left untouched.
   */
  setPayload(id: PointId, payload: Partial<ImagePayload>): Promise<void>;

  /**
   * Nearest-neighbor search. Results come back in the index's native order
   * (descending similarity).
   */
  query(vector: number[], options: QueryOptions): Promise<ScoredPoint[]>;

  /** Removes points by id. Only the id migration deletes points. */
  delete(ids: PointId[]): Promise<void>;
}

/**
 * Builds the exact-match filter on the canonical key.
 */
export function filenameFilter(key: string): PayloadFilter {
  return { must: [{ field: "filename", equals: key }] };
}
