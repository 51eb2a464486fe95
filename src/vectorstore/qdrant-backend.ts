/**
 * qdrant-backend.ts - Qdrant implementation of the VectorIndex interface
 *
 * What this file does:
 * Implements VectorIndex on top of the Qdrant REST client. This is the only
 * file that imports "@qdrant/js-client-rest"; pipeline and search code go
 * through the interface in types.ts.
 *
 * How it maps:
 * - initialize() -> collectionExists / createCollection (512-d, Cosine)
 *                   + createPayloadIndex(filename, keyword)
 * - findByFilter() / scroll() -> scroll with filter and next_page_offset cursor
 * - setPayload() -> set_payload (merges fields, leaves others untouched)
 * - query() -> query API with filter, limit, offset (native cosine score)
 *
 * Every write waits for the operation to be applied (wait: true) so a lookup
 * right after an upsert sees the new point.
 */

import { QdrantClient, type Schemas } from "@qdrant/js-client-rest";
import {
  EMBEDDING_DIMENSION,
  type ImagePayload,
  type PayloadFilter,
  type PointId,
  type QueryOptions,
  type ScoredPoint,
  type ScrollOptions,
  type ScrollPage,
  type StoredPoint,
  type VectorIndex,
  type VectorPoint,
} from "./types";
import { asDenseVector, definedFields, parsePayload } from "./payload";

/**
 * The subset of the Qdrant client this backend calls.
 * Declared so tests can pass a stub instead of a live client.
 */
export type QdrantApi = Pick<
  QdrantClient,
  | "collectionExists"
  | "createCollection"
  | "createPayloadIndex"
  | "upsert"
  | "scroll"
  | "setPayload"
  | "query"
  | "delete"
>;

export interface QdrantBackendOptions {
  /** Collection holding the image points */
  collection: string;
  /** Qdrant server URL (e.g. http://localhost:6333) */
  url?: string;
  apiKey?: string;
  /** Pre-built client, used by tests */
  client?: QdrantApi;
}

export class QdrantBackend implements VectorIndex {
  private readonly client: QdrantApi;
  private readonly collection: string;

  constructor(options: QdrantBackendOptions) {
    this.collection = options.collection;
    this.client =
      options.client ?? new QdrantClient({ url: options.url, apiKey: options.apiKey });
  }

  async initialize(): Promise<void> {
    const { exists } = await this.client.collectionExists(this.collection);
    if (!exists) {
      await this.client.createCollection(this.collection, {
        vectors: { size: EMBEDDING_DIMENSION, distance: "Cosine" },
      });
    }

    // Creating an index that already exists is a no-op on the server.
    await this.client.createPayloadIndex(this.collection, {
      field_name: "filename",
      field_schema: "keyword",
      wait: true,
    });
  }

  async upsert(points: VectorPoint[]): Promise<void> {
    if (points.length === 0) return;
    await this.client.upsert(this.collection, {
      wait: true,
      points: points.map((point) => ({
        id: point.id,
        vector: point.vector,
        payload: definedFields(point.payload),
      })),
    });
  }

  async findByFilter(
    filter: PayloadFilter,
    options: { limit: number; withVectors?: boolean }
  ): Promise<StoredPoint[]> {
    const page = await this.scroll({
      filter,
      limit: options.limit,
      withVectors: options.withVectors,
    });
    return page.points;
  }

  async scroll(options: ScrollOptions): Promise<ScrollPage> {
    const result = await this.client.scroll(this.collection, {
      filter: options.filter ? toQdrantFilter(options.filter) : undefined,
      limit: options.limit,
      offset: options.cursor,
      with_payload: true,
      with_vector: options.withVectors ?? false,
    });

    const points: StoredPoint[] = [];
    for (const record of result.points) {
      const payload = parsePayload(record.payload);
      if (!payload) continue;
      const vector = asDenseVector(record.vector);
      points.push({ id: record.id, payload, ...(vector ? { vector } : {}) });
    }

    const next = result.next_page_offset;
    return {
      points,
      nextCursor: typeof next === "string" || typeof next === "number" ? next : undefined,
    };
  }

  async setPayload(id: PointId, payload: Partial<ImagePayload>): Promise<void> {
    await this.client.setPayload(this.collection, {
      points: [id],
      payload: definedFields(payload),
      wait: true,
    });
  }

  async query(vector: number[], options: QueryOptions): Promise<ScoredPoint[]> {
    const result = await this.client.query(this.collection, {
      query: vector,
      filter: options.filter ? toQdrantFilter(options.filter) : undefined,
      limit: options.limit,
      offset: options.offset ?? 0,
      with_payload: true,
    });

    const hits: ScoredPoint[] = [];
    for (const point of result.points) {
      const payload = parsePayload(point.payload);
      if (!payload) continue;
      hits.push({ id: point.id, payload, score: point.score });
    }
    return hits;
  }

  async delete(ids: PointId[]): Promise<void> {
    if (ids.length === 0) return;
    await this.client.delete(this.collection, { points: ids, wait: true });
  }
}

/**
 * Translates the backend-neutral filter into Qdrant's `must` conditions.
 *
 *   { field: "delta", equals: 0 }       -> { key: "delta", match: { value: 0 } }
 *   { field: "delta", greaterThan: 0 }  -> { key: "delta", range: { gt: 0 } }
 */
export function toQdrantFilter(filter: PayloadFilter): Schemas["Filter"] {
  return {
    must: filter.must.map((condition): Schemas["FieldCondition"] =>
      "equals" in condition
        ? { key: condition.field, match: { value: condition.equals } }
        : { key: condition.field, range: { gt: condition.greaterThan } }
    ),
  };
}
