/**
 * chroma-backend.ts - Chroma implementation of the VectorIndex interface
 *
 * What this file does:
 * Implements VectorIndex using Chroma as the backend. This is the only file
 * in the project that imports from "chromadb".
 *
 * Where Chroma differs from Qdrant, and how this backend bridges it:
 * - Ids are strings. Numeric ids are stored as their decimal string.
 * - There is no scroll cursor. The cursor is the numeric offset of the next
 *   page; a short page ends the scan.
 * - query() has no offset. We ask for offset + limit neighbors and drop
 *   the first `offset` of them.
 * - Chroma reports cosine *distance* (0 = identical). We report
 *   1 - distance so scores read the same as Qdrant's cosine similarity.
 * - Metadata values cannot be null, and update() merges keys without
 *   removing any. A null payload field is left out of the metadata; clearing
 *   a stored field rewrites the whole record.
 *
 * We pass pre-computed embeddings to Chroma (not a Chroma embedding function);
 * vectors come from the embedding model.
 */

import { ChromaClient, type Collection, type Metadata, type Where } from "chromadb";
import type {
  ImagePayload,
  PayloadFilter,
  PointId,
  QueryOptions,
  ScoredPoint,
  ScrollOptions,
  ScrollPage,
  StoredPoint,
  VectorIndex,
  VectorPoint,
} from "./types";
import { asDenseVector, definedFields, parsePayload } from "./payload";

/**
 * Default Chroma server URL.
 *
 * The TypeScript SDK always requires a running Chroma server.
 * Override with CHROMA_URL for non-default setups.
 */
const DEFAULT_CHROMA_URL = "http://localhost:8000";

/** The collection methods this backend calls; tests pass a stub. */
export type ChromaCollectionApi = Pick<
  Collection,
  "upsert" | "get" | "update" | "query" | "delete"
>;

export interface ChromaBackendOptions {
  collection: string;
  chromaUrl?: string;
  /** Pre-resolved collection, used by tests */
  collectionApi?: ChromaCollectionApi;
}

export class ChromaBackend implements VectorIndex {
  private readonly client: ChromaClient;
  private readonly name: string;

  /**
   * The collection handle, set by initialize(). Each operation needs it;
   * caching avoids a getOrCreateCollection round-trip per call.
   */
  private collection: ChromaCollectionApi | undefined;

  constructor(options: ChromaBackendOptions) {
    this.name = options.collection;
    this.collection = options.collectionApi;

    // Parse the URL into host and port for the Chroma v3 SDK.
    const parsed = new URL(options.chromaUrl ?? DEFAULT_CHROMA_URL);
    this.client = new ChromaClient({
      host: parsed.hostname,
      port: parseInt(parsed.port || (parsed.protocol === "https:" ? "443" : "8000"), 10),
      ssl: parsed.protocol === "https:",
    });
  }

  /**
   * Uses getOrCreateCollection for idempotency. Chroma indexes metadata
   * fields automatically, so there is no separate filename index to create.
   *
   * embeddingFunction: null tells Chroma we provide pre-computed embeddings.
   */
  async initialize(): Promise<void> {
    if (this.collection) return;
    this.collection = await this.client.getOrCreateCollection({
      name: this.name,
      configuration: { hnsw: { space: "cosine" } },
      embeddingFunction: null,
    });
  }

  async upsert(points: VectorPoint[]): Promise<void> {
    if (points.length === 0) return;
    await this.getCollection().upsert({
      ids: points.map((point) => String(point.id)),
      embeddings: points.map((point) => point.vector),
      metadatas: points.map((point) => toChromaMetadata(point.payload)),
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
    const offset = Number(options.cursor ?? 0);
    const where = options.filter ? toChromaWhere(options.filter) : undefined;

    const result = await this.getCollection().get({
      ...(where ? { where } : {}),
      limit: options.limit,
      offset,
      include: options.withVectors ? ["metadatas", "embeddings"] : ["metadatas"],
    });

    const points: StoredPoint[] = [];
    result.ids.forEach((id, i) => {
      const payload = parsePayload(result.metadatas[i]);
      if (!payload) return;
      const vector = options.withVectors ? asDenseVector(result.embeddings[i]) : undefined;
      points.push({ id, payload, ...(vector ? { vector } : {}) });
    });

    return {
      points,
      nextCursor: result.ids.length === options.limit ? offset + options.limit : undefined,
    };
  }

  /**
   * Reads the current metadata and writes back the merged result, so fields
   * not named in `payload` keep their values. A field set to null is removed;
   * since update() cannot drop a key, the point is deleted and re-inserted
   * with its stored vector.
   */
  async setPayload(id: PointId, payload: Partial<ImagePayload>): Promise<void> {
    const collection = this.getCollection();
    const ids = [String(id)];
    const current = await collection.get({ ids, include: ["metadatas", "embeddings"] });
    const existing: Metadata = current.metadatas[0] ?? {};
    const merged: Metadata = { ...existing, ...toChromaMetadata(payload) };

    const cleared = Object.entries(payload)
      .filter(([key, value]) => value === null && key in existing)
      .map(([key]) => key);
    if (cleared.length === 0) {
      await collection.update({ ids, metadatas: [merged] });
      return;
    }

    const vector = asDenseVector(current.embeddings[0]);
    if (!vector) {
      throw new Error(`Point ${ids[0]} has no stored vector; cannot clear ${cleared.join(", ")}`);
    }
    for (const key of cleared) delete merged[key];
    await collection.delete({ ids });
    await collection.upsert({ ids, embeddings: [vector], metadatas: [merged] });
  }

  async query(vector: number[], options: QueryOptions): Promise<ScoredPoint[]> {
    const offset = options.offset ?? 0;
    const where = options.filter ? toChromaWhere(options.filter) : undefined;

    const results = await this.getCollection().query({
      queryEmbeddings: [vector],
      nResults: offset + options.limit,
      include: ["metadatas", "distances"],
      ...(where ? { where } : {}),
    });

    // Chroma returns nested arrays because query() supports multiple
    // queries at once. We always send one, so index [0].
    const ids = results.ids[0] ?? [];
    const metadatas = results.metadatas[0] ?? [];
    const distances = results.distances[0] ?? [];

    const hits: ScoredPoint[] = [];
    ids.forEach((id, i) => {
      const payload = parsePayload(metadatas[i]);
      if (!payload) return;
      hits.push({ id, payload, score: 1 - (distances[i] ?? 1) });
    });
    return hits.slice(offset);
  }

  async delete(ids: PointId[]): Promise<void> {
    if (ids.length === 0) return;
    await this.getCollection().delete({ ids: ids.map(String) });
  }

  /**
   * Gets the initialized collection, throwing if initialize() hasn't run.
   * Auto-initializing here could create the collection with the wrong
   * distance metric, which cannot be changed later.
   */
  private getCollection(): ChromaCollectionApi {
    if (!this.collection) {
      throw new Error(
        `Collection "${this.name}" has not been initialized. Call initialize() first.`
      );
    }
    return this.collection;
  }
}

/**
 * Chroma metadata values must be string, number, or boolean; nulls and
 * undefined fields are left out.
 */
function toChromaMetadata(payload: Partial<ImagePayload>): Metadata {
  const metadata: Metadata = {};
  for (const [key, value] of Object.entries(definedFields(payload))) {
    if (value !== null) metadata[key] = value;
  }
  return metadata;
}

/**
 * Builds a Chroma "where" filter.
 *
 * Single condition: { filename: { $eq: "totenbilder/a.jpg" } }
 * Multiple conditions: { $and: [{ ... }, { delta: { $gt: 0 } }] }
 */
export function toChromaWhere(filter: PayloadFilter): Where | undefined {
  const conditions: Record<string, unknown>[] = filter.must.map((condition) =>
    "equals" in condition
      ? { [condition.field]: { $eq: condition.equals } }
      : { [condition.field]: { $gt: condition.greaterThan } }
  );

  if (conditions.length === 0) return undefined;
  // Cast to Chroma's Where type; the shapes above are its operator syntax.
  if (conditions.length === 1) return conditions[0] as Where;
  return { $and: conditions } as Where;
}
