/**
 * vectorstore/index.ts - Public API for the vector index module
 *
 * Re-exports everything other modules need from the vector index system.
 * Import from here, never directly from the backend files.
 *
 * Usage:
 *   import {
 *     createVectorIndex,
 *     filenameFilter,
 *     type VectorIndex,
 *     type VectorPoint,
 *   } from "./vectorstore";
 */

import type { AppConfig } from "../config";
import { ChromaBackend } from "./chroma-backend";
import { QdrantBackend } from "./qdrant-backend";
import type { VectorIndex } from "./types";

export type {
  VectorIndex,
  VectorPoint,
  StoredPoint,
  ScoredPoint,
  ImagePayload,
  PayloadCondition,
  PayloadFilter,
  PointId,
  QueryOptions,
  ScrollOptions,
  ScrollPage,
} from "./types";
export { EMBEDDING_DIMENSION, filenameFilter } from "./types";

export { QdrantBackend } from "./qdrant-backend";
export { ChromaBackend } from "./chroma-backend";
export {
  CohereEmbedding,
  detectImageType,
  type CohereEmbedApi,
  type EmbeddingModel,
} from "./embeddings";

/**
 * Builds the configured backend. The returned index is not initialized yet;
 * the ServiceContext calls initialize() on first use.
 */
export function createVectorIndex(config: AppConfig["vector"]): VectorIndex {
  switch (config.backend) {
    case "qdrant":
      return new QdrantBackend({
        collection: config.collection,
        url: config.qdrantUrl,
        apiKey: config.qdrantApiKey,
      });
    case "chroma":
      return new ChromaBackend({
        collection: config.collection,
        chromaUrl: config.chromaUrl,
      });
  }
}
