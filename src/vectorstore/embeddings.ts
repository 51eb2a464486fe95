/**
 * embeddings.ts - Cohere multimodal embedding implementation
 *
 * What this file does:
 * Implements the EmbeddingModel interface with Cohere's embed-v4.0 model.
 * The model embeds images and text into one shared space, and its text side
 * is multilingual, so "Grab mit Blumen" and "grave with flowers" both land
 * near images that show one.
 *
 * How it works:
 * 1. Image bytes are sniffed for their format (jpg, png, webp) and sent as
 *    a base64 data URI with input type "image"
 * 2. Text is sent with input type "search_query"
 * 3. Both requests ask for float embeddings truncated to 512 dimensions,
 *    the size of the collection's vectors
 */

import { CohereClientV2 } from "cohere-ai";
import { EMBEDDING_DIMENSION } from "./types";

/**
 * Turns images and text into vectors in one shared embedding space.
 */
export interface EmbeddingModel {
  /**
   * Embeds encoded image bytes.
   * @throws Error if the bytes are not a supported image format
   */
  encodeImage(bytes: Uint8Array): Promise<number[]>;
  encodeText(text: string): Promise<number[]>;
}

const DEFAULT_MODEL = "embed-v4.0";

/** The part of the Cohere client this class calls */
export type CohereEmbedApi = Pick<CohereClientV2, "embed">;

export interface CohereEmbeddingOptions {
  /** Cohere API key. Defaults to COHERE_API_KEY */
  apiKey?: string;
  model?: string;
  /** Pre-built client, used by tests */
  client?: CohereEmbedApi;
}

/**
 * Usage:
 *   const embedder = new CohereEmbedding();  // uses COHERE_API_KEY env var
 *   const vector = await embedder.encodeText("Grab mit Blumen");
 *   // vector.length === 512
 */
export class CohereEmbedding implements EmbeddingModel {
  private readonly client: CohereEmbedApi;
  private readonly model: string;

  constructor(options?: CohereEmbeddingOptions) {
    this.model = options?.model ?? DEFAULT_MODEL;
    if (options?.client) {
      this.client = options.client;
      return;
    }

    const apiKey = options?.apiKey ?? process.env.COHERE_API_KEY;
    if (!apiKey) {
      throw new Error(
        "Cohere API key is required. Set COHERE_API_KEY environment variable " +
          "or pass apiKey in options."
      );
    }
    this.client = new CohereClientV2({ token: apiKey });
  }

  async encodeImage(bytes: Uint8Array): Promise<number[]> {
    const mimeType = detectImageType(bytes);
    if (!mimeType) {
      throw new Error("Unsupported image format");
    }

    const dataUri = `data:${mimeType};base64,${Buffer.from(bytes).toString("base64")}`;
    const response = await this.client.embed({
      model: this.model,
      inputType: "image",
      embeddingTypes: ["float"],
      images: [dataUri],
      outputDimension: EMBEDDING_DIMENSION,
    });
    return toVector(response.embeddings.float);
  }

  async encodeText(text: string): Promise<number[]> {
    const response = await this.client.embed({
      model: this.model,
      inputType: "search_query",
      embeddingTypes: ["float"],
      texts: [text],
      outputDimension: EMBEDDING_DIMENSION,
    });
    return toVector(response.embeddings.float);
  }
}

/**
 * Reads the magic bytes of the formats the API accepts.
 */
export function detectImageType(bytes: Uint8Array): string | undefined {
  if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return "image/jpeg";
  }
  if (
    bytes.length >= 4 &&
    bytes[0] === 0x89 &&
    bytes[1] === 0x50 &&
    bytes[2] === 0x4e &&
    bytes[3] === 0x47
  ) {
    return "image/png";
  }
  const ascii = (start: number, end: number) =>
    Buffer.from(bytes.subarray(start, end)).toString("latin1");
  if (bytes.length >= 12 && ascii(0, 4) === "RIFF" && ascii(8, 12) === "WEBP") {
    return "image/webp";
  }
  return undefined;
}

function toVector(vectors: number[][] | undefined): number[] {
  const vector = vectors?.[0];
  if (!vector) {
    throw new Error("Cohere returned no float embedding");
  }
  if (vector.length !== EMBEDDING_DIMENSION) {
    throw new Error(
      `Embedding dimension mismatch: expected ${EMBEDDING_DIMENSION}, got ${vector.length}`
    );
  }
  return vector;
}
