/**
 * config.ts - Typed application configuration read from the environment
 *
 * Both entry points load `.env` with dotenv and then call loadConfig().
 * The schema below is the single place where variable names, defaults,
 * and validation live. Everything downstream receives an AppConfig and
 * never reads process.env directly.
 *
 * Object store credentials are optional on purpose: without them the
 * object store is reported as unavailable, reconciliation skips the
 * object-store check, and indexing fails fast.
 */

import { z } from "zod";
import { InvalidArgumentError } from "./errors";

/** Treats empty strings (common in .env files) as unset. */
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === "" ? undefined : value.trim()));

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  VECTOR_BACKEND: z.enum(["qdrant", "chroma"]).default("qdrant"),
  QDRANT_URL: z.string().url().default("http://localhost:6333"),
  QDRANT_API_KEY: optionalString,
  CHROMA_URL: z.string().url().default("http://localhost:8000"),
  VECTOR_COLLECTION: z.string().min(1).default("images"),

  OBJECT_STORE_ENDPOINT: optionalString,
  OBJECT_STORE_ACCESS_KEY_ID: optionalString,
  OBJECT_STORE_SECRET_ACCESS_KEY: optionalString,
  OBJECT_STORE_BUCKET: optionalString,
  OBJECT_STORE_REGION: z.string().default("auto"),
  IMAGE_PREFIX: z.string().default("totenbilder/"),

  DB_HOST: z.string().default("localhost"),
  DB_PORT: positiveInt(3306),
  DB_USER: optionalString,
  DB_PASSWORD: optionalString,
  DB_NAME: optionalString,
  METADATA_TABLE: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be a plain SQL identifier")
    .default("totenbilder_bilder"),

  PUBLIC_IMAGE_BASE_URL: z.string().default(""),

  EMBEDDING_MODEL: z.string().min(1).default("embed-v4.0"),
  COHERE_API_KEY: optionalString,
  OCR_LANGUAGES: optionalString,

  INDEX_BATCH_SIZE: positiveInt(50),
  SCROLL_PAGE_SIZE: z.coerce.number().int().min(1000).default(1000),
});

export interface ObjectStoreConfig {
  endpoint: string;
  accessKeyId: string;
  secretAccessKey: string;
  bucket: string;
  region: string;
}

export interface AppConfig {
  vector: {
    backend: "qdrant" | "chroma";
    qdrantUrl: string;
    qdrantApiKey?: string;
    chromaUrl: string;
    collection: string;
  };
  /** Undefined when any credential is missing; the store is then unavailable */
  objectStore?: ObjectStoreConfig;
  /** Storage prefix every canonical key starts with (e.g. "totenbilder/") */
  imagePrefix: string;
  database: {
    host: string;
    port: number;
    user?: string;
    password?: string;
    database?: string;
    table: string;
  };
  publicImageBaseUrl: string;
  models: {
    /** Cohere model id; must embed images and text into one space */
    embedding: string;
    /** Undefined leaves the embedding model unavailable */
    apiKey?: string;
    /** Tesseract language string (e.g. "deu+eng"); undefined disables OCR */
    ocrLanguages?: string;
  };
  pipeline: {
    batchSize: number;
    scrollPageSize: number;
  };
}

/**
 * Parses and validates configuration from an environment map.
 *
 * @param env - Defaults to process.env; tests pass a plain object
 * @throws InvalidArgumentError listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new InvalidArgumentError(`Invalid configuration: ${problems}`);
  }
  const e = parsed.data;

  const objectStore =
    e.OBJECT_STORE_ENDPOINT &&
    e.OBJECT_STORE_ACCESS_KEY_ID &&
    e.OBJECT_STORE_SECRET_ACCESS_KEY &&
    e.OBJECT_STORE_BUCKET
      ? {
          endpoint: e.OBJECT_STORE_ENDPOINT,
          accessKeyId: e.OBJECT_STORE_ACCESS_KEY_ID,
          secretAccessKey: e.OBJECT_STORE_SECRET_ACCESS_KEY,
          bucket: e.OBJECT_STORE_BUCKET,
          region: e.OBJECT_STORE_REGION,
        }
      : undefined;

  return {
    vector: {
      backend: e.VECTOR_BACKEND,
      qdrantUrl: e.QDRANT_URL,
      qdrantApiKey: e.QDRANT_API_KEY,
      chromaUrl: e.CHROMA_URL,
      collection: e.VECTOR_COLLECTION,
    },
    objectStore,
    imagePrefix: e.IMAGE_PREFIX,
    database: {
      host: e.DB_HOST,
      port: e.DB_PORT,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      database: e.DB_NAME,
      table: e.METADATA_TABLE,
    },
    publicImageBaseUrl: e.PUBLIC_IMAGE_BASE_URL,
    models: {
      embedding: e.EMBEDDING_MODEL,
      apiKey: e.COHERE_API_KEY,
      ocrLanguages: e.OCR_LANGUAGES,
    },
    pipeline: {
      batchSize: e.INDEX_BATCH_SIZE,
      scrollPageSize: e.SCROLL_PAGE_SIZE,
    },
  };
}
