/**
 * context.ts - Process-wide handles to the external dependencies
 *
 * One ServiceContext is built per process from AppConfig and handed to every
 * operation. It owns one Lazy handle per dependency:
 *
 *   vectorIndex    the configured backend, collection ensured on first use
 *   objectStore    S3-compatible bucket; unavailable without credentials
 *   metadataStore  MySQL pool, verified with a ping
 *   embedding      Cohere multimodal embedding client
 *   ocr            tesseract worker, or undefined when OCR_LANGUAGES is unset
 *
 * A handle initializes on first get(). If that fails, the failure is kept and
 * every later get() rejects with the same UnavailableError. Nothing retries;
 * restart the process once the dependency is back.
 */

import type { AppConfig } from "./config";
import { UnavailableError, errorMessage } from "./errors";
import { TesseractOcr, type OcrEngine } from "./ocr";
import { MysqlMetadataStore, type MetadataStore } from "./stores/metadata-store";
import { S3ObjectStore, type ObjectStore } from "./stores/object-store";
import {
  CohereEmbedding,
  createVectorIndex,
  type EmbeddingModel,
  type VectorIndex,
} from "./vectorstore";

// ---------------------------------------------------------------------------
// Lazy handle
// ---------------------------------------------------------------------------

type LazyState<T> =
  | { status: "idle" }
  | { status: "pending"; promise: Promise<T> }
  | { status: "ready"; value: T }
  | { status: "failed"; error: UnavailableError };

export type LazyStatus = LazyState<unknown>["status"];

/**
 * A dependency created once, on first use.
 *
 * Concurrent first calls share one in-flight initialization.
 */
export class Lazy<T> {
  private state: LazyState<T> = { status: "idle" };

  constructor(
    /** Human-readable name used in UnavailableError messages */
    readonly dependency: string,
    private readonly factory: () => Promise<T>
  ) {}

  get status(): LazyStatus {
    return this.state.status;
  }

  /**
   * Returns the dependency, initializing it if needed.
   * @throws UnavailableError if initialization failed, now or earlier
   */
  get(): Promise<T> {
    switch (this.state.status) {
      case "ready":
        return Promise.resolve(this.state.value);
      case "pending":
        return this.state.promise;
      case "failed":
        return Promise.reject(this.state.error);
      case "idle": {
        const promise = this.initialize();
        this.state = { status: "pending", promise };
        return promise;
      }
    }
  }

  /** The value if initialization already succeeded, without starting it. */
  peek(): T | undefined {
    return this.state.status === "ready" ? this.state.value : undefined;
  }

  private async initialize(): Promise<T> {
    try {
      const value = await this.factory();
      this.state = { status: "ready", value };
      return value;
    } catch (error) {
      const unavailable =
        error instanceof UnavailableError
          ? error
          : new UnavailableError(this.dependency, errorMessage(error), { cause: error });
      this.state = { status: "failed", error: unavailable };
      throw unavailable;
    }
  }
}

// ---------------------------------------------------------------------------
// Service context
// ---------------------------------------------------------------------------

/**
 * Factories for each dependency. Tests override some or all of them with
 * in-memory fakes.
 */
export interface ServiceFactories {
  vectorIndex: () => Promise<VectorIndex>;
  objectStore: () => Promise<ObjectStore>;
  metadataStore: () => Promise<MetadataStore>;
  embedding: () => Promise<EmbeddingModel>;
  ocr: () => Promise<OcrEngine | undefined>;
}

export class ServiceContext {
  readonly vectorIndex: Lazy<VectorIndex>;
  readonly objectStore: Lazy<ObjectStore>;
  readonly metadataStore: Lazy<MetadataStore>;
  readonly embedding: Lazy<EmbeddingModel>;
  readonly ocr: Lazy<OcrEngine | undefined>;

  constructor(
    readonly config: AppConfig,
    overrides: Partial<ServiceFactories> = {}
  ) {
    const factories = { ...defaultFactories(config), ...overrides };
    this.vectorIndex = new Lazy("vector index", factories.vectorIndex);
    this.objectStore = new Lazy("object store", factories.objectStore);
    this.metadataStore = new Lazy("metadata store", factories.metadataStore);
    this.embedding = new Lazy("embedding model", factories.embedding);
    this.ocr = new Lazy("OCR engine", factories.ocr);
  }

  /**
   * Starts every initialization and reports each outcome. Never rejects:
   * failures stay recorded on the handles. The MCP server calls this without
   * awaiting so it can accept requests while models download.
   */
  async warmUp(onProgress: (message: string) => void = console.log): Promise<void> {
    await Promise.all(
      this.handles().map((handle) =>
        handle.get().then(
          () => onProgress(`${handle.dependency} ready`),
          (error: unknown) => onProgress(errorMessage(error))
        )
      )
    );
  }

  /**
   * Releases what holds open connections or threads: the MySQL pool and the
   * OCR worker. Handles that never initialized are left alone.
   */
  async close(): Promise<void> {
    await this.metadataStore.peek()?.close();
    await this.ocr.peek()?.close();
  }

  private handles(): Lazy<unknown>[] {
    return [this.vectorIndex, this.objectStore, this.metadataStore, this.embedding, this.ocr];
  }
}

function defaultFactories(config: AppConfig): ServiceFactories {
  return {
    vectorIndex: async () => {
      const index = createVectorIndex(config.vector);
      await index.initialize();
      return index;
    },

    objectStore: async () => {
      if (!config.objectStore) {
        throw new UnavailableError(
          "object store",
          "credentials are not configured (set OBJECT_STORE_ENDPOINT, OBJECT_STORE_ACCESS_KEY_ID, OBJECT_STORE_SECRET_ACCESS_KEY and OBJECT_STORE_BUCKET)"
        );
      }
      return S3ObjectStore.fromConfig(config.objectStore);
    },

    metadataStore: async () => {
      const store = MysqlMetadataStore.fromConfig(config.database);
      try {
        await store.ping();
      } catch (error) {
        await store.close();
        throw error;
      }
      return store;
    },

    embedding: async () =>
      new CohereEmbedding({ apiKey: config.models.apiKey, model: config.models.embedding }),

    ocr: async () =>
      config.models.ocrLanguages ? TesseractOcr.create(config.models.ocrLanguages) : undefined,
  };
}
