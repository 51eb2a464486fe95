/**
 * context.test.ts - Unit tests for lazy dependency handles
 */

import { describe, it, expect, vi } from "vitest";
import { Lazy, ServiceContext } from "./context";
import { UnavailableError } from "./errors";
import type { OcrEngine } from "./ocr";
import { createTestContext, testConfig } from "./testing/fakes";

describe("Lazy", () => {
  it("runs the factory once and shares the in-flight initialization", async () => {
    const factory = vi.fn(async () => ({ name: "index" }));
    const lazy = new Lazy("vector index", factory);

    const [a, b] = await Promise.all([lazy.get(), lazy.get()]);
    const c = await lazy.get();

    expect(factory).toHaveBeenCalledTimes(1);
    expect(a).toBe(b);
    expect(c).toBe(a);
    expect(lazy.status).toBe("ready");
  });

  it("wraps a failure in UnavailableError and remembers it", async () => {
    const factory = vi.fn(async (): Promise<string> => {
      throw new Error("connect ECONNREFUSED 127.0.0.1:6333");
    });
    const lazy = new Lazy("vector index", factory);

    const first = await lazy.get().catch((e: unknown) => e);
    const second = await lazy.get().catch((e: unknown) => e);

    expect(first).toBeInstanceOf(UnavailableError);
    expect(first).toHaveProperty(
      "message",
      "vector index is unavailable: connect ECONNREFUSED 127.0.0.1:6333"
    );
    expect(second).toBe(first);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(lazy.status).toBe("failed");
  });

  it("keeps an UnavailableError thrown by the factory as is", async () => {
    const original = new UnavailableError("object store", "credentials are not configured");
    const lazy = new Lazy("object store", async (): Promise<string> => {
      throw original;
    });

    await expect(lazy.get()).rejects.toBe(original);
  });

  it("peek() returns nothing until ready and does not start initialization", async () => {
    const factory = vi.fn(async () => 1);
    const lazy = new Lazy("embedding model", factory);

    expect(lazy.peek()).toBeUndefined();
    expect(factory).not.toHaveBeenCalled();

    await lazy.get();
    expect(lazy.peek()).toBe(1);
  });
});

describe("ServiceContext", () => {
  it("reports the object store unavailable when credentials are missing", async () => {
    const context = new ServiceContext(testConfig({ OBJECT_STORE_BUCKET: "" }));

    const error = await context.objectStore.get().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnavailableError);
    expect(error).toHaveProperty("dependency", "object store");
  });

  it("warmUp() reports each dependency and never rejects", async () => {
    const { context } = createTestContext({
      embedding: async () => {
        throw new Error("COHERE_API_KEY is not set");
      },
    });
    const messages: string[] = [];

    await context.warmUp((message) => messages.push(message));

    expect(messages.sort()).toEqual([
      "OCR engine ready",
      "embedding model is unavailable: COHERE_API_KEY is not set",
      "metadata store ready",
      "object store ready",
      "vector index ready",
    ]);
  });

  it("close() releases the metadata store and OCR worker once initialized", async () => {
    const ocr: OcrEngine = {
      recognize: vi.fn().mockResolvedValue(""),
      close: vi.fn().mockResolvedValue(undefined),
    };
    const { context, services } = createTestContext({ ocr: async () => ocr });

    await context.metadataStore.get();
    await context.ocr.get();
    await context.close();

    expect(services.metadataStore.closed).toBe(true);
    expect(ocr.close).toHaveBeenCalledTimes(1);
  });

  it("close() leaves uninitialized handles alone", async () => {
    const { context, services } = createTestContext();

    await context.close();

    expect(services.metadataStore.closed).toBe(false);
    expect(context.metadataStore.status).toBe("idle");
  });
});
