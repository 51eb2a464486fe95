/**
 * index-images.test.ts - Unit tests for the index_images and index_image tools
 */

import { describe, it, expect } from "vitest";
import { runIndexOne, startIndexAll } from "./index-images";
import { UnavailableError } from "../../errors";
import { JobRunner } from "../../pipeline";
import { bytes, createTestContext } from "../../testing/fakes";

describe("startIndexAll", () => {
  it("indexes in the background and exposes the tally on the job", async () => {
    const { context, services } = createTestContext();
    services.objectStore.objects.set("totenbilder/a.jpg", bytes("a"));
    services.objectStore.objects.set("totenbilder/b.jpg", bytes("b"));
    const jobs = new JobRunner({ onProgress: () => {} });

    const started = startIndexAll(context, jobs, { force: false }, () => {});
    const finished = await jobs.wait(started.id);

    expect(finished?.result).toEqual({ processed: 2, skipped: 0, failed: [] });
    expect(services.vectorIndex.points.size).toBe(2);
  });

  it("returns the active run instead of starting a second one", async () => {
    const { context } = createTestContext();
    const jobs = new JobRunner({ onProgress: () => {} });

    const first = startIndexAll(context, jobs, { force: false }, () => {});
    const second = startIndexAll(context, jobs, { force: true }, () => {});
    await jobs.wait(first.id);

    expect(second.id).toBe(first.id);
  });

  it("fails the job when a dependency is unavailable", async () => {
    const { context } = createTestContext({
      embedding: async () => {
        throw new Error("COHERE_API_KEY is not set");
      },
    });
    const jobs = new JobRunner({ onProgress: () => {} });

    const started = startIndexAll(context, jobs, { force: false }, () => {});
    const finished = await jobs.wait(started.id);

    expect(finished?.error).toEqual({
      kind: "UNAVAILABLE",
      message: "embedding model is unavailable: COHERE_API_KEY is not set",
    });
  });
});

describe("runIndexOne", () => {
  it("indexes the key and returns its canonical form", async () => {
    const { context, services } = createTestContext();
    services.objectStore.objects.set("totenbilder/a.jpg", bytes("a"));

    const result = await runIndexOne(context, { key: "a.jpg" }, () => {});

    expect(result.key).toBe("totenbilder/a.jpg");
    expect(services.vectorIndex.payloads()).toEqual([{ filename: "totenbilder/a.jpg" }]);
  });

  it("fails with UNAVAILABLE when the object store is not configured", async () => {
    const { context } = createTestContext({
      objectStore: async () => {
        throw new UnavailableError("object store", "credentials are not configured");
      },
    });

    await expect(runIndexOne(context, { key: "a.jpg" }, () => {})).rejects.toBeInstanceOf(
      UnavailableError
    );
  });
});
