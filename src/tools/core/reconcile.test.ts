/**
 * reconcile.test.ts - Unit tests for the reconcile tool
 */

import { describe, it, expect, vi } from "vitest";
import { runReconcile } from "./reconcile";
import { UnavailableError } from "../../errors";
import { pointIdFor } from "../../keys";
import { bytes, createTestContext, vectorFor } from "../../testing/fakes";

async function seed(services: ReturnType<typeof createTestContext>["services"]) {
  services.metadataStore.records = [
    { filename: "a.jpg", nid: 1, delta: 0 },
    { filename: "b.jpg", nid: 2, delta: 0 },
    { filename: "c.jpg", nid: 3, delta: 0 },
  ];
  await services.vectorIndex.upsert([
    { id: pointIdFor("totenbilder/a.jpg"), vector: vectorFor("a"), payload: { filename: "totenbilder/a.jpg" } },
  ]);
  services.objectStore.objects.set("totenbilder/b.jpg", bytes("b"));
}

describe("runReconcile", () => {
  it("returns counts and samples", async () => {
    const { context, services } = createTestContext();
    await seed(services);

    const summary = await runReconcile(context, () => {});

    expect(summary).toEqual({
      totalMetadata: 3,
      totalIndexed: 1,
      missingInIndex: 2,
      readyToIndex: 1,
      missingInObjectStore: 1,
      objectStoreChecked: true,
      samples: {
        missingInIndex: ["totenbilder/b.jpg", "totenbilder/c.jpg"],
        readyToIndex: ["totenbilder/b.jpg"],
        missingInObjectStore: ["totenbilder/c.jpg"],
      },
    });
  });

  it("reports without the object store when it is unavailable", async () => {
    const { context, services } = createTestContext({
      objectStore: async () => {
        throw new UnavailableError("object store", "credentials are not configured");
      },
    });
    await seed(services);
    const onProgress = vi.fn();

    const summary = await runReconcile(context, onProgress);

    expect(summary.objectStoreChecked).toBe(false);
    expect(summary.missingInIndex).toBe(2);
    expect(summary.readyToIndex).toBe(0);
    expect(onProgress).toHaveBeenCalledWith(
      "object store is unavailable: credentials are not configured"
    );
  });

  it("fails when the metadata store is unavailable", async () => {
    const { context } = createTestContext({
      metadataStore: async () => {
        throw new Error("Access denied for user 'scout'");
      },
    });

    await expect(runReconcile(context, () => {})).rejects.toThrow(
      "metadata store is unavailable: Access denied for user 'scout'"
    );
  });
});
