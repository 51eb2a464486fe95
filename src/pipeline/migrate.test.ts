/**
 * migrate.test.ts - Unit tests for moving points onto stable ids
 */

import { describe, it, expect } from "vitest";
import { migrateIds } from "./migrate";
import { pointIdFor } from "../keys";
import { InMemoryVectorIndex, vectorFor } from "../testing/fakes";
import type { ScrollOptions, ScrollPage } from "../vectorstore";

/**
 * Returns filtered scans newest first, so a filename's first-scanned point
 * lands on the last filtered page.
 */
class ReversedFilterIndex extends InMemoryVectorIndex {
  async scroll(options: ScrollOptions): Promise<ScrollPage> {
    if (!options.filter) return super.scroll(options);
    const { points } = await super.scroll({ ...options, cursor: undefined, limit: this.points.size });
    const reversed = [...points].reverse();
    const offset = Number(options.cursor ?? 0);
    const end = offset + options.limit;
    return {
      points: reversed.slice(offset, end),
      nextCursor: end < reversed.length ? end : undefined,
    };
  }
}

function legacyIndex(): InMemoryVectorIndex {
  return new InMemoryVectorIndex([
    // a.jpg: one point under a numeric id
    { id: 11, vector: vectorFor("a"), payload: { filename: "totenbilder/a.jpg", nid: 11, delta: 0 } },
    // b.jpg: two random-id duplicates
    {
      id: "0b7a3c3e-1111-4c1d-9a55-3d0f5f1b2c01",
      vector: vectorFor("b1"),
      payload: { filename: "totenbilder/b.jpg", nid: 12, delta: 1 },
    },
    {
      id: "0b7a3c3e-2222-4c1d-9a55-3d0f5f1b2c02",
      vector: vectorFor("b2"),
      payload: { filename: "totenbilder/b.jpg", nid: 12, delta: 1 },
    },
    // c.jpg: already stable, plus one duplicate
    { id: pointIdFor("totenbilder/c.jpg"), vector: vectorFor("c"), payload: { filename: "totenbilder/c.jpg" } },
    { id: 13, vector: vectorFor("c-old"), payload: { filename: "totenbilder/c.jpg" } },
    // d.jpg: already stable
    { id: pointIdFor("totenbilder/d.jpg"), vector: vectorFor("d"), payload: { filename: "totenbilder/d.jpg" } },
  ]);
}

const options = (vectorIndex: InMemoryVectorIndex) => ({
  vectorIndex,
  scrollPageSize: 2,
  onProgress: () => {},
});

describe("migrateIds", () => {
  it("leaves exactly one point per filename under its stable id", async () => {
    const vectorIndex = legacyIndex();

    const result = await migrateIds(options(vectorIndex));

    expect(result).toEqual({ scanned: 6, migrated: 2, duplicatesRemoved: 4 });
    expect([...vectorIndex.points.keys()].sort()).toEqual(
      [
        pointIdFor("totenbilder/a.jpg"),
        pointIdFor("totenbilder/b.jpg"),
        pointIdFor("totenbilder/c.jpg"),
        pointIdFor("totenbilder/d.jpg"),
      ].sort()
    );
  });

  it("copies vector and payload of the first point seen", async () => {
    const vectorIndex = legacyIndex();

    await migrateIds(options(vectorIndex));

    expect(vectorIndex.points.get(pointIdFor("totenbilder/a.jpg"))).toEqual({
      id: pointIdFor("totenbilder/a.jpg"),
      vector: vectorFor("a"),
      payload: { filename: "totenbilder/a.jpg", nid: 11, delta: 0 },
    });
    expect(vectorIndex.points.get(pointIdFor("totenbilder/b.jpg"))?.vector).toEqual(
      vectorFor("b1")
    );
  });

  it("keeps the point already under the stable id", async () => {
    const vectorIndex = legacyIndex();

    await migrateIds(options(vectorIndex));

    expect(vectorIndex.points.get(pointIdFor("totenbilder/c.jpg"))?.vector).toEqual(
      vectorFor("c")
    );
  });

  it("reports 0 / 0 on a second run", async () => {
    const vectorIndex = legacyIndex();
    await migrateIds(options(vectorIndex));

    const again = await migrateIds(options(vectorIndex));

    expect(again).toEqual({ scanned: 4, migrated: 0, duplicatesRemoved: 0 });
  });

  it("changes nothing on a dry run", async () => {
    const vectorIndex = legacyIndex();

    const result = await migrateIds({ ...options(vectorIndex), dryRun: true });

    expect(result).toEqual({ scanned: 6, migrated: 2, duplicatesRemoved: 4 });
    expect(vectorIndex.points.size).toBe(6);
    expect(vectorIndex.upsertCalls).toEqual([]);
  });

  it("finds the copied point's vector among more than 100 duplicates", async () => {
    const duplicates = Array.from({ length: 150 }, (_, i) => ({
      id: i + 1,
      vector: vectorFor(`e-${i + 1}`),
      payload: { filename: "totenbilder/e.jpg", nid: 7, delta: 0 },
    }));
    const vectorIndex = new ReversedFilterIndex(duplicates);

    const result = await migrateIds({ vectorIndex, scrollPageSize: 40, onProgress: () => {} });

    expect(result).toEqual({ scanned: 150, migrated: 1, duplicatesRemoved: 150 });
    expect([...vectorIndex.points.keys()]).toEqual([pointIdFor("totenbilder/e.jpg")]);
    expect(vectorIndex.points.get(pointIdFor("totenbilder/e.jpg"))?.vector).toEqual(
      vectorFor("e-1")
    );
  });
});
