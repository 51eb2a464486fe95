/**
 * metadata-store.test.ts - Unit tests for the MySQL metadata store
 *
 * The pool is a vi.fn stub returning mysql2-shaped [rows, fields] tuples.
 */

import { describe, it, expect, vi } from "vitest";
import { MysqlMetadataStore, type MetadataPool } from "./metadata-store";

function createStore(rows: Record<string, unknown>[]) {
  const pool = {
    query: vi.fn().mockResolvedValue([rows, []]),
    end: vi.fn().mockResolvedValue(undefined),
  } satisfies MetadataPool;
  return { pool, store: new MysqlMetadataStore(pool, "totenbilder_bilder") };
}

describe("MysqlMetadataStore.listRecords", () => {
  it("coerces DECIMAL strings to numbers and keeps NULL as null", async () => {
    const { pool, store } = createStore([
      { filename: "a.jpg", nid: 7, delta: "2.50" },
      { filename: "totenbilder/b.jpg", nid: null, delta: null },
      { filename: "c.jpg", nid: "12", delta: "0.00" },
    ]);

    await expect(store.listRecords()).resolves.toEqual([
      { filename: "a.jpg", nid: 7, delta: 2.5 },
      { filename: "totenbilder/b.jpg", nid: null, delta: null },
      { filename: "c.jpg", nid: 12, delta: 0 },
    ]);
    expect(pool.query).toHaveBeenCalledWith(
      "SELECT filename, nid, delta FROM `totenbilder_bilder`"
    );
  });

  it("skips rows without a filename", async () => {
    const { store } = createStore([
      { filename: null, nid: 1, delta: "1" },
      { filename: "", nid: 2, delta: "1" },
      { filename: "a.jpg", nid: 3, delta: "1" },
    ]);

    await expect(store.listRecords()).resolves.toEqual([{ filename: "a.jpg", nid: 3, delta: 1 }]);
  });

  it("throws on a row whose delta is not numeric", async () => {
    const { store } = createStore([{ filename: "a.jpg", nid: 1, delta: "n/a" }]);

    await expect(store.listRecords()).rejects.toThrow();
  });
});

describe("MysqlMetadataStore.findRecords", () => {
  it("passes every spelling as one IN-list parameter", async () => {
    const { pool, store } = createStore([{ filename: "totenbilder/a.jpg", nid: 4, delta: "1.5" }]);

    const records = await store.findRecords(["a.jpg", "totenbilder/a.jpg"]);

    expect(records).toEqual([{ filename: "totenbilder/a.jpg", nid: 4, delta: 1.5 }]);
    expect(pool.query).toHaveBeenCalledWith(
      "SELECT filename, nid, delta FROM `totenbilder_bilder` WHERE filename IN (?)",
      [["a.jpg", "totenbilder/a.jpg"]]
    );
  });

  it("does not query for an empty list", async () => {
    const { pool, store } = createStore([]);

    await expect(store.findRecords([])).resolves.toEqual([]);
    expect(pool.query).not.toHaveBeenCalled();
  });
});

describe("MysqlMetadataStore.listFilenames", () => {
  it("returns stored filenames and drops empty ones", async () => {
    const { store } = createStore([
      { filename: "a.jpg" },
      { filename: "" },
      { filename: null },
      { filename: "totenbilder/b.jpg" },
    ]);

    await expect(store.listFilenames()).resolves.toEqual(["a.jpg", "totenbilder/b.jpg"]);
  });
});

describe("MysqlMetadataStore connection", () => {
  it("pings with SELECT 1 and ends the pool on close", async () => {
    const { pool, store } = createStore([]);

    await store.ping();
    await store.close();

    expect(pool.query).toHaveBeenCalledWith("SELECT 1");
    expect(pool.end).toHaveBeenCalledTimes(1);
  });
});
