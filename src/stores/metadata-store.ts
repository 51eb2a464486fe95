/**
 * metadata-store.ts - Read access to the relational image metadata
 *
 * The metadata table is the source of truth for each image's numeric id
 * (`nid`) and its `delta` attribute. This project only reads it; other
 * systems write it. Rows may store the bare filename ("a.jpg") or the
 * prefixed key ("totenbilder/a.jpg").
 */

import { createPool, type Pool, type RowDataPacket } from "mysql2/promise";
import { z } from "zod";
import type { AppConfig } from "../config";

export interface MetadataRecord {
  filename: string;
  nid: number | null;
  delta: number | null;
}

export interface MetadataStore {
  /** Every filename in the table, as stored. */
  listFilenames(): Promise<string[]>;
  /** Every row. */
  listRecords(): Promise<MetadataRecord[]>;
  /** Rows whose filename equals any of the given spellings. */
  findRecords(filenames: string[]): Promise<MetadataRecord[]>;
  /** Verifies the connection; used when the store is first initialized. */
  ping(): Promise<void>;
  close(): Promise<void>;
}

/**
 * DECIMAL columns come back from mysql2 as strings, so numbers are coerced.
 * `nullable()` runs before coercion, so NULL stays null instead of becoming 0.
 */
const recordSchema = z.object({
  filename: z.string().min(1),
  nid: z.coerce.number().int().nullable(),
  delta: z.coerce.number().nullable(),
});

/** The part of a mysql2 pool the store uses */
export type MetadataPool = Pick<Pool, "query" | "end">;

export class MysqlMetadataStore implements MetadataStore {
  constructor(
    private readonly pool: MetadataPool,
    private readonly table: string
  ) {}

  static fromConfig(config: AppConfig["database"]): MysqlMetadataStore {
    const pool = createPool({
      host: config.host,
      port: config.port,
      user: config.user,
      password: config.password,
      database: config.database,
      connectionLimit: 4,
    });
    return new MysqlMetadataStore(pool, config.table);
  }

  async listFilenames(): Promise<string[]> {
    const [rows] = await this.pool.query<RowDataPacket[]>(
      `SELECT filename FROM \`${this.table}\``
    );
    const filenames: string[] = [];
    for (const row of rows) {
      const filename: unknown = row.filename;
      if (typeof filename === "string" && filename !== "") filenames.push(filename);
    }
    return filenames;
  }

  async listRecords(): Promise<MetadataRecord[]> {
    const [rows] = await this.pool.query<RowDataPacket[]>(
      `SELECT filename, nid, delta FROM \`${this.table}\``
    );
    return parseRows(rows);
  }

  async findRecords(filenames: string[]): Promise<MetadataRecord[]> {
    if (filenames.length === 0) return [];
    const [rows] = await this.pool.query<RowDataPacket[]>(
      `SELECT filename, nid, delta FROM \`${this.table}\` WHERE filename IN (?)`,
      [filenames]
    );
    return parseRows(rows);
  }

  async ping(): Promise<void> {
    await this.pool.query("SELECT 1");
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

/**
 * Validates raw rows. Rows without a filename are not images and are skipped;
 * any other malformed row is a schema problem and throws.
 */
function parseRows(rows: RowDataPacket[]): MetadataRecord[] {
  return rows
    .filter((row) => typeof row.filename === "string" && row.filename !== "")
    .map((row) => recordSchema.parse({ filename: row.filename, nid: row.nid, delta: row.delta }));
}
