/**
 * migrate-ids core - Moves points written with random ids onto stable ids
 */

import { z } from "zod";
import type { ServiceContext } from "../../context";
import { InvalidArgumentError } from "../../errors";
import { migrateIds, type MigrationResult, type ProgressCallback } from "../../pipeline";
import { traceOperation } from "../../tracing/tool-tracing";

export const migrateIdsSchema = z.object({
  dryRun: z.boolean().default(false).describe("Only count what would change"),
});

export type MigrateIdsInput = z.infer<typeof migrateIdsSchema>;

/**
 * Validates raw options (CLI flags) and fills in defaults.
 * @throws InvalidArgumentError listing the invalid fields
 */
export function parseMigrateIdsInput(raw: unknown): MigrateIdsInput {
  const parsed = migrateIdsSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new InvalidArgumentError(`Invalid migrate-ids options: ${problems}`);
  }
  return parsed.data;
}

export async function runMigrateIds(
  context: ServiceContext,
  input: MigrateIdsInput,
  onProgress: ProgressCallback = console.log
): Promise<MigrationResult> {
  return traceOperation("migrate_ids", { "migrate.dry_run": input.dryRun }, async (span) => {
    const vectorIndex = await context.vectorIndex.get();
    const result = await migrateIds({
      vectorIndex,
      scrollPageSize: context.config.pipeline.scrollPageSize,
      dryRun: input.dryRun,
      onProgress,
    });
    span.setAttributes({
      "migrate.scanned": result.scanned,
      "migrate.migrated": result.migrated,
      "migrate.duplicates_removed": result.duplicatesRemoved,
    });
    return result;
  });
}
