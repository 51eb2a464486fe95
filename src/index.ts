#!/usr/bin/env tsx
/**
 * index.ts - CLI entry point for image-scout
 *
 * What this file does:
 * Runs the pipeline operations in batch mode, one command per run:
 *
 *   image-scout reconcile [--json]
 *   image-scout index [--force]
 *   image-scout index-one <key>
 *   image-scout sync-payload --filename <name> | --all
 *   image-scout search [query] [--similar <key>] [--limit n] [--offset n] [--delta alle|0|>0]
 *   image-scout migrate-ids [--dry-run]
 *
 * Each command builds a ServiceContext from the environment (.env is loaded
 * first), runs the core operation in the foreground, and closes the context.
 * Errors are printed as "Error [KIND]: message" and exit with status 1.
 */

import "dotenv/config";
// Initialize OpenTelemetry tracing before any other imports
import { shutdownTracing } from "./tracing";

import { Command, InvalidArgumentError as CommanderArgumentError } from "commander";
import { loadConfig } from "./config";
import { ServiceContext } from "./context";
import { toErrorResponse } from "./errors";
import type { ReconciliationSummary } from "./pipeline";
import {
  DELTA_FILTERS,
  parseImageSearchInput,
  runIndexAll,
  runIndexOne,
  parseMigrateIdsInput,
  runMigrateIds,
  runReconcile,
  runSyncPayload,
  searchImages,
  type ImageSearchResult,
} from "./tools/core";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Builds the context, runs one command, and always releases the context and
 * flushes traces. Sets a non-zero exit code on error instead of calling
 * process.exit(), so the cleanup still runs.
 */
async function withContext(run: (context: ServiceContext) => Promise<void>): Promise<void> {
  let context: ServiceContext | undefined;
  try {
    context = new ServiceContext(loadConfig());
    await run(context);
  } catch (error) {
    const { kind, message } = toErrorResponse(error);
    console.error(`Error [${kind}]: ${message}`);
    process.exitCode = 1;
  } finally {
    await context?.close();
    await shutdownTracing();
  }
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new CommanderArgumentError("Not an integer.");
  }
  return parsed;
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function printReconciliation(summary: ReconciliationSummary): void {
  console.log(`Metadata rows:            ${summary.totalMetadata}`);
  console.log(`Indexed images:           ${summary.totalIndexed}`);
  console.log(`Missing in index:         ${summary.missingInIndex}`);
  if (!summary.objectStoreChecked) {
    console.log("Object store not checked (unavailable).");
    printSample("Missing in index", summary.samples.missingInIndex, summary.missingInIndex);
    return;
  }
  console.log(`  ready to index:         ${summary.readyToIndex}`);
  console.log(`  missing in object store: ${summary.missingInObjectStore}`);
  printSample("Ready to index", summary.samples.readyToIndex, summary.readyToIndex);
  printSample(
    "Missing in object store",
    summary.samples.missingInObjectStore,
    summary.missingInObjectStore
  );
}

function printSample(title: string, keys: string[], total: number): void {
  if (keys.length === 0) return;
  const more = total > keys.length ? ` (first ${keys.length} of ${total})` : "";
  console.log(`\n${title}${more}:`);
  for (const key of keys) console.log(`  ${key}`);
}

function printSearchResults(results: ImageSearchResult[]): void {
  if (results.length === 0) {
    console.log("No results.");
    return;
  }
  for (const result of results) {
    console.log(`${result.score.toFixed(3)}  ${result.filename}  ${result.image_url}`);
  }
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const program = new Command();

  program
    .name("image-scout")
    .description(
      "Index images into a vector database and search them by text or by example image"
    )
    .version("0.1.0");

  program
    .command("reconcile")
    .description("Compare the metadata table, the vector index and the object store")
    .option("--json", "Print the summary as JSON")
    .action(async (options: { json?: boolean }) => {
      await withContext(async (context) => {
        const summary = await runReconcile(context);
        if (options.json) printJson(summary);
        else printReconciliation(summary);
      });
    });

  program
    .command("index")
    .description("Index every image in the object store that has no point yet")
    .option("--force", "Re-embed images that are already indexed")
    .action(async (options: { force?: boolean }) => {
      await withContext(async (context) => {
        const result = await runIndexAll(context, { force: options.force === true });
        if (result.failed.length > 0) {
          console.error(`\n${result.failed.length} images failed:`);
          for (const failure of result.failed) {
            console.error(`  ${failure.key}: ${failure.message}`);
          }
          process.exitCode = 1;
        }
      });
    });

  program
    .command("index-one")
    .description("Index one image now, overwriting any existing point")
    .argument("<key>", "Filename or full key (e.g. a.jpg or totenbilder/a.jpg)")
    .action(async (key: string) => {
      await withContext(async (context) => {
        const result = await runIndexOne(context, { key });
        console.log(`Indexed ${result.key} as point ${result.pointId}.`);
      });
    });

  program
    .command("sync-payload")
    .description("Copy nid and delta from the metadata table into the vector index")
    .option("--filename <name>", "Sync a single image")
    .option("--all", "Sync every row")
    .action(async (options: { filename?: string; all?: boolean }) => {
      await withContext(async (context) => {
        const result = await runSyncPayload(context, options);
        if (result.notFound > 0 || result.errors.length > 0) process.exitCode = 1;
      });
    });

  program
    .command("search")
    .description("Search images by text, or by similarity to an indexed image")
    .argument("[query]", "Text describing the image content")
    .option("--similar <key>", "Find images similar to this indexed image")
    .option("--limit <n>", "Maximum number of results (1-200)", parseInteger, 30)
    .option("--offset <n>", "Results to skip", parseInteger, 0)
    .option("--delta <filter>", `Delta filter: ${DELTA_FILTERS.join(", ")}`, "alle")
    .option("--json", "Print results as JSON")
    .action(
      async (
        query: string | undefined,
        options: { similar?: string; limit: number; offset: number; delta: string; json?: boolean }
      ) => {
        await withContext(async (context) => {
          const input = parseImageSearchInput({
            query,
            similar: options.similar,
            limit: options.limit,
            offset: options.offset,
            delta: options.delta,
          });
          const results = await searchImages(context, input);
          if (options.json) printJson(results);
          else printSearchResults(results);
        });
      }
    );

  program
    .command("migrate-ids")
    .description("Move points written with random ids onto stable, key-derived ids")
    .option("--dry-run", "Only count what would change")
    .action(async (options: { dryRun?: boolean }) => {
      await withContext(async (context) => {
        await runMigrateIds(context, parseMigrateIdsInput(options));
      });
    });

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error("Error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
