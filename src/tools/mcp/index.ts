/**
 * MCP tool registration for image-scout
 *
 * Registers one tool per outward operation. Each handler validates its input
 * through the zod schema (done by the SDK from `inputSchema`), calls the core
 * function, and returns the result as pretty-printed JSON text.
 *
 *   search_images  synchronous, ranked results
 *   reconcile      synchronous, counts and samples
 *   index_image    synchronous, one key
 *   index_images   background job, returns a job snapshot
 *   sync_payload   one filename inline, or all rows as a background job
 *   job_status     snapshots of background jobs
 *
 * Failures come back as { kind, message } with isError: true, so clients can
 * tell UNAVAILABLE from NOT_FOUND without parsing the message.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServiceContext } from "../../context";
import { toErrorResponse } from "../../errors";
import type { JobRunner, ProgressCallback } from "../../pipeline";
import { withToolTracing } from "../../tracing/tool-tracing";
import {
  imageSearchDescription,
  imageSearchSchema,
  indexImageDescription,
  indexImageSchema,
  indexImagesDescription,
  indexImagesSchema,
  jobStatus,
  jobStatusDescription,
  jobStatusSchema,
  reconcileDescription,
  reconcileSchema,
  runIndexOne,
  runReconcile,
  searchImages,
  startIndexAll,
  startSyncPayload,
  syncPayloadDescription,
  syncPayloadSchema,
  type ImageSearchInput,
  type IndexImageInput,
  type IndexImagesInput,
  type JobStatusInput,
  type SyncPayloadInput,
} from "../core";

export interface ToolResult {
  [key: string]: unknown;
  content: { type: "text"; text: string }[];
  isError?: boolean;
}

/**
 * Runs `fn` and wraps its value (or its error) as an MCP tool result.
 */
export async function toToolResult(fn: () => unknown): Promise<ToolResult> {
  try {
    const value = await fn();
    return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
  } catch (error) {
    return {
      content: [{ type: "text", text: JSON.stringify(toErrorResponse(error), null, 2) }],
      isError: true,
    };
  }
}

/**
 * Registers every image-scout tool with an MCP server.
 *
 * @param onProgress - Pipeline progress sink; must not write to stdout,
 *                     which carries the stdio protocol
 */
export function registerImageTools(
  server: McpServer,
  context: ServiceContext,
  jobs: JobRunner,
  onProgress: ProgressCallback
): void {
  server.registerTool(
    "search_images",
    { description: imageSearchDescription, inputSchema: imageSearchSchema.shape },
    withToolTracing("search_images", (input: ImageSearchInput) =>
      toToolResult(() => searchImages(context, input))
    )
  );

  server.registerTool(
    "reconcile",
    { description: reconcileDescription, inputSchema: reconcileSchema.shape },
    withToolTracing("reconcile", () => toToolResult(() => runReconcile(context, onProgress)))
  );

  server.registerTool(
    "index_image",
    { description: indexImageDescription, inputSchema: indexImageSchema.shape },
    withToolTracing("index_image", (input: IndexImageInput) =>
      toToolResult(() => runIndexOne(context, input, onProgress))
    )
  );

  server.registerTool(
    "index_images",
    { description: indexImagesDescription, inputSchema: indexImagesSchema.shape },
    withToolTracing("index_images", (input: IndexImagesInput) =>
      toToolResult(() => startIndexAll(context, jobs, input, onProgress))
    )
  );

  server.registerTool(
    "sync_payload",
    { description: syncPayloadDescription, inputSchema: syncPayloadSchema.shape },
    withToolTracing("sync_payload", (input: SyncPayloadInput) =>
      toToolResult(async () => startSyncPayload(context, jobs, input, onProgress))
    )
  );

  server.registerTool(
    "job_status",
    { description: jobStatusDescription, inputSchema: jobStatusSchema.shape },
    withToolTracing("job_status", (input: JobStatusInput) =>
      toToolResult(() => jobStatus(jobs, input))
    )
  );
}
