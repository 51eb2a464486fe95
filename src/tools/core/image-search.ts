/**
 * image-search core - Text-to-image and image-to-image search
 *
 * What this file does:
 * Builds a query vector, adds the delta filter, and runs one nearest-neighbor
 * query against the vector index. Two ways to get the vector:
 *
 * 1. similar: the reference image's own stored vector, looked up by filename.
 *    Nothing is re-embedded, so the results equal a direct query with that
 *    vector.
 * 2. query: the text embedded as a search query, in the same space as the
 *    image vectors.
 *
 * When both are given, `similar` wins. When neither is, the result is an empty
 * list. Ranking is whatever the index returns; scores are rounded to three
 * decimals.
 *
 * This is the core logic: the CLI and the MCP tool both call searchImages().
 */

import { z } from "zod";
import type { ServiceContext } from "../../context";
import { InternalError, InvalidArgumentError, NotFoundError } from "../../errors";
import { canonicalKey } from "../../keys";
import { traceOperation } from "../../tracing/tool-tracing";
import { filenameFilter, type PayloadFilter, type ScoredPoint } from "../../vectorstore";

export const DELTA_FILTERS = ["alle", "0", ">0"] as const;
export type DeltaFilter = (typeof DELTA_FILTERS)[number];

/**
 * Input schema for image search.
 */
export const imageSearchSchema = z.object({
  query: z
    .string()
    .optional()
    .describe("Text describing the image content (e.g. 'grave with a cross and flowers')"),
  similar: z
    .string()
    .optional()
    .describe(
      "Filename of an indexed image to find visually similar images for (e.g. 'totenbilder/a.jpg'). Takes precedence over query."
    ),
  limit: z
    .number()
    .int()
    .min(1)
    .max(200)
    .default(30)
    .describe("Maximum number of results (1-200, default 30)"),
  offset: z
    .number()
    .int()
    .min(0)
    .default(0)
    .describe("Number of results to skip, for paging (default 0)"),
  delta: z
    .enum(DELTA_FILTERS)
    .default("alle")
    .describe("Filter on the delta attribute: 'alle' (no filter), '0' (delta = 0), '>0' (delta > 0)"),
});

export type ImageSearchInput = z.infer<typeof imageSearchSchema>;

export const imageSearchDescription = `Search indexed images by text or by a reference image.

- query: natural language, matched against image content through a shared text/image embedding space.
- similar: filename of an indexed image; returns the images closest to it.
- delta: "0" or ">0" restricts results by the delta attribute; "alle" disables the filter.

Returns a ranked list of { filename, image_url, score }, best match first.`;

export interface ImageSearchResult {
  filename: string;
  image_url: string;
  /** Similarity score rounded to 3 decimals; higher is closer */
  score: number;
}

/**
 * Validates raw input (e.g. CLI options) against imageSearchSchema.
 * @throws InvalidArgumentError listing the invalid fields
 */
export function parseImageSearchInput(raw: unknown): ImageSearchInput {
  const parsed = imageSearchSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new InvalidArgumentError(`Invalid search parameters: ${problems}`);
  }
  return parsed.data;
}

/**
 * Runs an image search.
 *
 * @throws NotFoundError if `similar` names an image with no point
 * @throws UnavailableError if the vector index or the text model is unavailable
 */
export async function searchImages(
  context: ServiceContext,
  input: ImageSearchInput
): Promise<ImageSearchResult[]> {
  const similar = input.similar?.trim() || undefined;
  const query = input.query?.trim() || undefined;

  return traceOperation(
    "search",
    {
      "search.query": query,
      "search.similar": similar,
      "search.limit": input.limit,
      "search.offset": input.offset,
      "search.delta": input.delta,
    },
    async (span) => {
      if (!similar && !query) return [];

      const vectorIndex = await context.vectorIndex.get();

      let vector: number[];
      if (similar) {
        const key = canonicalKey(similar, context.config.imagePrefix);
        const [reference] = await vectorIndex.findByFilter(filenameFilter(key), {
          limit: 1,
          withVectors: true,
        });
        if (!reference) throw new NotFoundError(`Image '${key}' not found`);
        if (!reference.vector) throw new InternalError(`Image '${key}' has no stored vector`);
        vector = reference.vector;
      } else {
        const embedding = await context.embedding.get();
        vector = await embedding.encodeText(query ?? "");
      }

      const hits = await vectorIndex.query(vector, {
        filter: deltaFilter(input.delta),
        limit: input.limit,
        offset: input.offset,
      });
      span.setAttribute("search.result_count", hits.length);

      return hits.map((hit) => toResult(hit, context.config.publicImageBaseUrl));
    }
  );
}

/**
 * "0" -> delta == 0, ">0" -> delta > 0, "alle" -> no filter.
 */
export function deltaFilter(delta: DeltaFilter): PayloadFilter | undefined {
  switch (delta) {
    case "0":
      return { must: [{ field: "delta", equals: 0 }] };
    case ">0":
      return { must: [{ field: "delta", greaterThan: 0 }] };
    case "alle":
      return undefined;
  }
}

/**
 * Joins the public base URL (trailing slashes removed) with the payload
 * filename, which already carries the storage prefix.
 */
export function imageUrl(baseUrl: string, filename: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${filename}`;
}

function toResult(hit: ScoredPoint, baseUrl: string): ImageSearchResult {
  return {
    filename: hit.payload.filename,
    image_url: imageUrl(baseUrl, hit.payload.filename),
    score: Math.round(hit.score * 1000) / 1000,
  };
}
