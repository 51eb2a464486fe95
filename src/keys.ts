/**
 * keys.ts - Canonical image keys and point identity
 *
 * The canonical key `{prefix}{filename}` is the join key across the object
 * store, the metadata table, and the vector index payload. The metadata table
 * stores either the bare filename or the prefixed form, so every comparison
 * goes through canonicalKey() first.
 */

import { v5 as uuidv5 } from "uuid";

/**
 * Fixed namespace for deriving point ids from canonical keys.
 * Changing it would orphan every point written so far.
 */
const POINT_ID_NAMESPACE = "3f6c2a1e-8d4b-5c7a-9e2f-1b0d4a6c8e53";

/** File extensions the indexer treats as images (lower case, with dot). */
export const SUPPORTED_IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".webp"] as const;

/**
 * Normalizes a filename to its canonical prefixed key.
 * Idempotent: a key that already starts with the prefix is returned unchanged.
 *
 *   canonicalKey("foo.jpg", "totenbilder/")             -> "totenbilder/foo.jpg"
 *   canonicalKey("totenbilder/foo.jpg", "totenbilder/") -> "totenbilder/foo.jpg"
 */
export function canonicalKey(filename: string, prefix: string): string {
  return filename.startsWith(prefix) ? filename : `${prefix}${filename}`;
}

/**
 * Strips the prefix from a canonical key. Keys without the prefix are
 * returned unchanged.
 */
export function bareFilename(key: string, prefix: string): string {
  return prefix !== "" && key.startsWith(prefix) ? key.slice(prefix.length) : key;
}

/**
 * Whether an object-store key should be indexed: it has a supported image
 * extension and is not the prefix "directory" marker itself.
 */
export function isIndexableKey(key: string, prefix: string): boolean {
  if (key === prefix) return false;
  const lower = key.toLowerCase();
  return SUPPORTED_IMAGE_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

/**
 * Deterministic point id for a canonical key (UUID v5).
 *
 * Both indexing modes use this id, so indexing the same key twice overwrites
 * the existing point instead of adding a second one.
 */
export function pointIdFor(key: string): string {
  return uuidv5(key, POINT_ID_NAMESPACE);
}
