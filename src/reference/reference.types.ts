/**
 * Image reference types
 */

/**
 * "weak" fills in a missing tag with `latest`.
 * "strict" requires an explicit tag or digest.
 */
export type ReferenceValidation = "weak" | "strict";

/**
 * Parsed image reference.
 *
 * @example
 * parseReference("ghcr.io/acme/app:v1")
 *   → { registry: "ghcr.io", repository: "acme/app", tag: "v1" }
 */
export interface ImageReference {
  /** Registry host, with port when present */
  registry: string;
  /** Repository path within the registry */
  repository: string;
  tag?: string;
  /** sha256:<hex> */
  digest?: string;
}

/** Reference pinned to a digest */
export type DigestReference = ImageReference & { digest: string };
