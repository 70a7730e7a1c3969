/**
 * Pull types
 */

import type { ExtractedEntry } from "#/archive";
import type { EngineContext } from "#/core";
import type { ArtifactKind, ImagesMetadata } from "#/oci";
import type { RewriteResult } from "#/lock";
import type { ImageReference } from "#/reference";

/**
 * Raw reference flags. Exactly one must be set.
 */
export interface ReferenceFlags {
  /** Image reference (-i / --image) */
  image?: string;
  /** Bundle reference (-b / --bundle) */
  bundle?: string;
  /** Path to a BundleLock file (--lock) */
  lock?: string;
}

/**
 * Where the reference comes from, resolved once at the boundary.
 */
export type ReferenceSource =
  | { kind: "image"; reference: string }
  | { kind: "bundle"; reference: string }
  | { kind: "lock"; path: string };

export interface PullOptions extends ReferenceFlags {
  /** Destination directory; removed and recreated */
  output: string;
}

export type PullContext = Pick<EngineContext, "fs" | "logger"> & { registry: ImagesMetadata };

export interface PullResult {
  kind: ArtifactKind;
  reference: ImageReference;
  digest: string;
  entries: ExtractedEntry[];
  /** Present for bundles only */
  rewrite?: RewriteResult;
}
