import { UsageError, type FileSystem } from "#/core";
import { readBundleLock } from "#/lock";
import type { PullIntent } from "#/oci";
import type { ReferenceFlags, ReferenceSource } from "./pull.types";

/**
 * Pick the single reference source out of the flags. Touches nothing on disk.
 *
 * @throws UsageError when zero or several sources are given
 */
export function resolveReferenceSource(flags: ReferenceFlags): ReferenceSource {
  const sources: ReferenceSource[] = [];

  if (flags.lock) sources.push({ kind: "lock", path: flags.lock });
  if (flags.image) sources.push({ kind: "image", reference: flags.image });
  if (flags.bundle) sources.push({ kind: "bundle", reference: flags.bundle });

  if (sources.length > 1) {
    throw new UsageError("Expected only one of image, bundle, or lock");
  }

  const [source] = sources;
  if (!source) {
    throw new UsageError("Expected either image, bundle, or lock");
  }

  return source;
}

/**
 * A lock file always names a bundle, so lock sources also get the images-lock
 * rewrite after extraction.
 */
export function intentFor(source: ReferenceSource): PullIntent {
  return source.kind === "image" ? "image" : "bundle";
}

/**
 * The reference string to pull; reads the BundleLock for lock sources.
 */
export function referenceFromSource(fs: FileSystem, source: ReferenceSource): string {
  switch (source.kind) {
    case "image":
    case "bundle":
      return source.reference;
    case "lock":
      return readBundleLock(fs, source.path).spec.image.image;
  }
}
