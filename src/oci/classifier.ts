import { BUNDLE_ANNOTATION } from "#/constants";
import { UsageError } from "#/core";
import type { ArtifactKind, OciManifest, PullIntent } from "./oci.types";

/**
 * Only the literal "true" marks a bundle.
 */
export function isBundleManifest(manifest: OciManifest): boolean {
  return manifest.annotations?.[BUNDLE_ANNOTATION] === "true";
}

/**
 * Check a pulled manifest against what the caller asked for.
 *
 * @throws UsageError naming the flag the caller should have used
 */
export function classifyManifest(manifest: OciManifest, intent: PullIntent): ArtifactKind {
  const bundle = isBundleManifest(manifest);

  if (intent === "image" && bundle) {
    throw new UsageError("Expected bundle flag when pulling a bundle, please use -b instead of --image");
  }

  if (intent === "bundle" && !bundle) {
    throw new UsageError("Expected image flag when pulling an image or index, please use --image instead of -b");
  }

  return bundle ? "bundle" : "image";
}
