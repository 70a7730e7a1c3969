import { BUNDLE_ANNOTATION, MEDIA_TYPES } from "#/constants";
import { sha256Digest } from "#/core";
import type { PackagedArtifact } from "#/archive";
import type { OciDescriptor, OciManifest } from "./oci.types";

const EMPTY_CONFIG = Buffer.from("{}");

/**
 * Config descriptor for an artifact with no runtime config ("{}").
 */
export function emptyConfigDescriptor(): OciDescriptor {
  return {
    mediaType: MEDIA_TYPES.config,
    digest: sha256Digest(EMPTY_CONFIG),
    size: EMPTY_CONFIG.length,
  };
}

/**
 * Manifest storing a packaged artifact as a single-layer image.
 * Bundles carry the bundle annotation; plain images carry no annotations.
 */
export function createLayerManifest(
  artifact: PackagedArtifact,
  config: OciDescriptor = emptyConfigDescriptor()
): OciManifest {
  const manifest: OciManifest = {
    schemaVersion: 2,
    mediaType: MEDIA_TYPES.manifest,
    config,
    layers: [
      {
        mediaType: MEDIA_TYPES.layer,
        digest: artifact.digest,
        size: artifact.size,
      },
    ],
  };

  if (artifact.bundle) {
    manifest.annotations = { [BUNDLE_ANNOTATION]: "true" };
  }

  return manifest;
}
