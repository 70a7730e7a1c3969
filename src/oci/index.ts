/**
 * OCI module
 *
 * Registry access for pulls, the bundle/image classifier and the manifest
 * a packaged artifact is stored under.
 */

export { OciClient } from "./oci-client";
export { RegistryImages } from "./images";
export { classifyManifest, isBundleManifest } from "./classifier";
export { createLayerManifest, emptyConfigDescriptor } from "./manifest";
export type {
  OciDescriptor,
  OciManifest,
  OciRegistryConfig,
  PullManifestResult,
  HeadManifestResult,
  PullBlobResult,
  ResolvedManifest,
  PullIntent,
  ArtifactKind,
  ImagesMetadata,
} from "./oci.types";
