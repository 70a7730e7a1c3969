/**
 * OCI Distribution Spec types
 *
 * Types for interacting with OCI-compliant registries (GHCR, Docker Hub, etc.)
 * Only what pulling and existence checks need.
 *
 * @see https://github.com/opencontainers/distribution-spec/blob/main/spec.md
 * @see https://github.com/opencontainers/image-spec/blob/main/manifest.md
 */

import type { z } from "zod";
import type { OciDescriptorSchema, OciManifestSchema } from "#/schemas";
import type { DigestReference, ImageReference } from "#/reference";

/**
 * OCI content descriptor
 * References a blob (layer or config) by digest
 */
export type OciDescriptor = z.infer<typeof OciDescriptorSchema>;

/**
 * OCI image manifest (v2)
 * Describes an artifact: config + layers
 */
export type OciManifest = z.infer<typeof OciManifestSchema>;

/**
 * OCI registry connection info
 */
export interface OciRegistryConfig {
  /** Host serving the /v2/ API (e.g., ghcr.io, registry-1.docker.io) */
  host: string;
  /** Token for authentication, exchanged on 401 challenges */
  token?: string;
  /** Use plain HTTP */
  insecure?: boolean;
}

/**
 * Result from pulling a manifest
 */
export type PullManifestResult =
  | { success: true; manifest: OciManifest; digest: string }
  | { success: false; error: string };

/**
 * Result from a HEAD on a manifest. A 404 is a successful lookup of a missing manifest.
 */
export type HeadManifestResult =
  | { success: true; exists: boolean; digest?: string }
  | { success: false; error: string };

/**
 * Result from pulling a blob
 */
export type PullBlobResult =
  | { success: true; data: Buffer }
  | { success: false; error: string };

/**
 * Manifest together with the digest it was resolved to
 */
export interface ResolvedManifest {
  digest: string;
  manifest: OciManifest;
}

/**
 * What the caller believes it is pulling
 */
export type PullIntent = "bundle" | "image";

export type ArtifactKind = "bundle" | "image";

/**
 * Registry capability consumed by the pull pipeline.
 * Implementations own transport, auth and any retry policy.
 */
export interface ImagesMetadata {
  /** Resolve a tag or digest reference to the manifest digest */
  resolve(ref: ImageReference): Promise<string>;
  manifest(ref: ImageReference): Promise<ResolvedManifest>;
  /**
   * false only when the registry reports the manifest missing (404). Any other
   * failure throws instead of counting as missing, so an unreachable registry
   * aborts the images-lock rewrite rather than skipping it.
   */
  exists(ref: DigestReference): Promise<boolean>;
  layer(ref: ImageReference, descriptor: OciDescriptor): Promise<Buffer>;
}
