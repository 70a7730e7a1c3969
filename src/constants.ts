/**
 * Global constants for the ocibundle engine
 */

/** Manifest annotation marking an artifact as a bundle. Only the literal "true" counts. */
export const BUNDLE_ANNOTATION = "dev.ocibundle.bundle";

/** Directory inside a bundle holding its lock documents */
export const BUNDLE_DIR = ".bundle";
export const IMAGES_LOCK_FILE = "images.yml";

export const LOCK_API_VERSION = "ocibundle.dev/v1alpha1";

/** Owner read/write. */
export const LOCK_FILE_MODE = 0o600;
export const OUTPUT_DIR_MODE = 0o700;

// Tar metadata is fixed so archives depend only on the logical tree
export const TAR_DIR_MODE = 0o700;
export const TAR_FILE_MODE = 0o600;
export const TAR_MTIME = new Date(0);

/** Output paths a pull refuses to delete and recreate */
export const DISALLOWED_OUTPUT_PATHS: readonly string[] = ["/", ".", ".."];

export const DEFAULT_REGISTRY_HOST = "index.docker.io";
export const DEFAULT_TAG = "latest";

export const USER_AGENT = "ocibundle-engine";

export const MEDIA_TYPES = {
  manifest: "application/vnd.oci.image.manifest.v1+json",
  dockerManifest: "application/vnd.docker.distribution.manifest.v2+json",
  config: "application/vnd.oci.image.config.v1+json",
  layer: "application/vnd.oci.image.layer.v1.tar",
} as const;

// repository@sha256:<64 hex>
export const DIGEST_REGEX = /^sha256:[a-f0-9]{64}$/;
