/**
 * ocibundle-engine
 *
 * Package directories as deterministic OCI layers and pull images and
 * bundles back into directories.
 * Portable, testable, dependency-injected.
 */

// Core interfaces, errors and Node implementations
export * from "#/core";

// Constants (annotation key, lock paths, modes)
export * from "#/constants";

// Schemas (Zod validation)
export * from "#/schemas";

// YAML + Zod parsing with readable errors
export * from "#/friendly-errors";

// Image references
export * from "#/reference";

// Registry resolution and local config
export * from "#/registry";

// OCI Distribution Spec (manifests, blobs, classification)
export * from "#/oci";

// Deterministic archiver and materializer
export * from "#/archive";

// Images lock documents and relocation
export * from "#/lock";

// Pull orchestration
export * from "#/pull";
