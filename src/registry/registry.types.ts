/**
 * Registry types
 *
 * The pull pipeline never talks to a registry host directly; it sees a
 * ResolvedRegistry produced once per host.
 */

// Re-export types from schemas to avoid duplication
export type { LocalConfig, RegistryEntry } from "#/schemas";

/**
 * Normalized registry configuration.
 * Created by resolver from raw config, used to construct OciClient.
 */
export interface ResolvedRegistry {
  /** Registry name as written in references (e.g., index.docker.io) */
  host: string;
  /** Host serving the /v2/ API (e.g., registry-1.docker.io) */
  apiHost: string;
  token?: string;
  insecure: boolean;
}
