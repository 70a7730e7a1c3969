/**
 * Registry resolver
 *
 * Normalizes config to ResolvedRegistry.
 * Parse once, never parse again - downstream code only sees ResolvedRegistry.
 */

import type { TokenProvider } from "#/core";
import { DEFAULT_REGISTRY_HOST } from "#/constants";
import type { LocalConfig, ResolvedRegistry } from "./registry.types";

const DOCKER_HUB_API_HOST = "registry-1.docker.io";

/**
 * Host that serves the distribution API for a registry name.
 *
 * @example getApiHost("index.docker.io") → "registry-1.docker.io"
 * @example getApiHost("ghcr.io") → "ghcr.io"
 */
export function getApiHost(host: string): string {
  return host === DEFAULT_REGISTRY_HOST ? DOCKER_HUB_API_HOST : host;
}

/**
 * Loopback registries default to plain HTTP.
 */
function isLoopback(host: string): boolean {
  const name = host.replace(/:\d+$/, "");
  return name === "localhost" || name === "127.0.0.1";
}

/**
 * Resolve a registry host to its connection settings
 *
 * Token priority:
 * 1. Config entry token
 * 2. TokenProvider (env vars)
 */
export function resolveRegistry(
  host: string,
  localConfig: LocalConfig | null,
  tokens?: TokenProvider
): ResolvedRegistry {
  const entry = localConfig?.registries[host];
  const token = entry?.token ?? tokens?.getRegistryToken(host);

  return {
    host,
    apiHost: getApiHost(host),
    token,
    insecure: entry?.insecure ?? isLoopback(host),
  };
}
