/**
 * Image reference parsing
 *
 * Parse once at the boundary; downstream code only sees ImageReference.
 */

import { DEFAULT_REGISTRY_HOST, DEFAULT_TAG, DIGEST_REGEX } from "#/constants";
import { InvalidReferenceError } from "#/core";
import type { DigestReference, ImageReference, ReferenceValidation } from "./reference.types";

const TAG_REGEX = /^[\w][\w.-]{0,127}$/;
const REPOSITORY_COMPONENT_REGEX = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;
const REGISTRY_REGEX = /^[a-zA-Z0-9](?:[a-zA-Z0-9.-]*[a-zA-Z0-9])?(?::\d+)?$/;

const DOCKER_HUB_ALIASES = new Set(["docker.io", "registry-1.docker.io", DEFAULT_REGISTRY_HOST]);

function invalid(input: string, reason: string): InvalidReferenceError {
  return new InvalidReferenceError(`Invalid image reference: ${input}. ${reason}`);
}

/**
 * The first path component names a registry only when it looks like a host.
 *
 * @example looksLikeRegistry("ghcr.io") → true
 * @example looksLikeRegistry("acme") → false
 */
function looksLikeRegistry(component: string): boolean {
  return component.includes(".") || component.includes(":") || component === "localhost";
}

/**
 * Parse an image reference.
 *
 * @example
 * parseReference("nginx") → { registry: "index.docker.io", repository: "library/nginx", tag: "latest" }
 * parseReference("localhost:5000/app@sha256:ab…") → { registry: "localhost:5000", repository: "app", digest: "sha256:ab…" }
 * parseReference("acme/app", "strict") → throws (no tag or digest)
 */
export function parseReference(input: string, validation: ReferenceValidation = "weak"): ImageReference {
  if (!input) {
    throw invalid(input, "Expected a non-empty reference");
  }

  let rest = input;
  let digest: string | undefined;
  let tag: string | undefined;

  const at = rest.indexOf("@");
  if (at !== -1) {
    digest = rest.slice(at + 1);
    rest = rest.slice(0, at);
    if (!DIGEST_REGEX.test(digest)) {
      throw invalid(input, "Expected digest in format sha256:<64 hex characters>");
    }
  }

  const colon = rest.lastIndexOf(":");
  if (colon > rest.lastIndexOf("/")) {
    tag = rest.slice(colon + 1);
    rest = rest.slice(0, colon);
    if (!TAG_REGEX.test(tag)) {
      throw invalid(input, `Invalid tag '${tag}'`);
    }
  }

  const components = rest.split("/");
  let registry = DEFAULT_REGISTRY_HOST;
  const first = components[0];
  if (components.length > 1 && first && looksLikeRegistry(first)) {
    registry = DOCKER_HUB_ALIASES.has(first) ? DEFAULT_REGISTRY_HOST : first;
    components.shift();
  }

  if (!REGISTRY_REGEX.test(registry)) {
    throw invalid(input, `Invalid registry '${registry}'`);
  }

  for (const component of components) {
    if (!REPOSITORY_COMPONENT_REGEX.test(component)) {
      throw invalid(input, `Invalid repository component '${component}'`);
    }
  }

  let repository = components.join("/");
  if (registry === DEFAULT_REGISTRY_HOST && components.length === 1) {
    repository = `library/${repository}`;
  }

  if (!tag && !digest) {
    if (validation === "strict") {
      throw invalid(input, "Expected an explicit tag or digest");
    }
    tag = DEFAULT_TAG;
  }

  return { registry, repository, tag, digest };
}

/**
 * Parse a reference that must be pinned to a digest.
 */
export function parseDigestReference(input: string): DigestReference {
  const ref = parseReference(input, "strict");
  if (!isDigestReference(ref)) {
    throw invalid(input, "Expected a digest reference (repository@sha256:...)");
  }
  return ref;
}

export function isDigestReference(ref: ImageReference): ref is DigestReference {
  return ref.digest !== undefined;
}

/**
 * Registry and repository, without tag or digest.
 *
 * @example contextName(parseReference("ghcr.io/acme/app:v1")) → "ghcr.io/acme/app"
 */
export function contextName(ref: ImageReference): string {
  return `${ref.registry}/${ref.repository}`;
}

/**
 * Reference identifier understood by the registry API (digest preferred).
 */
export function referenceIdentifier(ref: ImageReference): string {
  return ref.digest ?? ref.tag ?? DEFAULT_TAG;
}

export function formatReference(ref: ImageReference): string {
  const tag = ref.tag ? `:${ref.tag}` : "";
  const digest = ref.digest ? `@${ref.digest}` : "";
  return `${contextName(ref)}${tag}${digest}`;
}

/**
 * Relocate a digest reference into another repository, keeping the digest.
 *
 * @example
 * imageWithRepository("docker.io/acme/app@sha256:ab…", "ghcr.io/acme/bundle")
 *   → "ghcr.io/acme/bundle@sha256:ab…"
 */
export function imageWithRepository(digestRef: string, repository: string): string {
  const at = digestRef.lastIndexOf("@");
  if (at === -1) {
    throw invalid(digestRef, "Expected a digest reference (repository@sha256:...)");
  }
  return `${repository}@${digestRef.slice(at + 1)}`;
}
