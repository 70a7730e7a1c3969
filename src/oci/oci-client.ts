/**
 * OCI Distribution Spec client (read operations only)
 *
 * Manifest GET/HEAD and blob download against OCI-compliant registries
 * (GHCR, Docker Hub, Harbor, a local registry:2).
 *
 * @see https://github.com/opencontainers/distribution-spec/blob/main/spec.md
 */

import { z } from "zod";
import { errorMessage, sha256Digest, type HttpClient } from "#/core";
import { MEDIA_TYPES, USER_AGENT } from "#/constants";
import { OciManifestSchema } from "#/schemas";
import type {
  OciRegistryConfig,
  PullManifestResult,
  HeadManifestResult,
  PullBlobResult,
} from "./oci.types";

const MANIFEST_ACCEPT = [MEDIA_TYPES.manifest, MEDIA_TYPES.dockerManifest].join(", ");

const TokenResponseSchema = z.object({
  token: z.string().optional(),
  access_token: z.string().optional(),
});

export class OciClient {
  private host: string;
  private scheme: "http" | "https";
  private token?: string;
  private http: HttpClient;
  private tokenCache: Map<string, string> = new Map();

  constructor(config: OciRegistryConfig, http: HttpClient) {
    this.host = config.host;
    this.scheme = config.insecure ? "http" : "https";
    this.token = config.token;
    this.http = http;
  }

  /**
   * Get request headers for OCI registry API
   */
  private getHeaders(accept?: string): Record<string, string> {
    const headers: Record<string, string> = {
      "User-Agent": USER_AGENT,
    };

    if (accept) {
      headers["Accept"] = accept;
    }

    if (this.token) {
      headers["Authorization"] = `Bearer ${this.token}`;
    }

    return headers;
  }

  /**
   * Build OCI registry URL
   * @param name - Repository name (e.g., "myorg/my-artifact")
   * @param path - API path after the name
   */
  private buildUrl(name: string, path: string): string {
    return `${this.scheme}://${this.host}/v2/${name}${path}`;
  }

  /**
   * Parse WWW-Authenticate header from a 401 response
   *
   * Expected format: Bearer realm="<url>",service="<service>",scope="<scope>"
   */
  private parseWwwAuthenticate(
    header: string
  ): { realm: string; service?: string; scope?: string } | undefined {
    if (!header.startsWith("Bearer ")) {
      return undefined;
    }

    const params = header.slice("Bearer ".length);
    const realm = params.match(/realm="([^"]+)"/)?.[1];
    const service = params.match(/service="([^"]+)"/)?.[1];
    const scope = params.match(/scope="([^"]+)"/)?.[1];

    if (!realm) {
      return undefined;
    }

    return { realm, service, scope };
  }

  /**
   * Obtain a registry Bearer token for the challenged scope
   *
   * 1. Initial request returns 401 with WWW-Authenticate header
   * 2. Call the token endpoint, with Basic auth when a token is configured,
   *    anonymously otherwise (public Docker Hub repositories)
   * 3. Use the returned token for subsequent requests
   */
  private async exchangeToken(wwwAuthenticate: string): Promise<string | undefined> {
    const params = this.parseWwwAuthenticate(wwwAuthenticate);
    if (!params) {
      return undefined;
    }

    const cacheKey = `${params.service ?? ""}:${params.scope ?? ""}`;
    const cached = this.tokenCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const tokenUrl = new URL(params.realm);
    if (params.service) tokenUrl.searchParams.set("service", params.service);
    if (params.scope) tokenUrl.searchParams.set("scope", params.scope);

    const headers: Record<string, string> = { "User-Agent": USER_AGENT };
    if (this.token) {
      headers.Authorization = `Basic ${Buffer.from(`token:${this.token}`).toString("base64")}`;
    }

    const response = await this.http.fetch(tokenUrl.toString(), { headers });
    if (!response.ok) {
      return undefined;
    }

    const parsed = TokenResponseSchema.safeParse(await response.json());
    const exchangedToken = parsed.success ? (parsed.data.token ?? parsed.data.access_token) : undefined;

    if (exchangedToken) {
      this.tokenCache.set(cacheKey, exchangedToken);
    }

    return exchangedToken;
  }

  /**
   * Fetch with automatic token exchange on 401 responses
   */
  private async authenticatedFetch(url: string, options: RequestInit & { headers: Record<string, string> }): Promise<Response> {
    const response = await this.http.fetch(url, options);

    if (response.status !== 401) {
      return response;
    }

    const wwwAuthenticate = response.headers.get("www-authenticate");
    if (!wwwAuthenticate) {
      return response;
    }

    const exchangedToken = await this.exchangeToken(wwwAuthenticate);
    if (!exchangedToken) {
      return response;
    }

    return this.http.fetch(url, {
      ...options,
      headers: { ...options.headers, Authorization: `Bearer ${exchangedToken}` },
    });
  }

  /**
   * Pull manifest for a specific tag/digest
   *
   * GET /v2/<name>/manifests/<reference>
   *
   * The digest comes from Docker-Content-Digest when the registry sends it,
   * otherwise it is computed over the exact bytes received.
   */
  async pullManifest(name: string, reference: string): Promise<PullManifestResult> {
    try {
      const url = this.buildUrl(name, `/manifests/${reference}`);

      const response = await this.authenticatedFetch(url, {
        headers: this.getHeaders(MANIFEST_ACCEPT),
      });

      if (!response.ok) {
        if (response.status === 404) {
          return {
            success: false,
            error: `Manifest not found: ${name}:${reference}`,
          };
        }
        return {
          success: false,
          error: `Failed to pull manifest: ${response.status} ${response.statusText}`,
        };
      }

      const body = Buffer.from(await response.arrayBuffer());
      const digest = response.headers.get("docker-content-digest") ?? sha256Digest(body);

      const parsed = OciManifestSchema.safeParse(JSON.parse(body.toString("utf-8")));
      if (!parsed.success) {
        return {
          success: false,
          error: `Unsupported manifest for ${name}:${reference} (expected a single image manifest)`,
        };
      }

      return {
        success: true,
        manifest: parsed.data,
        digest,
      };
    } catch (err) {
      return {
        success: false,
        error: `Failed to pull manifest: ${errorMessage(err)}`,
      };
    }
  }

  /**
   * Check for a manifest without downloading it
   *
   * HEAD /v2/<name>/manifests/<reference>
   */
  async headManifest(name: string, reference: string): Promise<HeadManifestResult> {
    try {
      const url = this.buildUrl(name, `/manifests/${reference}`);

      const response = await this.authenticatedFetch(url, {
        method: "HEAD",
        headers: this.getHeaders(MANIFEST_ACCEPT),
      });

      if (response.status === 404) {
        return { success: true, exists: false };
      }

      if (!response.ok) {
        return {
          success: false,
          error: `Failed to check manifest: ${response.status} ${response.statusText}`,
        };
      }

      return {
        success: true,
        exists: true,
        digest: response.headers.get("docker-content-digest") ?? undefined,
      };
    } catch (err) {
      return {
        success: false,
        error: `Failed to check manifest: ${errorMessage(err)}`,
      };
    }
  }

  /**
   * Pull a blob by digest, verifying its content against the digest
   *
   * GET /v2/<name>/blobs/<digest>
   */
  async pullBlob(name: string, digest: string): Promise<PullBlobResult> {
    try {
      const url = this.buildUrl(name, `/blobs/${digest}`);

      const response = await this.authenticatedFetch(url, {
        headers: this.getHeaders(),
        redirect: "follow",
      });

      if (!response.ok) {
        if (response.status === 404) {
          return {
            success: false,
            error: `Blob not found: ${digest}`,
          };
        }
        return {
          success: false,
          error: `Failed to pull blob: ${response.status} ${response.statusText}`,
        };
      }

      const data = Buffer.from(await response.arrayBuffer());
      const actual = sha256Digest(data);
      if (actual !== digest) {
        return {
          success: false,
          error: `Blob digest mismatch: expected ${digest}, got ${actual}`,
        };
      }

      return {
        success: true,
        data,
      };
    } catch (err) {
      return {
        success: false,
        error: `Failed to pull blob: ${errorMessage(err)}`,
      };
    }
  }
}
