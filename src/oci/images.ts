/**
 * ImagesMetadata backed by the OCI distribution API.
 *
 * Converts OciClient result objects into thrown RegistryErrors; a missing
 * manifest during `exists` is a normal `false`.
 */

import { RegistryError, type HttpClient, type TokenProvider } from "#/core";
import { referenceIdentifier, formatReference, type DigestReference, type ImageReference } from "#/reference";
import { resolveRegistry, type LocalConfig } from "#/registry";
import { OciClient } from "./oci-client";
import type { ImagesMetadata, OciDescriptor, ResolvedManifest } from "./oci.types";

export class RegistryImages implements ImagesMetadata {
  private clients: Map<string, OciClient> = new Map();

  constructor(
    private http: HttpClient,
    private localConfig: LocalConfig | null = null,
    private tokens?: TokenProvider
  ) {}

  /** One client per registry host so exchanged tokens are reused */
  private client(ref: ImageReference): OciClient {
    const cached = this.clients.get(ref.registry);
    if (cached) {
      return cached;
    }

    const registry = resolveRegistry(ref.registry, this.localConfig, this.tokens);
    const client = new OciClient(
      { host: registry.apiHost, token: registry.token, insecure: registry.insecure },
      this.http
    );
    this.clients.set(ref.registry, client);
    return client;
  }

  async resolve(ref: ImageReference): Promise<string> {
    const { digest } = await this.manifest(ref);
    return digest;
  }

  async manifest(ref: ImageReference): Promise<ResolvedManifest> {
    const result = await this.client(ref).pullManifest(ref.repository, referenceIdentifier(ref));
    if (!result.success) {
      throw new RegistryError(result.error);
    }

    if (ref.digest && result.digest !== ref.digest) {
      throw new RegistryError(
        `Manifest digest mismatch for ${formatReference(ref)}: registry returned ${result.digest}`
      );
    }

    return { digest: result.digest, manifest: result.manifest };
  }

  /** 404 is `false`; every other failure is a RegistryError */
  async exists(ref: DigestReference): Promise<boolean> {
    const result = await this.client(ref).headManifest(ref.repository, ref.digest);
    if (!result.success) {
      throw new RegistryError(result.error);
    }
    return result.exists;
  }

  async layer(ref: ImageReference, descriptor: OciDescriptor): Promise<Buffer> {
    const result = await this.client(ref).pullBlob(ref.repository, descriptor.digest);
    if (!result.success) {
      throw new RegistryError(result.error);
    }
    return result.data;
  }
}
