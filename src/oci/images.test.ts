import { describe, test, expect } from "vitest";
import { RegistryImages } from "./images";
import { createMockHttpClient, createMockTokenProvider, errorResponse, jsonResponse, binaryResponse } from "#/test-utils/mocks";
import { RegistryError, sha256Digest } from "#/core";
import { MEDIA_TYPES } from "#/constants";
import { parseDigestReference, parseReference } from "#/reference";
import type { OciManifest } from "./oci.types";

const LAYER = Buffer.from("layer bytes");
const LAYER_DIGEST = sha256Digest(LAYER);
const DIGEST = `sha256:${"1".repeat(64)}`;
const OTHER_DIGEST = `sha256:${"2".repeat(64)}`;

const LAYER_DESCRIPTOR = { mediaType: MEDIA_TYPES.layer, digest: LAYER_DIGEST, size: LAYER.length };

const MANIFEST: OciManifest = {
  schemaVersion: 2,
  mediaType: MEDIA_TYPES.manifest,
  config: { mediaType: MEDIA_TYPES.config, digest: sha256Digest(Buffer.from("{}")), size: 2 },
  layers: [LAYER_DESCRIPTOR],
};

const manifestResponse = (digest = DIGEST) => jsonResponse(MANIFEST, 200, { "Docker-Content-Digest": digest });

describe("RegistryImages", () => {
  test("resolves a tag to the manifest digest", async () => {
    const http = createMockHttpClient(new Map([["https://ghcr.io/v2/acme/app/manifests/v1", manifestResponse()]]));
    const images = new RegistryImages(http);

    expect(await images.resolve(parseReference("ghcr.io/acme/app:v1"))).toBe(DIGEST);
  });

  test("serves Docker Hub references from registry-1.docker.io", async () => {
    const http = createMockHttpClient(
      new Map([["https://registry-1.docker.io/v2/library/nginx/manifests/latest", manifestResponse()]])
    );
    const images = new RegistryImages(http);

    const resolved = await images.manifest(parseReference("nginx"));

    expect(resolved).toEqual({ digest: DIGEST, manifest: MANIFEST });
  });

  test("pulls by digest when the reference carries one", async () => {
    const http = createMockHttpClient(
      new Map([[`https://ghcr.io/v2/acme/app/manifests/${DIGEST}`, manifestResponse()]])
    );
    const images = new RegistryImages(http);

    const resolved = await images.manifest(parseReference(`ghcr.io/acme/app:v1@${DIGEST}`));

    expect(resolved.digest).toBe(DIGEST);
  });

  test("rejects a manifest whose digest differs from the pinned one", async () => {
    const http = createMockHttpClient(
      new Map([[`https://ghcr.io/v2/acme/app/manifests/${DIGEST}`, manifestResponse(OTHER_DIGEST)]])
    );
    const images = new RegistryImages(http);

    await expect(images.manifest(parseReference(`ghcr.io/acme/app@${DIGEST}`))).rejects.toThrow(
      `Manifest digest mismatch for ghcr.io/acme/app@${DIGEST}: registry returned ${OTHER_DIGEST}`
    );
  });

  test("throws RegistryError for a missing manifest", async () => {
    const images = new RegistryImages(createMockHttpClient());

    const pending = images.manifest(parseReference("ghcr.io/acme/app:v1"));

    await expect(pending).rejects.toBeInstanceOf(RegistryError);
    await expect(pending).rejects.toThrow("Manifest not found: acme/app:v1");
  });

  test("uses the configured token before the token provider", async () => {
    const http = createMockHttpClient(new Map([["https://ghcr.io/v2/acme/app/manifests/v1", manifestResponse()]]));
    const images = new RegistryImages(
      http,
      { registries: { "ghcr.io": { token: "config-token", insecure: false } } },
      createMockTokenProvider({ "ghcr.io": "env-token" })
    );

    await images.resolve(parseReference("ghcr.io/acme/app:v1"));

    expect(http.calls[0]?.headers["authorization"]).toBe("Bearer config-token");
  });

  test("talks plain HTTP to loopback registries", async () => {
    const http = createMockHttpClient(new Map([["http://localhost:5000/v2/app/manifests/v1", manifestResponse()]]));
    const images = new RegistryImages(http);

    expect(await images.resolve(parseReference("localhost:5000/app:v1"))).toBe(DIGEST);
  });

  describe("exists", () => {
    const ref = parseDigestReference(`ghcr.io/acme/bundle@${DIGEST}`);
    const HEAD_KEY = `HEAD https://ghcr.io/v2/acme/bundle/manifests/${DIGEST}`;

    test("true when the registry has the manifest", async () => {
      const http = createMockHttpClient(new Map([[HEAD_KEY, new Response(null, { status: 200 })]]));

      expect(await new RegistryImages(http).exists(ref)).toBe(true);
    });

    test("false on 404", async () => {
      expect(await new RegistryImages(createMockHttpClient()).exists(ref)).toBe(false);
    });

    test("throws RegistryError on other failures", async () => {
      const http = createMockHttpClient(new Map([[HEAD_KEY, errorResponse(500, "Internal Server Error")]]));

      await expect(new RegistryImages(http).exists(ref)).rejects.toThrow(
        "Failed to check manifest: 500 Internal Server Error"
      );
    });
  });

  describe("layer", () => {
    test("downloads and verifies the blob", async () => {
      const http = createMockHttpClient(
        new Map([[`https://ghcr.io/v2/acme/app/blobs/${LAYER_DIGEST}`, binaryResponse(LAYER)]])
      );
      const images = new RegistryImages(http);

      const data = await images.layer(parseReference("ghcr.io/acme/app:v1"), LAYER_DESCRIPTOR);

      expect(data.toString()).toBe("layer bytes");
    });

    test("throws RegistryError on a digest mismatch", async () => {
      const http = createMockHttpClient(
        new Map([[`https://ghcr.io/v2/acme/app/blobs/${LAYER_DIGEST}`, binaryResponse(Buffer.from("other"))]])
      );
      const images = new RegistryImages(http);

      await expect(
        images.layer(parseReference("ghcr.io/acme/app:v1"), LAYER_DESCRIPTOR)
      ).rejects.toBeInstanceOf(RegistryError);
    });
  });
});
