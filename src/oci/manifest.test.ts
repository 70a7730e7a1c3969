import { describe, test, expect } from "vitest";
import { createLayerManifest, emptyConfigDescriptor } from "./manifest";
import { PackagedArtifact } from "#/archive";
import { createMockFileSystem } from "#/test-utils/mocks";
import { BUNDLE_ANNOTATION } from "#/constants";
import { OciManifestSchema } from "#/schemas";

const DIGEST = `sha256:${"f".repeat(64)}`;

function artifact(bundle: boolean): PackagedArtifact {
  return new PackagedArtifact(createMockFileSystem(), "/tmp/layer.tar", bundle, DIGEST, 1024);
}

describe("emptyConfigDescriptor", () => {
  test("describes the empty JSON object", () => {
    expect(emptyConfigDescriptor()).toEqual({
      mediaType: "application/vnd.oci.image.config.v1+json",
      digest: "sha256:44136fa355b3678a1146ad16f7e8649e94fb4fc21fe77e8310c060f61caaff8a",
      size: 2,
    });
  });
});

describe("createLayerManifest", () => {
  test("stores the artifact as the only uncompressed layer", () => {
    const manifest = createLayerManifest(artifact(false));

    expect(manifest.layers).toEqual([
      { mediaType: "application/vnd.oci.image.layer.v1.tar", digest: DIGEST, size: 1024 },
    ]);
    expect(manifest.annotations).toBeUndefined();
    expect(OciManifestSchema.safeParse(manifest).success).toBe(true);
  });

  test("annotates bundles", () => {
    expect(createLayerManifest(artifact(true)).annotations).toEqual({ [BUNDLE_ANNOTATION]: "true" });
  });
});
