import { describe, test, expect } from "vitest";
import { rewriteImagesLock } from "./rewriter";
import { readImagesLock } from "./lockfile";
import { createMockFileSystem, createMockImagesMetadata, createMockLogger } from "#/test-utils/mocks";
import { InvariantError, RegistryError } from "#/core";
import { parseReference } from "#/reference";

const LOCK_PATH = "/out/.bundle/images.yml";
const BUNDLE_REF = parseReference("ghcr.io/acme/bundle:v1");

const digest = (char: string): string => `sha256:${char.repeat(64)}`;
const relocated = (char: string): string => `ghcr.io/acme/bundle@${digest(char)}`;

const IMAGES_LOCK_YAML = `apiVersion: ocibundle.dev/v1alpha1
kind: ImagesLock
spec:
  images:
    - image: docker.io/acme/api@${digest("a")}
      tag: v1
      name: api
      metadata:
        team: core
    - image: quay.io/acme/worker@${digest("b")}
    - image: registry.example.com/acme/web@${digest("c")}
      tag: "2.0"
`;

function setup(existing: string[], content = IMAGES_LOCK_YAML) {
  const fs = createMockFileSystem({ [LOCK_PATH]: content });
  const registry = createMockImagesMetadata({ existing });
  const logger = createMockLogger();
  return { fs, registry, logger };
}

describe("rewriteImagesLock", () => {
  test("relocates every image when all exist in the bundle repository", async () => {
    const ctx = setup([relocated("a"), relocated("b"), relocated("c")]);

    const result = await rewriteImagesLock(ctx, BUNDLE_REF, "/out");

    const expected = [
      { image: relocated("a"), tag: "v1", name: "api", metadata: { team: "core" } },
      { image: relocated("b") },
      { image: relocated("c"), tag: "2.0" },
    ];
    expect(result).toEqual({ status: "rewritten", images: expected });
    expect(readImagesLock(ctx.fs, LOCK_PATH).spec.images).toEqual(expected);
    expect(ctx.fs.files.get(LOCK_PATH)?.mode).toBe(0o600);
    expect(ctx.logger.lines).toEqual([
      "Locating image lock file images...",
      "All images found in bundle repo. Updating lock file",
    ]);
  });

  test.each([
    { missingIndex: 0, checked: 1 },
    { missingIndex: 1, checked: 2 },
    { missingIndex: 2, checked: 3 },
  ])("leaves the lock byte-identical when image $missingIndex is missing", async ({ missingIndex, checked }) => {
    const all = [relocated("a"), relocated("b"), relocated("c")];
    const ctx = setup(all.filter((_, index) => index !== missingIndex));
    const before = ctx.fs.files.get(LOCK_PATH);

    const result = await rewriteImagesLock(ctx, BUNDLE_REF, "/out");

    expect(result).toEqual({ status: "skipped", missing: all[missingIndex] });
    expect(ctx.fs.files.get(LOCK_PATH)).toBe(before);
    expect(ctx.fs.readFile(LOCK_PATH)).toBe(IMAGES_LOCK_YAML);
    expect(ctx.registry.existsCalls).toEqual(all.slice(0, checked));
    expect(ctx.logger.lines).toEqual([
      "Locating image lock file images...",
      "One or more images not found in bundle repo. Skipping lock file update",
    ]);
  });

  test("a registry failure aborts the rewrite instead of counting as missing", async () => {
    const ctx = setup([relocated("a")]);
    ctx.registry.exists = async () => {
      throw new RegistryError("Failed to check manifest: 500 Internal Server Error");
    };

    await expect(rewriteImagesLock(ctx, BUNDLE_REF, "/out")).rejects.toBeInstanceOf(RegistryError);
    expect(ctx.fs.readFile(LOCK_PATH)).toBe(IMAGES_LOCK_YAML);
    expect(ctx.logger.lines).toEqual(["Locating image lock file images..."]);
  });

  test("returns empty without logging or registry calls when the lock has no images", async () => {
    const content = "apiVersion: ocibundle.dev/v1alpha1\nkind: ImagesLock\nspec:\n  images: []\n";
    const ctx = setup([], content);

    const result = await rewriteImagesLock(ctx, BUNDLE_REF, "/out");

    expect(result).toEqual({ status: "empty" });
    expect(ctx.registry.existsCalls).toEqual([]);
    expect(ctx.logger.lines).toEqual([]);
    expect(ctx.fs.readFile(LOCK_PATH)).toBe(content);
  });

  test("keeps unknown keys of the document", async () => {
    const content = `apiVersion: ocibundle.dev/v1alpha1
kind: ImagesLock
metadata:
  createdBy: test
spec:
  images:
    - image: docker.io/acme/api@${digest("a")}
`;
    const ctx = setup([relocated("a")], content);

    await rewriteImagesLock(ctx, BUNDLE_REF, "/out");

    expect(readImagesLock(ctx.fs, LOCK_PATH)).toEqual({
      apiVersion: "ocibundle.dev/v1alpha1",
      kind: "ImagesLock",
      metadata: { createdBy: "test" },
      spec: { images: [{ image: relocated("a") }] },
    });
  });

  test("raises InvariantError when a relocated reference does not parse", async () => {
    const content = `apiVersion: ocibundle.dev/v1alpha1
kind: ImagesLock
spec:
  images:
    - image: docker.io/acme/api@sha256:abc
`;
    const ctx = setup([], content);

    await expect(rewriteImagesLock(ctx, BUNDLE_REF, "/out")).rejects.toBeInstanceOf(InvariantError);
    expect(ctx.registry.existsCalls).toEqual([]);
    expect(ctx.fs.readFile(LOCK_PATH)).toBe(content);
  });
});
