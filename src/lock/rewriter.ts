/**
 * Images lock relocation
 *
 * After a bundle is pulled, its images lock still points at the repositories
 * the images were originally pushed to. When every image also exists in the
 * bundle's own repository, the lock is rewritten to point there. If any image
 * is missing the lock is left exactly as it was: relocation is all or nothing.
 */

import { InvariantError, errorMessage, type EngineContext } from "#/core";
import type { ImagesMetadata } from "#/oci";
import {
  contextName,
  imageWithRepository,
  parseDigestReference,
  type DigestReference,
  type ImageReference,
} from "#/reference";
import type { ImageDesc } from "#/schemas";
import { imagesLockPath, readImagesLock, writeImagesLock } from "./lockfile";

export type RewriteContext = Pick<EngineContext, "fs" | "logger"> & { registry: ImagesMetadata };

export type RewriteResult =
  | { status: "empty" }
  | { status: "skipped"; missing: string }
  | { status: "rewritten"; images: ImageDesc[] };

/**
 * Strict parse of a reference built by relocation. The inputs were already
 * valid, so a failure here is a bug rather than bad user data.
 */
function parseRelocated(candidate: string): DigestReference {
  try {
    return parseDigestReference(candidate);
  } catch (err) {
    throw new InvariantError(`Relocated reference '${candidate}' is not a valid digest reference: ${errorMessage(err)}`);
  }
}

/**
 * Point every image in the bundle's images lock at the bundle repository.
 *
 * @param bundleRef - Reference the bundle was pulled from
 * @param bundleDir - Directory the bundle was extracted into
 */
export async function rewriteImagesLock(
  ctx: RewriteContext,
  bundleRef: ImageReference,
  bundleDir: string
): Promise<RewriteResult> {
  const lockPath = imagesLockPath(bundleDir);
  const lock = readImagesLock(ctx.fs, lockPath);

  if (lock.spec.images.length === 0) {
    return { status: "empty" };
  }

  ctx.logger.info("Locating image lock file images...");

  const bundleRepo = contextName(bundleRef);
  const relocated: ImageDesc[] = [];

  for (const image of lock.spec.images) {
    const candidate = imageWithRepository(image.image, bundleRepo);
    const ref = parseRelocated(candidate);

    if (!(await ctx.registry.exists(ref))) {
      ctx.logger.info("One or more images not found in bundle repo. Skipping lock file update");
      return { status: "skipped", missing: candidate };
    }

    relocated.push({ ...image, image: candidate });
  }

  ctx.logger.info("All images found in bundle repo. Updating lock file");
  writeImagesLock(ctx.fs, lockPath, { ...lock, spec: { ...lock.spec, images: relocated } });

  return { status: "rewritten", images: relocated };
}
