/**
 * Pull orchestration
 *
 * Resolve → classify → materialize → rewrite. Every usage check runs before
 * the destination is touched.
 */

import { assertOutputPathAllowed, materializeImage, prepareOutputDirectory } from "#/archive";
import type { EngineContext } from "#/core";
import { rewriteImagesLock } from "#/lock";
import { RegistryImages, classifyManifest } from "#/oci";
import { contextName, parseReference } from "#/reference";
import { loadLocalConfig } from "#/registry";
import { intentFor, referenceFromSource, resolveReferenceSource } from "./source";
import type { PullContext, PullOptions, PullResult } from "./pull.types";

/**
 * Pull an image or bundle into `options.output`.
 *
 * The output directory is removed and recreated. For bundles the images lock
 * is relocated to the bundle repository when every image is present there.
 *
 * @throws UsageError on conflicting flags, a disallowed output path or a
 *   manifest that does not match the requested kind
 */
export async function pull(ctx: PullContext, options: PullOptions): Promise<PullResult> {
  const source = resolveReferenceSource(options);
  assertOutputPathAllowed(options.output);

  const reference = parseReference(referenceFromSource(ctx.fs, source), "weak");
  const resolved = await ctx.registry.manifest(reference);
  // Lock sources name a bundle, so they are classified as one and get the rewrite below
  const kind = classifyManifest(resolved.manifest, intentFor(source));

  ctx.logger.info(`Pulling image '${contextName(reference)}@${resolved.digest}'`);

  prepareOutputDirectory(ctx.fs, options.output);
  const entries = await materializeImage(ctx, reference, resolved, options.output);

  if (kind === "image") {
    return { kind, reference, digest: resolved.digest, entries };
  }

  const rewrite = await rewriteImagesLock(ctx, reference, options.output);
  return { kind, reference, digest: resolved.digest, entries, rewrite };
}

/**
 * Pull against real registries, configured from the local config file and
 * the context's token provider.
 */
export async function pullWithContext(ctx: EngineContext, options: PullOptions): Promise<PullResult> {
  // Usage errors win over a broken config file
  resolveReferenceSource(options);
  assertOutputPathAllowed(options.output);

  const registry = new RegistryImages(ctx.http, loadLocalConfig(ctx.fs, ctx.paths.configFile), ctx.tokens);
  return pull({ fs: ctx.fs, logger: ctx.logger, registry }, options);
}
