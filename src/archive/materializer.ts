/**
 * Directory materializer
 *
 * Inverse of the archiver: writes the directories and regular files of one or
 * more layers into a destination directory. Entries are validated as a whole
 * before anything is written.
 */

import { dirname, join, posix } from "path";
import { gunzipSync } from "zlib";
import { createTarDecoder, type ParsedTarEntry, type TarHeader } from "modern-tar";
import {
  ArchiveError,
  errorMessage,
  stripTrailingSlash,
  validateTarEntries,
  type EngineContext,
  type FileSystem,
  type Logger,
  UsageError,
} from "#/core";
import { DISALLOWED_OUTPUT_PATHS, OUTPUT_DIR_MODE, TAR_DIR_MODE, TAR_FILE_MODE } from "#/constants";
import type { ImagesMetadata, ResolvedManifest } from "#/oci";
import type { ImageReference } from "#/reference";
import type { ExtractedEntry } from "./archive.types";

export type MaterializeContext = Pick<EngineContext, "fs" | "logger"> & { registry: ImagesMetadata };

export function isGzip(data: Uint8Array): boolean {
  return data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b;
}

function withPath<T>(path: string, action: string, operation: () => T): T {
  try {
    return operation();
  } catch (err) {
    throw new ArchiveError(`${action} '${path}': ${errorMessage(err)}`, path, { cause: err });
  }
}

function unreadableLayer(destination: string, err: unknown): ArchiveError {
  return new ArchiveError(`Reading layer for '${destination}': ${errorMessage(err)}`, destination, { cause: err });
}

function layerStream(data: Uint8Array): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(data);
      controller.close();
    },
  });
}

/**
 * Decode the layer one entry at a time. `visit` must consume the entry body
 * through `drain` before the next entry is decoded.
 */
async function forEachEntry(
  tar: Uint8Array,
  destination: string,
  visit: (entry: ParsedTarEntry, drain: (onChunk: (chunk: Uint8Array) => void) => Promise<void>) => Promise<void>
): Promise<void> {
  const read = async <T>(reader: ReadableStreamDefaultReader<T>): Promise<ReadableStreamReadResult<T>> => {
    try {
      return await reader.read();
    } catch (err) {
      throw unreadableLayer(destination, err);
    }
  };

  const entries = layerStream(tar).pipeThrough(createTarDecoder()).getReader();
  for (;;) {
    const next = await read(entries);
    if (next.done) return;

    const body = next.value.body.getReader();
    await visit(next.value, async (onChunk) => {
      for (;;) {
        const chunk = await read(body);
        if (chunk.done) return;
        onChunk(chunk.value);
      }
    });
  }
}

/**
 * Extract one layer into `destination`.
 *
 * Gzip-compressed layers are inflated first. The layer is decoded twice:
 * once to validate every header, once to write entries as they stream by.
 * Entry "." (written by some archivers for the root) is ignored.
 *
 * @throws ArchiveError on unreadable or unsafe layers and on write failures
 */
export async function extractLayer(
  fs: FileSystem,
  layer: Uint8Array,
  destination: string,
  logger: Logger
): Promise<ExtractedEntry[]> {
  let tar: Uint8Array;
  try {
    tar = isGzip(layer) ? gunzipSync(layer) : layer;
  } catch (err) {
    throw unreadableLayer(destination, err);
  }

  const headers: TarHeader[] = [];
  await forEachEntry(tar, destination, async (entry, drain) => {
    headers.push(entry.header);
    await drain(() => undefined);
  });

  const validation = validateTarEntries(headers, destination);
  if (!validation.safe) {
    throw new ArchiveError(`Unsafe layer: ${validation.violations.join(", ")}`, destination);
  }

  const extracted: ExtractedEntry[] = [];

  await forEachEntry(tar, destination, async ({ header }, drain) => {
    const relativePath = posix.normalize(stripTrailingSlash(header.name));
    if (relativePath === ".") {
      await drain(() => undefined);
      return;
    }

    const target = join(destination, relativePath);

    if (header.type === "directory") {
      logger.info(`dir: ${relativePath}`);
      withPath(target, "Creating directory", () => fs.mkdir(target, { recursive: true, mode: TAR_DIR_MODE }));
      await drain(() => undefined);
      extracted.push({ type: "directory", relativePath, size: 0 });
      return;
    }

    logger.info(`file: ${relativePath}`);
    withPath(target, "Writing file", () => {
      fs.mkdir(dirname(target), { recursive: true, mode: TAR_DIR_MODE });
      fs.writeFileBinary(target, new Uint8Array(0), { mode: (header.mode ?? TAR_FILE_MODE) & 0o777 });
    });
    let size = 0;
    await drain((chunk) => {
      withPath(target, "Writing file", () => fs.appendFileBinary(target, chunk));
      size += chunk.length;
    });
    extracted.push({ type: "file", relativePath, size });
  });

  return extracted;
}

/**
 * Extract every layer of a pulled image, in manifest order.
 */
export async function materializeImage(
  ctx: MaterializeContext,
  ref: ImageReference,
  resolved: ResolvedManifest,
  destination: string
): Promise<ExtractedEntry[]> {
  const pinned: ImageReference = { ...ref, digest: resolved.digest };
  const extracted: ExtractedEntry[] = [];

  for (const descriptor of resolved.manifest.layers) {
    const layer = await ctx.registry.layer(pinned, descriptor);
    extracted.push(...(await extractLayer(ctx.fs, layer, destination, ctx.logger)));
  }

  return extracted;
}

/**
 * Refuse destinations whose recursive removal would take the caller's tree with it.
 *
 * @throws UsageError for "/", "." and ".."
 */
export function assertOutputPathAllowed(path: string): void {
  const normalized = stripTrailingSlash(posix.normalize(path)) || "/";
  if (DISALLOWED_OUTPUT_PATHS.includes(path) || DISALLOWED_OUTPUT_PATHS.includes(normalized)) {
    throw new UsageError("Disallowed output directory (trying to avoid accidental deletion)");
  }
}

/**
 * Remove `path` and recreate it empty, owner-only.
 */
export function prepareOutputDirectory(fs: FileSystem, path: string): void {
  assertOutputPathAllowed(path);
  withPath(path, "Clearing output directory", () => {
    fs.rmdir(path, { recursive: true });
    fs.mkdir(path, { recursive: true, mode: OUTPUT_DIR_MODE });
  });
}
