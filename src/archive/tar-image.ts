/**
 * Deterministic archiver
 *
 * Packages files and directories into one tar stream whose bytes depend only
 * on names and contents: entries are walked in sorted order and every header
 * carries the same mode, owner and mtime regardless of what is on disk. The
 * stream is written to a temporary file as it is produced.
 */

import { randomUUID } from "crypto";
import { basename, join } from "path";
import { createTarPacker, type TarHeader } from "modern-tar";
import {
  ArchiveError,
  NonRegularFileError,
  createStreamDigest,
  errorMessage,
  type EngineContext,
  type FileSystem,
  type Logger,
} from "#/core";
import { TAR_DIR_MODE, TAR_FILE_MODE, TAR_MTIME } from "#/constants";
import { walkTree } from "./walker";
import type { PackageOptions } from "./archive.types";

export type ArchiveContext = Pick<EngineContext, "fs" | "logger" | "paths">;

/**
 * A packaged layer backed by a temporary tar file.
 * The owner must call `cleanup()` once the tarball has been consumed.
 */
export class PackagedArtifact {
  constructor(
    private fs: FileSystem,
    readonly path: string,
    readonly bundle: boolean,
    readonly digest: string,
    readonly size: number
  ) {}

  read(): Buffer {
    return this.fs.readFileBinary(this.path);
  }

  cleanup(): void {
    if (this.fs.exists(this.path)) {
      this.fs.unlink(this.path);
    }
  }
}

const FIXED_OWNERSHIP = { uid: 0, gid: 0, uname: "", gname: "" };

// ustar name fields hold 100 bytes, not 100 characters
const USTAR_NAME_BYTES = 100;

type TarPackController = ReturnType<typeof createTarPacker>["controller"];

/**
 * A planned tar entry. File content is read only when the entry is written.
 */
export interface PlannedTarEntry {
  header: TarHeader;
  /** File copied into the archive; absent for directories */
  source?: string;
}

function withPathRecord(header: TarHeader): TarHeader {
  return Buffer.byteLength(header.name) > USTAR_NAME_BYTES ? { ...header, pax: { path: header.name } } : header;
}

function directoryHeader(relativePath: string): TarHeader {
  return withPathRecord({
    name: `${relativePath}/`,
    type: "directory",
    size: 0,
    mode: TAR_DIR_MODE,
    mtime: TAR_MTIME,
    ...FIXED_OWNERSHIP,
  });
}

function fileHeader(relativePath: string, size: number): TarHeader {
  return withPathRecord({
    name: relativePath,
    type: "file",
    size,
    mode: TAR_FILE_MODE,
    mtime: TAR_MTIME,
    ...FIXED_OWNERSHIP,
  });
}

/**
 * Exact match on the "/"-separated relative path.
 */
export function isExcluded(relativePath: string, excludePaths: readonly string[]): boolean {
  return excludePaths.includes(relativePath);
}

/**
 * Walk the inputs and plan tar entries in archive order.
 *
 * A directory input contributes paths relative to itself (the directory's own
 * entry is not emitted); a file input contributes its base name.
 *
 * @throws NonRegularFileError for symlinks, devices, sockets and FIFOs
 * @throws ArchiveError when a stat or listing fails
 */
export function collectTarEntries(
  fs: FileSystem,
  options: PackageOptions,
  logger: Logger
): PlannedTarEntry[] {
  const excludePaths = options.excludePaths ?? [];
  const entries: PlannedTarEntry[] = [];

  for (const input of options.inputs) {
    walkTree(fs, input, ({ path, relativePath, stat }) => {
      if (stat.isDirectory) {
        if (isExcluded(relativePath, excludePaths)) {
          return "skip";
        }
        if (relativePath !== ".") {
          logger.info(`dir: ${relativePath}`);
          entries.push({ header: directoryHeader(relativePath) });
        }
        return "continue";
      }

      if (!stat.isFile) {
        throw new NonRegularFileError(path);
      }

      // A bare file input is its own walk root
      const name = relativePath === "." ? basename(path) : relativePath;
      if (!isExcluded(name, excludePaths)) {
        logger.info(`file: ${name}`);
        entries.push({ header: fileHeader(name, stat.size), source: path });
      }
      return "continue";
    });
  }

  return entries;
}

async function addEntry(fs: FileSystem, controller: TarPackController, entry: PlannedTarEntry): Promise<void> {
  if (!entry.source) {
    await controller.add(entry.header).getWriter().close();
    return;
  }

  let content: Buffer;
  try {
    content = fs.readFileBinary(entry.source);
  } catch (err) {
    throw new ArchiveError(`Adding file '${entry.source}' to tar: ${errorMessage(err)}`, entry.source, {
      cause: err,
    });
  }

  const body = controller.add({ ...entry.header, size: content.length }).getWriter();
  await body.write(content);
  await body.close();
}

/**
 * Serialize the inputs into one canonical tar stream, handing each chunk to
 * `sink` as it is produced. Files are read one at a time.
 */
export async function writeTarball(
  fs: FileSystem,
  options: PackageOptions,
  logger: Logger,
  sink: (chunk: Uint8Array) => void
): Promise<void> {
  const entries = collectTarEntries(fs, options, logger);
  const { readable, controller } = createTarPacker();
  const output = readable.getReader();

  const produce = async (): Promise<void> => {
    try {
      for (const entry of entries) {
        await addEntry(fs, controller, entry);
      }
      controller.finalize();
    } catch (err) {
      await output.cancel(err);
      throw err;
    }
  };

  const drain = async (): Promise<void> => {
    try {
      for (;;) {
        const { done, value } = await output.read();
        if (done) return;
        sink(value);
      }
    } catch (err) {
      await output.cancel(err);
      throw err;
    }
  };

  await Promise.all([produce(), drain()]);
}

/**
 * The whole canonical tar stream in memory.
 */
export async function createTarball(
  fs: FileSystem,
  options: PackageOptions,
  logger: Logger
): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  await writeTarball(fs, options, logger, (chunk) => {
    chunks.push(chunk);
  });
  return Buffer.concat(chunks);
}

function tempTarballPath(tempDir: string): string {
  return join(tempDir, `ocibundle-tar-image-${randomUUID()}.tar`);
}

async function packageArtifact(
  ctx: ArchiveContext,
  options: PackageOptions,
  bundle: boolean
): Promise<PackagedArtifact> {
  const { fs } = ctx;
  const tempPath = tempTarballPath(ctx.paths.tempDir);

  const writing = <T>(operation: () => T): T => {
    try {
      return operation();
    } catch (err) {
      throw new ArchiveError(`Writing '${tempPath}': ${errorMessage(err)}`, tempPath, { cause: err });
    }
  };

  writing(() => fs.writeFileBinary(tempPath, new Uint8Array(0), { mode: TAR_FILE_MODE }));
  try {
    const digest = createStreamDigest();
    await writeTarball(fs, options, ctx.logger, (chunk) => {
      digest.update(chunk);
      writing(() => fs.appendFileBinary(tempPath, chunk));
    });
    const { digest: sha, size } = digest.finish();
    return new PackagedArtifact(fs, tempPath, bundle, sha, size);
  } catch (err) {
    if (fs.exists(tempPath)) {
      fs.unlink(tempPath);
    }
    throw err;
  }
}

export function packageAsFileImage(ctx: ArchiveContext, options: PackageOptions): Promise<PackagedArtifact> {
  return packageArtifact(ctx, options, false);
}

export function packageAsFileBundle(ctx: ArchiveContext, options: PackageOptions): Promise<PackagedArtifact> {
  return packageArtifact(ctx, options, true);
}
