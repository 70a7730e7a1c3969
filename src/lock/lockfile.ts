import { join } from "path";
import { stringify } from "yaml";
import { LockfileError, errorMessage, type FileSystem } from "#/core";
import { BUNDLE_DIR, IMAGES_LOCK_FILE, LOCK_FILE_MODE } from "#/constants";
import { safeParseYaml, type ParseResult } from "#/friendly-errors";
import {
  BundleLockSchema,
  ImagesLockSchema,
  type BundleLock,
  type ImagesLock,
} from "#/schemas";

/**
 * Location of the images lock inside a pulled or packaged bundle.
 */
export function imagesLockPath(bundleDir: string): string {
  return join(bundleDir, BUNDLE_DIR, IMAGES_LOCK_FILE);
}

function readDocument<T>(
  fs: FileSystem,
  path: string,
  parse: (content: string) => ParseResult<T>
): T {
  let content: string;
  try {
    content = fs.readFile(path);
  } catch (err) {
    throw new LockfileError(`Reading lock file ${path}`, [errorMessage(err)]);
  }

  const result = parse(content);
  if (!result.success) {
    throw new LockfileError(result.error.message, result.error.details);
  }
  return result.data;
}

export function readImagesLock(fs: FileSystem, path: string): ImagesLock {
  return readDocument(fs, path, (content) => safeParseYaml(content, ImagesLockSchema, path));
}

/**
 * Overwrite the images lock, leaving it readable and writable by the owner only.
 */
export function writeImagesLock(fs: FileSystem, path: string, lock: ImagesLock): void {
  fs.writeFile(path, stringify(lock), { mode: LOCK_FILE_MODE });
}

export function readBundleLock(fs: FileSystem, path: string): BundleLock {
  return readDocument(fs, path, (content) => safeParseYaml(content, BundleLockSchema, path));
}
