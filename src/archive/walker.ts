/**
 * Deterministic tree walk.
 *
 * Visits the root, then each directory's children sorted by name, depth first.
 * The order depends only on the names in the tree, never on readdir order.
 */

import { join } from "path";
import { ArchiveError, errorMessage, type FileStat, type FileSystem } from "#/core";
import type { WalkedEntry, WalkVisitor } from "./archive.types";

function lstatOrThrow(fs: FileSystem, path: string): FileStat {
  try {
    return fs.lstat(path);
  } catch (err) {
    throw new ArchiveError(`Reading '${path}': ${errorMessage(err)}`, path, { cause: err });
  }
}

function readdirOrThrow(fs: FileSystem, path: string): string[] {
  try {
    return fs.readdir(path);
  } catch (err) {
    throw new ArchiveError(`Listing '${path}': ${errorMessage(err)}`, path, { cause: err });
  }
}

/**
 * Code-unit order, independent of locale.
 */
export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Walk `root` and everything below it.
 *
 * The visitor sees every entry before its children; returning "skip" for a
 * directory means its children are never listed or visited.
 *
 * Links are never followed, the root included: a root that is a symlink to a
 * directory reaches the visitor as a symlink.
 */
export function walkTree(fs: FileSystem, root: string, visit: WalkVisitor): void {
  const walk = (entry: WalkedEntry): void => {
    const action = visit(entry);
    if (action === "skip" || !entry.stat.isDirectory) {
      return;
    }

    const names = readdirOrThrow(fs, entry.path).sort(compareNames);
    for (const name of names) {
      const path = join(entry.path, name);
      walk({
        path,
        relativePath: entry.relativePath === "." ? name : `${entry.relativePath}/${name}`,
        stat: lstatOrThrow(fs, path),
      });
    }
  };

  walk({ path: root, relativePath: ".", stat: lstatOrThrow(fs, root) });
}
