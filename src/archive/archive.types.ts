/**
 * Archive types
 */

import type { FileStat } from "#/core";

/**
 * Returned by a walk visitor. "skip" on a directory prunes its whole subtree.
 */
export type WalkAction = "continue" | "skip";

export interface WalkedEntry {
  /** Path on the filesystem */
  path: string;
  /** "/"-separated path relative to the walk root; "." for the root itself */
  relativePath: string;
  stat: FileStat;
}

export type WalkVisitor = (entry: WalkedEntry) => WalkAction | void;

export interface PackageOptions {
  /** Files and directories to package, in order */
  inputs: string[];
  /** Relative paths left out of the archive (exact match) */
  excludePaths?: string[];
}

export interface ExtractedEntry {
  type: "directory" | "file";
  /** "/"-separated path relative to the destination */
  relativePath: string;
  size: number;
}
