/**
 * Tar extraction security utilities.
 *
 * PRE-EXTRACT validation of parsed layer entries. Every entry is checked before
 * the first byte is written, so an unsafe layer leaves the destination untouched.
 */

import { resolve, normalize, isAbsolute, relative, posix } from "path";

export interface TarValidationResult {
  safe: boolean;
  violations: string[];
}

/** Minimal view of a parsed tar header. */
export interface TarEntryHeader {
  name: string;
  type?: string;
}

const EXTRACTABLE_TYPES = new Set(["file", "directory"]);

/**
 * Validate layer entries BEFORE extraction.
 * Checks for:
 * - Absolute paths
 * - Path traversal (entries containing ".." that escape the target)
 * - Entry types other than regular files and directories (links, devices)
 *
 * @param entries - Parsed tar headers, in archive order
 * @param targetDir - Directory where files will be extracted
 */
export function validateTarEntries(entries: TarEntryHeader[], targetDir: string): TarValidationResult {
  const violations: string[] = [];
  const resolvedTargetDir = resolve(targetDir);

  for (const entry of entries) {
    const type = entry.type ?? "file";
    if (!EXTRACTABLE_TYPES.has(type)) {
      violations.push(`Unsupported entry type '${type}': ${entry.name}`);
      continue;
    }

    const name = stripTrailingSlash(entry.name);
    if (!name) {
      violations.push("Entry with empty name");
      continue;
    }

    if (isAbsolute(name) || posix.isAbsolute(name)) {
      violations.push(`Absolute path in layer: ${entry.name}`);
      continue;
    }

    const normalized = normalize(name);
    if (normalized === ".." || normalized.startsWith("../")) {
      violations.push(`Path traversal in layer: ${entry.name}`);
      continue;
    }

    const resolvedEntry = resolve(resolvedTargetDir, normalized);
    if (!isWithinTarget(resolvedTargetDir, resolvedEntry)) {
      violations.push(`Entry escapes target directory: ${entry.name}`);
    }
  }

  return {
    safe: violations.length === 0,
    violations,
  };
}

/**
 * Directory entries carry a trailing "/" in the archive.
 *
 * @example stripTrailingSlash("assets/") → "assets"
 */
export function stripTrailingSlash(name: string): string {
  return name.replace(/\/+$/, "");
}

function isWithinTarget(resolvedTargetDir: string, resolvedPath: string): boolean {
  if (resolvedPath === resolvedTargetDir) return true;
  const rel = relative(resolvedTargetDir, resolvedPath);
  return !(rel.startsWith("..") || isAbsolute(rel));
}
