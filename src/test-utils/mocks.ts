/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import type { FileStat, FileSystem, HttpClient, Logger, TokenProvider } from "#/core";
import type { ImagesMetadata, OciDescriptor, OciManifest, ResolvedManifest } from "#/oci";
import { formatReference, type DigestReference, type ImageReference } from "#/reference";

type MockEntryType = "file" | "directory" | "symlink" | "device";

interface MockFileEntry {
  type: MockEntryType;
  content: Buffer;
  mode: number;
}

/** Non-file entries for createMockFileSystem */
export interface MockSpecialEntry {
  type: Exclude<MockEntryType, "file">;
  mode?: number;
}

export const directory = (mode = 0o755): MockSpecialEntry => ({ type: "directory", mode });
export const symlink = (): MockSpecialEntry => ({ type: "symlink", mode: 0o777 });
export const device = (): MockSpecialEntry => ({ type: "device", mode: 0o660 });

function isSpecial(value: string | Buffer | MockSpecialEntry): value is MockSpecialEntry {
  return typeof value === "object" && !Buffer.isBuffer(value);
}

function enoent(op: string, path: string): Error {
  return new Error(`ENOENT: no such file or directory, ${op} '${path}'`);
}

function trimSlash(path: string): string {
  return path.length > 1 && path.endsWith("/") ? path.slice(0, -1) : path;
}

/**
 * Create a mock FileSystem with in-memory storage.
 *
 * Directories exist implicitly when something is stored below them. `readdir`
 * returns children in insertion order, not sorted. Paths in `failures` throw
 * the mapped error from every read operation.
 */
export function createMockFileSystem(
  initialFiles: Record<string, string | Buffer | MockSpecialEntry> = {}
): FileSystem & { files: Map<string, MockFileEntry>; failures: Map<string, Error> } {
  const files = new Map<string, MockFileEntry>();
  const failures = new Map<string, Error>();

  for (const [path, value] of Object.entries(initialFiles)) {
    if (isSpecial(value)) {
      files.set(path, { type: value.type, content: Buffer.alloc(0), mode: value.mode ?? 0o644 });
    } else {
      files.set(path, { type: "file", content: Buffer.from(value), mode: 0o644 });
    }
  }

  function checkFailure(path: string): void {
    const failure = failures.get(path);
    if (failure) throw failure;
  }

  function hasChildren(path: string): boolean {
    const prefix = `${trimSlash(path)}/`;
    for (const filePath of files.keys()) {
      if (filePath.startsWith(prefix)) return true;
    }
    return false;
  }

  function write(path: string, content: Buffer, mode: number | undefined): void {
    const existing = files.get(path);
    files.set(path, { type: "file", content, mode: mode ?? existing?.mode ?? 0o644 });
  }

  return {
    files,
    failures,

    readFile(path: string): string {
      return this.readFileBinary(path).toString("utf-8");
    },

    readFileBinary(path: string): Buffer {
      checkFailure(path);
      const entry = files.get(path);
      if (!entry || entry.type !== "file") {
        throw enoent("open", path);
      }
      return entry.content;
    },

    writeFile(path: string, content: string, options = {}): void {
      write(path, Buffer.from(content), options.mode);
    },

    writeFileBinary(path: string, content: Uint8Array, options = {}): void {
      write(path, Buffer.from(content), options.mode);
    },

    appendFileBinary(path: string, content: Uint8Array): void {
      const existing = files.get(path);
      if (!existing || existing.type !== "file") {
        throw enoent("open", path);
      }
      existing.content = Buffer.concat([existing.content, content]);
    },

    exists(path: string): boolean {
      return files.has(trimSlash(path)) || hasChildren(path);
    },

    mkdir(path: string, options = {}): void {
      const normalizedPath = trimSlash(path);
      if (!files.has(normalizedPath)) {
        files.set(normalizedPath, { type: "directory", content: Buffer.alloc(0), mode: options.mode ?? 0o755 });
      }
    },

    readdir(path: string): string[] {
      checkFailure(path);
      const normalizedPath = trimSlash(path);
      if (!this.exists(normalizedPath)) {
        throw enoent("scandir", path);
      }
      const results = new Set<string>();

      for (const filePath of files.keys()) {
        if (filePath.startsWith(normalizedPath + "/")) {
          const relativePath = filePath.slice(normalizedPath.length + 1);
          const firstPart = relativePath.split("/")[0];
          if (firstPart) {
            results.add(firstPart);
          }
        }
      }

      return Array.from(results);
    },

    lstat(path: string): FileStat {
      checkFailure(path);
      const normalizedPath = trimSlash(path);
      const entry = files.get(normalizedPath);
      if (!entry) {
        if (hasChildren(normalizedPath)) {
          return { isDirectory: true, isFile: false, isSymbolicLink: false, size: 0, mode: 0o755 };
        }
        throw enoent("lstat", path);
      }

      return {
        isDirectory: entry.type === "directory",
        isFile: entry.type === "file",
        isSymbolicLink: entry.type === "symlink",
        size: entry.content.length,
        mode: entry.mode,
      };
    },

    unlink(path: string): void {
      files.delete(path);
    },

    rmdir(path: string, _options?: { recursive?: boolean }): void {
      const normalizedPath = trimSlash(path);
      for (const filePath of files.keys()) {
        if (filePath === normalizedPath || filePath.startsWith(normalizedPath + "/")) {
          files.delete(filePath);
        }
      }
    },
  };
}

/**
 * Recorded HTTP request
 */
export interface HttpCall {
  url: string;
  method: string;
  headers: Record<string, string>;
}

function headersToRecord(headers: HeadersInit | undefined): Record<string, string> {
  const record: Record<string, string> = {};
  new Headers(headers).forEach((value, key) => {
    record[key] = value;
  });
  return record;
}

/**
 * Create a mock HttpClient with predefined responses.
 * Keys are either "METHOD url" or a bare url matching any method.
 */
export function createMockHttpClient(
  responses: Map<string, Response | (() => Response)> = new Map()
): HttpClient & { responses: Map<string, Response | (() => Response)>; calls: HttpCall[] } {
  const calls: HttpCall[] = [];

  return {
    responses,
    calls,

    async fetch(url: string, options: RequestInit = {}): Promise<Response> {
      const method = options.method ?? "GET";
      calls.push({ url, method, headers: headersToRecord(options.headers) });

      const responseOrFactory = responses.get(`${method} ${url}`) ?? responses.get(url);

      if (!responseOrFactory) {
        return new Response(null, {
          status: 404,
          statusText: "Not Found",
        });
      }

      return typeof responseOrFactory === "function" ? responseOrFactory() : responseOrFactory;
    },
  };
}

/**
 * Create a Logger that records every line
 */
export function createMockLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];

  return {
    lines,
    info(message: string): void {
      lines.push(message);
    },
  };
}

/**
 * Create a mock TokenProvider keyed by registry host
 */
export function createMockTokenProvider(tokens: Record<string, string> = {}): TokenProvider {
  return {
    getRegistryToken(host: string): string | undefined {
      return tokens[host];
    },
  };
}

interface MockImage {
  digest: string;
  manifest: OciManifest;
}

/**
 * Create an in-memory ImagesMetadata.
 *
 * @param images - Resolvable images keyed by formatted reference
 *   (e.g. "ghcr.io/acme/bundle:v1")
 * @param existing - Formatted digest references `exists` reports as present
 * @param blobs - Layer content keyed by digest
 */
export function createMockImagesMetadata(
  options: {
    images?: Record<string, MockImage>;
    existing?: string[];
    blobs?: Record<string, Uint8Array>;
  } = {}
): ImagesMetadata & { existsCalls: string[] } {
  const images = options.images ?? {};
  const existing = new Set(options.existing ?? []);
  const blobs = options.blobs ?? {};
  const existsCalls: string[] = [];

  function lookup(ref: ImageReference): MockImage {
    const key = formatReference(ref);
    const image = images[key];
    if (!image) {
      throw new Error(`Manifest not found: ${key}`);
    }
    return image;
  }

  return {
    existsCalls,

    async resolve(ref: ImageReference): Promise<string> {
      return lookup(ref).digest;
    },

    async manifest(ref: ImageReference): Promise<ResolvedManifest> {
      const image = lookup(ref);
      return { digest: image.digest, manifest: image.manifest };
    },

    async exists(ref: DigestReference): Promise<boolean> {
      const key = formatReference(ref);
      existsCalls.push(key);
      return existing.has(key);
    },

    async layer(_ref: ImageReference, descriptor: OciDescriptor): Promise<Buffer> {
      const blob = blobs[descriptor.digest];
      if (!blob) {
        throw new Error(`Blob not found: ${descriptor.digest}`);
      }
      return Buffer.from(blob);
    },
  };
}

/**
 * Helper to create a successful JSON response
 */
export function jsonResponse(data: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

/**
 * Helper to create an error response
 */
export function errorResponse(status: number, statusText: string, headers: Record<string, string> = {}): Response {
  return new Response(null, { status, statusText, headers });
}

/**
 * Helper to create a binary response
 */
export function binaryResponse(data: Uint8Array, status = 200): Response {
  return new Response(data as unknown as BodyInit, {
    status,
    headers: { "Content-Type": "application/octet-stream" },
  });
}
