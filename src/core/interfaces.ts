/**
 * Core interfaces for dependency injection.
 * These abstract away I/O operations for testability and portability.
 */

/**
 * Result of a non-following stat. Exactly one of the three flags is true for
 * directories, regular files and symlinks; all three are false for devices,
 * sockets and FIFOs.
 */
export interface FileStat {
  isDirectory: boolean;
  isFile: boolean;
  isSymbolicLink: boolean;
  size: number;
  mode: number;
}

export interface FileSystem {
  readFile(path: string): string;
  readFileBinary(path: string): Buffer;
  writeFile(path: string, content: string, options?: { mode?: number }): void;
  writeFileBinary(path: string, content: Uint8Array, options?: { mode?: number }): void;
  /** Append to an existing file; used to stream archives to and from disk */
  appendFileBinary(path: string, content: Uint8Array): void;
  exists(path: string): boolean;
  mkdir(path: string, options?: { recursive?: boolean; mode?: number }): void;
  readdir(path: string): string[];
  lstat(path: string): FileStat;
  unlink(path: string): void;
  rmdir(path: string, options?: { recursive?: boolean }): void;
}

export interface HttpClient {
  fetch(url: string, options?: RequestInit): Promise<Response>;
}

/**
 * Progress output. The engine never writes to the console directly.
 */
export interface Logger {
  info(message: string): void;
}

export interface TokenProvider {
  getRegistryToken(host: string): string | undefined;
}

export interface PathConfig {
  /** Local config file (registries, tokens) */
  configFile: string;
  /** Directory for temporary tarballs */
  tempDir: string;
}

export interface EngineContext {
  fs: FileSystem;
  http: HttpClient;
  logger: Logger;
  tokens: TokenProvider;
  paths: PathConfig;
}
