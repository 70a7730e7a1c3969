/**
 * Node.js implementations of the core interfaces.
 */

import {
  appendFileSync,
  chmodSync,
  existsSync,
  lstatSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  rmSync,
  unlinkSync,
  writeFileSync,
} from "fs";
import { homedir, tmpdir } from "os";
import { join } from "path";
import type { EngineContext, FileSystem, HttpClient, PathConfig, TokenProvider } from "./interfaces";
import { createConsoleLogger } from "./logger";

/**
 * `writeFileSync` only applies `mode` when it creates the file, so an explicit
 * chmod follows to cover overwrites.
 */
function applyMode(path: string, mode: number | undefined): void {
  if (mode !== undefined) {
    chmodSync(path, mode);
  }
}

export function createNodeFileSystem(): FileSystem {
  return {
    readFile: (path) => readFileSync(path, "utf-8"),
    readFileBinary: (path) => readFileSync(path),
    writeFile(path, content, options = {}) {
      writeFileSync(path, content, { encoding: "utf-8", mode: options.mode });
      applyMode(path, options.mode);
    },
    writeFileBinary(path, content, options = {}) {
      writeFileSync(path, content, { mode: options.mode });
      applyMode(path, options.mode);
    },
    appendFileBinary: (path, content) => appendFileSync(path, content),
    exists: (path) => existsSync(path),
    mkdir(path, options = {}) {
      mkdirSync(path, { recursive: options.recursive, mode: options.mode });
    },
    readdir: (path) => readdirSync(path),
    lstat(path) {
      const stats = lstatSync(path);
      return {
        isDirectory: stats.isDirectory(),
        isFile: stats.isFile(),
        isSymbolicLink: stats.isSymbolicLink(),
        size: stats.size,
        mode: stats.mode & 0o7777,
      };
    },
    unlink: (path) => unlinkSync(path),
    rmdir(path, options = {}) {
      rmSync(path, { recursive: options.recursive, force: true });
    },
  };
}

export function createFetchHttpClient(): HttpClient {
  return {
    fetch: (url, options) => fetch(url, options),
  };
}

/**
 * Tokens from the environment.
 *
 * OCIBUNDLE_REGISTRY_TOKEN_<HOST> wins over OCIBUNDLE_REGISTRY_TOKEN, where HOST
 * is upper-cased with every non-alphanumeric replaced by "_"
 * (ghcr.io → OCIBUNDLE_REGISTRY_TOKEN_GHCR_IO).
 */
export function createEnvTokenProvider(env: NodeJS.ProcessEnv = process.env): TokenProvider {
  return {
    getRegistryToken(host: string): string | undefined {
      const suffix = host.toUpperCase().replace(/[^A-Z0-9]/g, "_");
      return env[`OCIBUNDLE_REGISTRY_TOKEN_${suffix}`] || env.OCIBUNDLE_REGISTRY_TOKEN || undefined;
    },
  };
}

export function defaultPathConfig(): PathConfig {
  return {
    configFile: join(homedir(), ".ocibundle", "config.yaml"),
    tempDir: tmpdir(),
  };
}

export function createNodeContext(overrides: Partial<EngineContext> = {}): EngineContext {
  return {
    fs: createNodeFileSystem(),
    http: createFetchHttpClient(),
    logger: createConsoleLogger(),
    tokens: createEnvTokenProvider(),
    paths: defaultPathConfig(),
    ...overrides,
  };
}
