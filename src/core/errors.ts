/**
 * Error taxonomy.
 *
 * Usage and structural errors are terminal. ArchiveError and RegistryError wrap
 * an underlying I/O failure in `cause`; retrying is left to the caller.
 */

/** Caller asked for something contradictory. Raised before any mutation. */
export class UsageError extends Error {
  override readonly name = "UsageError";
}

/** A filesystem operation failed while archiving or extracting. */
export class ArchiveError extends Error {
  override readonly name = "ArchiveError";

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** The walked tree holds something that is neither a directory nor a regular file. */
export class NonRegularFileError extends Error {
  override readonly name = "NonRegularFileError";

  constructor(readonly path: string) {
    super(`Expected file '${path}' to be a regular file`);
  }
}

/** A value built from already-validated inputs turned out to be invalid. */
export class InvariantError extends Error {
  override readonly name = "InvariantError";
}

export class InvalidReferenceError extends Error {
  override readonly name = "InvalidReferenceError";
}

export class LockfileError extends Error {
  override readonly name = "LockfileError";

  constructor(
    message: string,
    readonly details: string[] = []
  ) {
    super(details.length > 0 ? `${message}: ${details.join("; ")}` : message);
  }
}

export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(
    message: string,
    readonly details: string[] = []
  ) {
    super(details.length > 0 ? `${message}: ${details.join("; ")}` : message);
  }
}

export class RegistryError extends Error {
  override readonly name = "RegistryError";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : "Unknown error";
}
