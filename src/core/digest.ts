import { createHash } from "crypto";

/**
 * Content digest in OCI form.
 *
 * @example sha256Digest(Buffer.from("{}")) → "sha256:44136fa355b3678a1146ad16f7e8649e94fb4fc21fe77e8310c060f61caaff8a"
 */
export function sha256Digest(data: Uint8Array): string {
  return `sha256:${createHash("sha256").update(data).digest("hex")}`;
}

export interface StreamDigest {
  update(chunk: Uint8Array): void;
  /** Digest and byte count of everything passed to `update` */
  finish(): { digest: string; size: number };
}

/**
 * Incremental form of sha256Digest, for content that is never held whole.
 */
export function createStreamDigest(): StreamDigest {
  const hash = createHash("sha256");
  let size = 0;

  return {
    update(chunk) {
      hash.update(chunk);
      size += chunk.length;
    },
    finish() {
      return { digest: `sha256:${hash.digest("hex")}`, size };
    },
  };
}
