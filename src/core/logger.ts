import pc from "picocolors";
import type { Logger } from "./interfaces";

const ENTRY_LINE = /^(dir|file): /;

/**
 * Per-entry lines are dimmed so the notices between them stand out.
 */
export function createConsoleLogger(out: NodeJS.WritableStream = process.stdout): Logger {
  return {
    info(message: string): void {
      out.write(`${ENTRY_LINE.test(message) ? pc.dim(message) : message}\n`);
    },
  };
}
