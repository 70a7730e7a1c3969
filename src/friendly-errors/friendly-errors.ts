/**
 * Friendly Errors
 *
 * YAML parsing + Zod validation with human-readable errors.
 *
 * Every YAML document the engine reads (images.yml, bundle locks, the local
 * config) goes through `safeParseYaml` so failures read the same way.
 *
 * @example
 * ```ts
 * const result = safeParseYaml(content, ImagesLockSchema, ".bundle/images.yml");
 * if (!result.success) {
 *   throw new LockfileError(result.error.message, result.error.details);
 * }
 * ```
 */

import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodType, ZodTypeDef, ZodError } from "zod";

export type ParseErrorType = "yaml" | "validation";

export interface FriendlyError {
  type: ParseErrorType;
  message: string;
  details: string[];
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: FriendlyError };

function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
}

// First line only; the rest is a code frame
function formatYamlError(error: YAMLParseError): string {
  return error.message.split("\n")[0] ?? error.message;
}

/**
 * Parse YAML content and validate against a Zod schema.
 *
 * @param filepath - Used only for error context
 */
export function safeParseYaml<Output, Input = Output>(
  content: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
  filepath?: string
): ParseResult<Output> {
  const fileContext = filepath ? ` in ${filepath}` : "";

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    return {
      success: false,
      error: {
        type: "yaml",
        message: `Invalid YAML syntax${fileContext}`,
        details: [err instanceof YAMLParseError ? formatYamlError(err) : String(err)],
      },
    };
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    return {
      success: false,
      error: {
        type: "validation",
        message: `Invalid document${fileContext}`,
        details: formatZodIssues(result.error),
      },
    };
  }

  return { success: true, data: result.data };
}
