import { describe, test, expect } from "vitest";
import { z } from "zod";
import { safeParseYaml } from "./friendly-errors";

const Schema = z.object({ name: z.string(), replicas: z.number().int() });

describe("safeParseYaml", () => {
  test("returns validated data", () => {
    expect(safeParseYaml("name: api\nreplicas: 2\n", Schema)).toEqual({
      success: true,
      data: { name: "api", replicas: 2 },
    });
  });

  test("lists validation issues with their paths", () => {
    const result = safeParseYaml("name: api\nreplicas: two\n", Schema, "app.yml");

    expect(result).toEqual({
      success: false,
      error: {
        type: "validation",
        message: "Invalid document in app.yml",
        details: ["replicas: Expected number, received string"],
      },
    });
  });

  test("reports YAML syntax errors on one line", () => {
    const result = safeParseYaml("name: [api", Schema, "app.yml");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.type).toBe("yaml");
      expect(result.error.message).toBe("Invalid YAML syntax in app.yml");
      expect(result.error.details).toHaveLength(1);
      expect(result.error.details[0]).not.toContain("\n");
    }
  });

  test("omits the file context when no path is given", () => {
    const result = safeParseYaml("name: 1\nreplicas: 1\n", Schema);

    expect(!result.success && result.error.message).toBe("Invalid document");
  });
});
