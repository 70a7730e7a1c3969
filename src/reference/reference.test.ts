import { describe, test, expect } from "vitest";
import {
  parseReference,
  parseDigestReference,
  contextName,
  formatReference,
  referenceIdentifier,
  imageWithRepository,
} from "./reference";
import { InvalidReferenceError } from "#/core";

const DIGEST = `sha256:${"0123456789abcdef".repeat(4)}`;

describe("parseReference", () => {
  test("defaults registry, library namespace and tag", () => {
    expect(parseReference("nginx")).toEqual({
      registry: "index.docker.io",
      repository: "library/nginx",
      tag: "latest",
      digest: undefined,
    });
  });

  test("normalizes docker.io to index.docker.io", () => {
    const result = parseReference("docker.io/acme/app:v1");

    expect(result.registry).toBe("index.docker.io");
    expect(result.repository).toBe("acme/app");
    expect(result.tag).toBe("v1");
  });

  test("keeps registry port and does not read it as a tag", () => {
    const result = parseReference("localhost:5000/team/app");

    expect(result.registry).toBe("localhost:5000");
    expect(result.repository).toBe("team/app");
    expect(result.tag).toBe("latest");
  });

  test("parses digest references", () => {
    const result = parseReference(`ghcr.io/acme/app@${DIGEST}`);

    expect(result.registry).toBe("ghcr.io");
    expect(result.repository).toBe("acme/app");
    expect(result.digest).toBe(DIGEST);
    expect(result.tag).toBeUndefined();
  });

  test("keeps both tag and digest", () => {
    const result = parseReference(`ghcr.io/acme/app:v2@${DIGEST}`);

    expect(result.tag).toBe("v2");
    expect(result.digest).toBe(DIGEST);
  });

  test("strict validation requires a tag or digest", () => {
    expect(() => parseReference("ghcr.io/acme/app", "strict")).toThrow(/Expected an explicit tag or digest/);
    expect(parseReference("ghcr.io/acme/app:v1", "strict").tag).toBe("v1");
  });

  describe("invalid formats", () => {
    test.each([
      ["", "empty string"],
      ["ghcr.io/Acme/app", "uppercase repository"],
      ["ghcr.io/acme/app@sha256:abc", "short digest"],
      ["ghcr.io/acme/app:-bad", "tag starting with a dash"],
      ["ghcr.io//app", "empty component"],
    ])("throws on %s (%s)", (input) => {
      expect(() => parseReference(input)).toThrow(InvalidReferenceError);
    });
  });
});

describe("parseDigestReference", () => {
  test("accepts digest references", () => {
    expect(parseDigestReference(`ghcr.io/acme/app@${DIGEST}`).digest).toBe(DIGEST);
  });

  test("rejects tag references", () => {
    expect(() => parseDigestReference("ghcr.io/acme/app:v1")).toThrow(/Expected a digest reference/);
  });
});

describe("formatting", () => {
  test("contextName drops tag and digest", () => {
    expect(contextName(parseReference(`ghcr.io/acme/app:v1@${DIGEST}`))).toBe("ghcr.io/acme/app");
  });

  test("formatReference round-trips", () => {
    expect(formatReference(parseReference("ghcr.io/acme/app:v1"))).toBe("ghcr.io/acme/app:v1");
    expect(formatReference(parseReference("nginx"))).toBe("index.docker.io/library/nginx:latest");
  });

  test("referenceIdentifier prefers digest", () => {
    expect(referenceIdentifier(parseReference(`ghcr.io/acme/app:v1@${DIGEST}`))).toBe(DIGEST);
    expect(referenceIdentifier(parseReference("ghcr.io/acme/app:v1"))).toBe("v1");
  });
});

describe("imageWithRepository", () => {
  test("replaces repository and keeps digest", () => {
    expect(imageWithRepository(`docker.io/acme/app@${DIGEST}`, "ghcr.io/acme/bundle")).toBe(
      `ghcr.io/acme/bundle@${DIGEST}`
    );
  });

  test("throws for tag references", () => {
    expect(() => imageWithRepository("docker.io/acme/app:v1", "ghcr.io/acme/bundle")).toThrow(
      InvalidReferenceError
    );
  });
});
