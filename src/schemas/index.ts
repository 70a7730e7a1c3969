import { z } from "zod";
import { DIGEST_REGEX, LOCK_API_VERSION } from "#/constants";

export const DigestSchema = z.string().regex(DIGEST_REGEX, {
  message: "Invalid digest. Must be sha256:<64 lowercase hex characters>",
});

// OCI content descriptor (config blob or layer)
export const OciDescriptorSchema = z.object({
  mediaType: z.string(),
  digest: DigestSchema,
  size: z.number().int().nonnegative(),
  annotations: z.record(z.string(), z.string()).optional(),
});

// OCI image manifest (v2). Docker v2 manifests share the same shape.
export const OciManifestSchema = z.object({
  schemaVersion: z.literal(2),
  mediaType: z.string(),
  config: OciDescriptorSchema,
  layers: z.array(OciDescriptorSchema),
  annotations: z.record(z.string(), z.string()).optional(),
});

// Image entry in images.yml. `image` is a digest reference (repo@sha256:...)
export const ImageDescSchema = z.object({
  image: z.string().min(1),
  tag: z.string().optional(), // original tag, informational
  name: z.string().optional(),
  metadata: z.unknown().optional(), // opaque, carried through rewrites
});
export type ImageDesc = z.infer<typeof ImageDescSchema>;

// Lock document shipped inside a bundle (.bundle/images.yml).
// passthrough keeps keys this version doesn't know about across a rewrite
export const ImagesLockSchema = z
  .object({
    apiVersion: z.literal(LOCK_API_VERSION),
    kind: z.literal("ImagesLock"),
    spec: z
      .object({
        images: z.array(ImageDescSchema).nullish().transform((images) => images ?? []),
      })
      .passthrough(),
  })
  .passthrough();
export type ImagesLock = z.infer<typeof ImagesLockSchema>;

// Lock written after pushing a bundle; points at the bundle by digest
export const BundleLockSchema = z.object({
  apiVersion: z.literal(LOCK_API_VERSION),
  kind: z.literal("BundleLock"),
  spec: z.object({
    image: z.object({
      image: z.string().min(1),
      tag: z.string().optional(),
    }),
  }),
});
export type BundleLock = z.infer<typeof BundleLockSchema>;

// Per-registry settings in the local config file
export const RegistryEntrySchema = z.object({
  token: z.string().optional(), // Can also be set via env vars
  insecure: z.boolean().default(false), // plain HTTP
});
export type RegistryEntry = z.infer<typeof RegistryEntrySchema>;

export const LocalConfigSchema = z.object({
  registries: z.record(z.string(), RegistryEntrySchema).default({}),
});
export type LocalConfig = z.infer<typeof LocalConfigSchema>;
