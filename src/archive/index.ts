export { walkTree, compareNames } from "./walker";
export {
  PackagedArtifact,
  collectTarEntries,
  createTarball,
  writeTarball,
  isExcluded,
  packageAsFileImage,
  packageAsFileBundle,
  type ArchiveContext,
  type PlannedTarEntry,
} from "./tar-image";
export {
  extractLayer,
  materializeImage,
  isGzip,
  assertOutputPathAllowed,
  prepareOutputDirectory,
  type MaterializeContext,
} from "./materializer";
export type {
  WalkAction,
  WalkedEntry,
  WalkVisitor,
  PackageOptions,
  ExtractedEntry,
} from "./archive.types";
