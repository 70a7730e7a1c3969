export {
  parseReference,
  parseDigestReference,
  isDigestReference,
  contextName,
  referenceIdentifier,
  formatReference,
  imageWithRepository,
} from "./reference";
export type { ImageReference, DigestReference, ReferenceValidation } from "./reference.types";
