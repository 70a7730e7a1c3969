export { pull, pullWithContext } from "./pull";
export { resolveReferenceSource, intentFor, referenceFromSource } from "./source";
export type { ReferenceFlags, ReferenceSource, PullOptions, PullContext, PullResult } from "./pull.types";
