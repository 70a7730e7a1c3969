export type { ResolvedRegistry, LocalConfig, RegistryEntry } from "./registry.types";
export { getApiHost, resolveRegistry } from "./resolver";
export { loadLocalConfig } from "./config";
