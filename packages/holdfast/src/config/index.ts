export { DEFAULT_REGISTRY_NAME, defineRegistry } from "./define-registry";
export type { DefineRegistryInput, RegistryDefinition } from "./types";
