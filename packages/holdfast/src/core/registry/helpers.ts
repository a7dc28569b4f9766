import { defineRegistry } from "../../config/define-registry";
import type { DefineRegistryInput } from "../../config/types";
import { EventRegistry } from "./registry";

export function createEventRegistry(config?: DefineRegistryInput): EventRegistry {
    return new EventRegistry(defineRegistry(config));
}
