import type { LogLevel } from "../core/logger/types";
import { WeakFailurePolicy } from "../core/registry/enums";
import type { DefineRegistryInput, RegistryDefinition } from "./types";

export const DEFAULT_REGISTRY_NAME = "holdfast";

const LOG_LEVELS: readonly string[] = ["debug", "warn", "error"] satisfies LogLevel[];
const POLICIES: readonly string[] = Object.values(WeakFailurePolicy);

export function defineRegistry(input: DefineRegistryInput = {}): RegistryDefinition {
    const name = input.name ?? DEFAULT_REGISTRY_NAME;
    if (name.trim().length === 0) {
        throw new Error("[holdfast] defineRegistry: name must be a non-empty string");
    }

    const level = input.logger?.level ?? "debug";
    if (!LOG_LEVELS.includes(level)) {
        throw new Error(`[holdfast] defineRegistry: unknown log level "${level}"`);
    }

    const weakFailurePolicy = input.weakFailurePolicy ?? WeakFailurePolicy.DROP_OWNER;
    if (!POLICIES.includes(weakFailurePolicy)) {
        throw new Error(
            `[holdfast] defineRegistry: weakFailurePolicy must be one of ${POLICIES.map((p) => `"${p}"`).join(", ")}`,
        );
    }

    if (input.onListenerFailure !== undefined && typeof input.onListenerFailure !== "function") {
        throw new Error("[holdfast] defineRegistry: onListenerFailure must be a function");
    }

    return {
        name,
        logger: {
            level,
            console: input.logger?.console ?? true,
            handlers: [...(input.logger?.handlers ?? [])],
        },
        weakFailurePolicy,
        onListenerFailure: input.onListenerFailure,
    };
}
