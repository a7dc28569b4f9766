import type { EventDefinition, EventName, ListenerArgs, ParamTypes, Signature } from "./types";

export const MAX_ARITY = 4;

/**
 * Creates a typed event definition.
 *
 * ```ts
 * const scoreChanged = defineEvent<[player: string, score: number]>("score", "string", "number");
 * ```
 */
export function defineEvent<Args extends ListenerArgs = []>(
    name: EventName,
    ...paramTypes: ParamTypes<Args>
): EventDefinition<Args> {
    if (!name || name.trim().length === 0) {
        throw new Error("[holdfast] defineEvent: name must be a non-empty string");
    }
    const params: string[] = [...paramTypes];
    if (params.length > MAX_ARITY) {
        throw new Error(`[holdfast] defineEvent: "${name}" declares ${params.length} parameters (max ${MAX_ARITY})`);
    }
    for (const [index, param] of params.entries()) {
        if (param.trim().length === 0) {
            throw new Error(`[holdfast] defineEvent: parameter ${index} of "${name}" has an empty type name`);
        }
    }

    return {
        name,
        signature: Object.freeze({ arity: params.length, params: Object.freeze(params) }),
        args() {
            throw new Error("phantom method, not callable");
        },
    };
}

export function sameSignature(a: Signature, b: Signature): boolean {
    if (a === b) return true;
    if (a.arity !== b.arity || a.params.length !== b.params.length) return false;
    return a.params.every((param, i) => param === b.params[i]);
}

/** `(number, string)`; `()` for zero arity. */
export function formatSignature(signature: Signature): string {
    return `(${signature.params.join(", ")})`;
}
