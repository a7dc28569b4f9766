import type { ListenerArgs, Signature } from "../signature/types";

export type Listener<Args extends ListenerArgs> = (...args: Args) => void;

/** Any listener, whatever its arguments. Accepted by type-erased containers. */
export type AnyListener = (...args: never) => void;

/**
 * Type-erased combination interface for heterogeneous tables.
 *
 * Mirrors the public API of {@link Combination}. Interface methods are
 * bivariant, so any `Combination<Args>` is structurally assignable here;
 * callers compare `signature` before invoking.
 */
export interface CombinationInstance {
    readonly signature: Signature;
    readonly size: number;
    readonly isEmpty: boolean;
    combine(listener: AnyListener): CombinationInstance;
    subtract(listener: AnyListener): CombinationInstance;
    invoke(...args: ListenerArgs): void;
    listeners(): readonly AnyListener[];
}
