import type { ListenerArgs, Signature } from "../signature/types";
import type { Listener } from "./types";

/**
 * Zero or more listeners of one signature, as an immutable value.
 *
 * `combine` and `subtract` return new instances, so a combination read once
 * before dispatch stays intact while listeners are added or removed mid-pass.
 */
export class Combination<Args extends ListenerArgs> {
    private constructor(
        readonly signature: Signature,
        private readonly _listeners: readonly Listener<Args>[],
    ) {}

    static empty<Args extends ListenerArgs>(signature: Signature): Combination<Args> {
        return new Combination<Args>(signature, []);
    }

    get size(): number {
        return this._listeners.length;
    }

    get isEmpty(): boolean {
        return this._listeners.length === 0;
    }

    /** New combination invoking every current listener, then `listener`. */
    combine(listener: Listener<Args>): Combination<Args> {
        return new Combination(this.signature, [...this._listeners, listener]);
    }

    /**
     * New combination without the last occurrence of `listener`.
     * Returns `this` when `listener` is not present.
     */
    subtract(listener: Listener<Args>): Combination<Args> {
        const index = this._listeners.lastIndexOf(listener);
        if (index === -1) return this;
        return new Combination(this.signature, [
            ...this._listeners.slice(0, index),
            ...this._listeners.slice(index + 1),
        ]);
    }

    /** Call every listener in registration order. A throwing listener stops the rest. */
    invoke(...args: Args): void {
        for (const listener of this._listeners) {
            listener(...args);
        }
    }

    listeners(): readonly Listener<Args>[] {
        return this._listeners;
    }
}
