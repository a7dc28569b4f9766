import type { DestroyableOwner } from "./types";

/**
 * Explicit owner whose end of life is observable without garbage collection.
 * `destroy()` is idempotent.
 */
export class OwnerHandle implements DestroyableOwner {
    private _destroyed = false;

    constructor(readonly label: string = "owner") {}

    isDestroyed(): boolean {
        return this._destroyed;
    }

    destroy(): void {
        this._destroyed = true;
    }
}
