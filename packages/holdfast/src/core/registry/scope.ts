import type { Listener } from "../combination/types";
import type { Owner } from "../owner/types";
import type { EventDefinition, ListenerArgs } from "../signature/types";
import type { EventRegistry } from "./registry";

/**
 * Weak subscriptions bound to one owner.
 *
 * - `on(event, listener)` -> weak listener for `owner`; the returned function
 *   removes the owner's whole association for that event
 * - `dispose()` -> removes `owner` from every event
 */
export class OwnerScope {
    constructor(
        private readonly registry: EventRegistry,
        readonly owner: Owner,
    ) {}

    on<Args extends ListenerArgs>(event: EventDefinition<Args>, listener: Listener<Args>): () => void {
        this.registry.addWeakListener(event, listener, this.owner);
        return () => {
            this.registry.removeWeakListener(event, this.owner);
        };
    }

    dispose(): number {
        return this.registry.removeOwner(this.owner);
    }
}
