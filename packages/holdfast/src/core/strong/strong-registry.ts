import { Combination } from "../combination/combination";
import type { CombinationInstance, Listener } from "../combination/types";
import { SignatureMismatchError, UnknownEventError } from "../errors";
import { sameSignature } from "../signature/signature";
import type { EventDefinition, EventName, ListenerArgs } from "../signature/types";

/**
 * Event name → one combination of listeners sharing a single signature.
 *
 * A name's signature is fixed from its first listener until the name empties;
 * empty combinations are never kept.
 */
export class StrongRegistry {
    private readonly table = new Map<EventName, CombinationInstance>();

    /** Combine `listener` into the event's combination. Throws on a signature mismatch. */
    add<Args extends ListenerArgs>(event: EventDefinition<Args>, listener: Listener<Args>): void {
        const existing = this.table.get(event.name);
        if (!existing) {
            this.table.set(event.name, Combination.empty<Args>(event.signature).combine(listener));
            return;
        }
        if (!sameSignature(existing.signature, event.signature)) {
            throw new SignatureMismatchError(event.name, existing.signature, event.signature);
        }
        this.table.set(event.name, existing.combine(listener));
    }

    /**
     * Subtract one occurrence of `listener`, deleting the name once it empties.
     *
     * @throws UnknownEventError if the name has no listeners
     * @throws SignatureMismatchError if the name is registered with another signature
     */
    remove<Args extends ListenerArgs>(event: EventDefinition<Args>, listener: Listener<Args>): void {
        const existing = this.table.get(event.name);
        if (!existing) {
            throw new UnknownEventError(event.name);
        }
        if (!sameSignature(existing.signature, event.signature)) {
            throw new SignatureMismatchError(event.name, existing.signature, event.signature);
        }
        const next = existing.subtract(listener);
        if (next.isEmpty) {
            this.table.delete(event.name);
        } else {
            this.table.set(event.name, next);
        }
    }

    get(name: EventName): CombinationInstance | undefined {
        return this.table.get(name);
    }

    has(name: EventName): boolean {
        return this.table.has(name);
    }

    names(): EventName[] {
        return Array.from(this.table.keys());
    }

    clear(): void {
        this.table.clear();
    }
}
