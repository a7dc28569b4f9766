import { Combination } from "../combination/combination";
import type { CombinationInstance, Listener } from "../combination/types";
import { SignatureMismatchError } from "../errors";
import { OwnerTable } from "../owner/owner-table";
import type { Owner } from "../owner/types";
import { sameSignature } from "../signature/signature";
import type { EventDefinition, EventName, ListenerArgs } from "../signature/types";

/**
 * Event name → owner → combination, with owners held weakly.
 *
 * Each owner's combination is independent: owners under the same name may
 * use different signatures. Names whose owners are all gone are deleted.
 */
export class WeakRegistry {
    private readonly table = new Map<EventName, OwnerTable<CombinationInstance>>();

    /**
     * Combine `listener` into `owner`'s association for the event.
     *
     * @throws SignatureMismatchError if the owner already listens to this name with another signature
     */
    add<Args extends ListenerArgs>(event: EventDefinition<Args>, listener: Listener<Args>, owner: Owner): void {
        let owners = this.table.get(event.name);
        if (!owners) {
            owners = new OwnerTable();
            this.table.set(event.name, owners);
        }
        const existing = owners.getOrCreate(owner, () => Combination.empty<Args>(event.signature));
        if (!sameSignature(existing.signature, event.signature)) {
            throw new SignatureMismatchError(event.name, existing.signature, event.signature);
        }
        owners.set(owner, existing.combine(listener));
    }

    /** Remove every listener `owner` registered under `name`. No-op if there are none. */
    remove(name: EventName, owner: Owner): boolean {
        const owners = this.table.get(name);
        if (!owners) return false;
        const removed = owners.remove(owner);
        this.deleteIfEmpty(name, owners);
        return removed;
    }

    /** Remove `owner` from every name. Returns the number of names it was removed from. */
    removeOwner(owner: Owner): number {
        let count = 0;
        for (const [name, owners] of Array.from(this.table)) {
            if (owners.remove(owner)) count++;
            this.deleteIfEmpty(name, owners);
        }
        return count;
    }

    /**
     * Remove `defunct` owners from `name`, then drop owners that are gone.
     * Returns the number of associations dropped.
     *
     * Pass `from` to act on the table a dispatch pass read: if `name` was
     * cleared and subscribed again since, the new table is left alone.
     */
    discard(
        name: EventName,
        defunct: readonly Owner[],
        from: OwnerTable<CombinationInstance> | undefined = this.table.get(name),
    ): number {
        const owners = this.table.get(name);
        if (!owners || owners !== from) return 0;
        let dropped = 0;
        for (const owner of defunct) {
            if (owners.remove(owner)) dropped++;
        }
        dropped += owners.sweep();
        this.deleteIfEmpty(name, owners);
        return dropped;
    }

    /** Drop associations whose owner is gone under `name`. */
    cleanupDead(name: EventName): number {
        return this.discard(name, []);
    }

    cleanupDeadAll(): number {
        let dropped = 0;
        for (const name of Array.from(this.table.keys())) {
            dropped += this.cleanupDead(name);
        }
        return dropped;
    }

    owners(name: EventName): OwnerTable<CombinationInstance> | undefined {
        return this.table.get(name);
    }

    has(name: EventName): boolean {
        return this.table.has(name);
    }

    /** Live owners listening to `name`. */
    ownerCount(name: EventName): number {
        return this.table.get(name)?.liveCount() ?? 0;
    }

    names(): EventName[] {
        return Array.from(this.table.keys());
    }

    clear(): void {
        for (const owners of this.table.values()) {
            owners.clear();
        }
        this.table.clear();
    }

    private deleteIfEmpty(name: EventName, owners: OwnerTable<CombinationInstance>): void {
        if (this.table.get(name) === owners && owners.isEmpty()) {
            owners.clear();
            this.table.delete(name);
        }
    }
}
