import { isOwnerLive } from "./helpers";
import type { Owner } from "./types";

type Slot<V> = {
    ref: WeakRef<Owner>;
    value: V;
};

/**
 * Owner-keyed table that never keeps an owner alive.
 *
 * Values live in a `WeakMap` keyed by the owner, so a value closing over its
 * own owner does not pin it. A set of `WeakRef`s makes the table iterable;
 * identities whose owner was collected are dropped by the finalizer or by
 * {@link OwnerTable.sweep}, whichever runs first.
 */
export class OwnerTable<V> {
    private readonly slots = new WeakMap<Owner, Slot<V>>();
    private readonly refs = new Set<WeakRef<Owner>>();
    private readonly finalizer = new FinalizationRegistry<WeakRef<Owner>>((ref) => {
        this.refs.delete(ref);
    });

    get(owner: Owner): V | undefined {
        return this.slot(owner)?.value;
    }

    has(owner: Owner): boolean {
        return this.slot(owner) !== undefined;
    }

    /** Existing value for `owner` (by identity), else `create()` inserted and returned. */
    getOrCreate(owner: Owner, create: () => V): V {
        const slot = this.slot(owner);
        if (slot) return slot.value;
        const value = create();
        this.set(owner, value);
        return value;
    }

    /** Replace the value for `owner` as a whole. */
    set(owner: Owner, value: V): void {
        const slot = this.slot(owner);
        if (slot) {
            slot.value = value;
            return;
        }
        const ref = new WeakRef(owner);
        this.slots.set(owner, { ref, value });
        this.refs.add(ref);
        this.finalizer.register(owner, ref, ref);
    }

    /** Delete the entry for `owner`. Returns `false` if there was none. */
    remove(owner: Owner): boolean {
        const slot = this.slots.get(owner);
        if (!slot) return false;
        this.slots.delete(owner);
        this.refs.delete(slot.ref);
        this.finalizer.unregister(slot.ref);
        return true;
    }

    /**
     * Live `[owner, value]` pairs.
     *
     * Identities are snapshotted when iteration starts. Entries removed before
     * they are visited are skipped; entries added during iteration are not visited.
     */
    *liveEntries(): Generator<[Owner, V]> {
        const snapshot = Array.from(this.refs);
        for (const ref of snapshot) {
            if (!this.refs.has(ref)) continue;
            const owner = ref.deref();
            if (owner === undefined || !isOwnerLive(owner)) continue;
            const slot = this.slots.get(owner);
            if (!slot || slot.ref !== ref) continue;
            yield [owner, slot.value];
        }
    }

    /** Drop every entry whose owner is collected or destroyed. Returns how many were dropped. */
    sweep(): number {
        let dropped = 0;
        for (const ref of Array.from(this.refs)) {
            const owner = ref.deref();
            if (owner === undefined) {
                this.refs.delete(ref);
                this.finalizer.unregister(ref);
                dropped++;
            } else if (!isOwnerLive(owner)) {
                this.remove(owner);
                dropped++;
            }
        }
        return dropped;
    }

    liveCount(): number {
        let count = 0;
        for (const _ of this.liveEntries()) count++;
        return count;
    }

    isEmpty(): boolean {
        for (const _ of this.liveEntries()) return false;
        return true;
    }

    clear(): void {
        for (const ref of this.refs) {
            const owner = ref.deref();
            if (owner !== undefined) this.slots.delete(owner);
            this.finalizer.unregister(ref);
        }
        this.refs.clear();
    }

    /** Slot for `owner` if its identity is still tracked. */
    private slot(owner: Owner): Slot<V> | undefined {
        const slot = this.slots.get(owner);
        return slot && this.refs.has(slot.ref) ? slot : undefined;
    }
}
