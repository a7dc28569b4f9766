import type { RegistryDefinition } from "../../config/types";
import type { Listener } from "../combination/types";
import { createConsoleHandler } from "../logger/console-handler";
import { Logger } from "../logger/logger";
import type { Owner } from "../owner/types";
import { sameSignature } from "../signature/signature";
import type { EventDefinition, EventInstance, EventName, ListenerArgs } from "../signature/types";
import { StrongRegistry } from "../strong/strong-registry";
import { WeakRegistry } from "../weak/weak-registry";
import { WeakFailurePolicy } from "./enums";
import { OwnerScope } from "./scope";
import type { ListenerFailure, RegistryStats } from "./types";

/**
 * Strong and weak listeners behind one synchronous `trigger`.
 *
 * Dispatch order: the strong combination (if its signature matches), then
 * each live weak owner in subscription order. Strong failures propagate to
 * the caller. Weak failures are caught: the owner is treated as defunct and
 * dropped after the pass (see {@link WeakFailurePolicy}).
 */
export class EventRegistry {
    readonly logger: Logger;
    private readonly strong = new StrongRegistry();
    private readonly weak = new WeakRegistry();

    constructor(private readonly definition: RegistryDefinition) {
        this.logger = new Logger({ level: definition.logger.level });

        if (definition.logger.console) {
            this.logger.addHandler(createConsoleHandler(definition.name));
        }
        for (const handler of definition.logger.handlers) {
            this.logger.addHandler(handler);
        }
    }

    get name(): string {
        return this.definition.name;
    }

    // ── Strong listeners ────────────────────────────────────────────────

    /** @throws SignatureMismatchError if `event.name` is registered with another signature */
    addListener<Args extends ListenerArgs>(event: EventDefinition<Args>, listener: Listener<Args>): void {
        this.strong.add(event, listener);
    }

    /**
     * Remove one occurrence of `listener`. Removing a listener that was never
     * added is a no-op as long as the event itself is known.
     *
     * @throws UnknownEventError if `event.name` has no strong listeners
     * @throws SignatureMismatchError if `event.name` is registered with another signature
     */
    removeListener<Args extends ListenerArgs>(event: EventDefinition<Args>, listener: Listener<Args>): void {
        this.strong.remove(event, listener);
    }

    // ── Weak listeners ──────────────────────────────────────────────────

    /** Subscribe `listener` for as long as `owner` is alive. */
    addWeakListener<Args extends ListenerArgs>(
        event: EventDefinition<Args>,
        listener: Listener<Args>,
        owner: Owner,
    ): void {
        this.weak.add(event, listener, owner);
    }

    /** Remove every listener `owner` registered under the event. */
    removeWeakListener(event: EventName | EventInstance, owner: Owner): boolean {
        return this.weak.remove(typeof event === "string" ? event : event.name, owner);
    }

    /** Remove `owner` from every event. Returns the number of events it listened to. */
    removeOwner(owner: Owner): number {
        return this.weak.removeOwner(owner);
    }

    /** Weak subscriptions bound to `owner`. */
    scope(owner: Owner): OwnerScope {
        return new OwnerScope(this, owner);
    }

    // ── Dispatch ────────────────────────────────────────────────────────

    trigger<Args extends ListenerArgs>(event: EventDefinition<Args>, ...args: Args): void {
        const strong = this.strong.get(event.name);
        if (strong && sameSignature(strong.signature, event.signature)) {
            strong.invoke(...args);
        }

        const owners = this.weak.owners(event.name);
        if (!owners) return;

        const defunct: Owner[] = [];
        for (const [owner, combination] of owners.liveEntries()) {
            if (!sameSignature(combination.signature, event.signature)) continue;
            try {
                combination.invoke(...args);
            } catch (error) {
                if (this.definition.weakFailurePolicy === WeakFailurePolicy.DROP_OWNER) {
                    defunct.push(owner);
                }
                this.reportFailure({ eventName: event.name, owner, error });
            }
        }

        const dropped = this.weak.discard(event.name, defunct, owners);
        if (dropped > 0) {
            this.logger.debug(this.name, `reaped ${dropped} weak listener owner(s)`, { event: event.name });
        }
    }

    // ── Maintenance ─────────────────────────────────────────────────────

    /** Drop weak associations whose owner is gone under one event. */
    cleanupDead(event: EventName | EventInstance): number {
        return this.weak.cleanupDead(typeof event === "string" ? event : event.name);
    }

    /** Drop weak associations whose owner is gone, across every event. */
    cleanupDeadAll(): number {
        return this.weak.cleanupDeadAll();
    }

    /** Remove every strong and weak listener. */
    clearAll(): void {
        this.strong.clear();
        this.weak.clear();
        this.logger.debug(this.name, "cleared all listeners");
    }

    // ── Inspection ──────────────────────────────────────────────────────

    hasListeners(event: EventName | EventInstance): boolean {
        const name = typeof event === "string" ? event : event.name;
        return this.strong.has(name) || this.weak.ownerCount(name) > 0;
    }

    stats(): RegistryStats {
        const weakEvents = this.weak.names();
        return {
            strongEvents: this.strong.names().length,
            weakEvents: weakEvents.length,
            weakOwners: weakEvents.reduce((sum, name) => sum + this.weak.ownerCount(name), 0),
        };
    }

    private reportFailure(failure: ListenerFailure): void {
        const action =
            this.definition.weakFailurePolicy === WeakFailurePolicy.DROP_OWNER ? "owner dropped" : "owner kept";
        this.logger.warn(this.name, `weak listener for "${failure.eventName}" failed; ${action}`, {
            event: failure.eventName,
            error: failure.error instanceof Error ? failure.error.message : String(failure.error),
        });
        this.definition.onListenerFailure?.(failure);
    }
}
