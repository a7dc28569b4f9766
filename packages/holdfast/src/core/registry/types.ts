import type { Owner } from "../owner/types";
import type { EventName } from "../signature/types";

/** A weak listener threw during dispatch. Reported, never thrown to the trigger caller. */
export type ListenerFailure = {
    eventName: EventName;
    owner: Owner;
    error: unknown;
};

export type RegistryStats = {
    strongEvents: number;
    weakEvents: number;
    weakOwners: number;
};
