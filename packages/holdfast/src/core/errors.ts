import { formatSignature } from "./signature/signature";
import type { EventName, Signature } from "./signature/types";

/**
 * Base class for errors raised to the direct caller of a registry operation.
 */
export class HoldfastError extends Error {
    public override readonly name: string = "HoldfastError";

    constructor(message: string) {
        super(message);

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, new.target);
        }
    }
}

/** A listener's signature differs from the one already registered under its event name. */
export class SignatureMismatchError extends HoldfastError {
    public override readonly name: string = "SignatureMismatchError";

    constructor(
        readonly eventName: EventName,
        readonly expected: Signature,
        readonly received: Signature,
    ) {
        super(
            `Event "${eventName}" is registered with signature ${formatSignature(expected)}, got ${formatSignature(received)}`,
        );
    }
}

/** Remove was attempted on an event name with no strong listeners. */
export class UnknownEventError extends HoldfastError {
    public override readonly name: string = "UnknownEventError";

    constructor(readonly eventName: EventName) {
        super(`Cannot remove listener: event "${eventName}" has no listeners`);
    }
}
