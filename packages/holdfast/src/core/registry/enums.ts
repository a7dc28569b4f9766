export enum WeakFailurePolicy {
    /** A weak listener that throws gets its owner removed. */
    DROP_OWNER = "drop-owner",
    /** The failure is still caught and reported, but the owner stays subscribed. */
    KEEP_OWNER = "keep-owner",
}
