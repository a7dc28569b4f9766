/** Any object may own weak listeners; it is referenced without being kept alive. */
export type Owner = object;

/**
 * Optional liveness contract. An owner exposing `isDestroyed()` is treated
 * as gone as soon as it returns `true`, without waiting for collection.
 */
export interface DestroyableOwner {
    isDestroyed(): boolean;
}
