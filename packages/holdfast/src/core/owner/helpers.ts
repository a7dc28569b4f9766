import { OwnerHandle } from "./handle";
import type { Owner } from "./types";

export function createOwner(label?: string): OwnerHandle {
    return new OwnerHandle(label);
}

/**
 * `false` once the owner reports itself destroyed, or when asking throws.
 * Owners without `isDestroyed()` are live while reachable.
 */
export function isOwnerLive(owner: Owner): boolean {
    if (!("isDestroyed" in owner)) return true;
    const check = owner.isDestroyed;
    if (typeof check !== "function") return true;
    try {
        return check.call(owner) !== true;
    } catch {
        return false;
    }
}
