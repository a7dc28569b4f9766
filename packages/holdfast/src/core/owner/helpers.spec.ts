/**
 * Contract: owner liveness -- explicit handles and the isDestroyed() contract.
 *
 * Sections:
 *   1. createOwner / OwnerHandle
 *   2. isOwnerLive
 */
import { describe, expect, it } from "vitest";
import { OwnerHandle } from "./handle";
import { createOwner, isOwnerLive } from "./helpers";

describe("owner helpers", () => {
    describe("createOwner / OwnerHandle", () => {
        it("returns a live handle with the given label", () => {
            const owner = createOwner("hud");
            expect(owner).toBeInstanceOf(OwnerHandle);
            expect(owner.label).toBe("hud");
            expect(owner.isDestroyed()).toBe(false);
        });

        it("defaults the label to 'owner'", () => {
            expect(createOwner().label).toBe("owner");
        });

        it("destroy() is idempotent", () => {
            const owner = createOwner();
            owner.destroy();
            owner.destroy();
            expect(owner.isDestroyed()).toBe(true);
        });
    });

    describe("isOwnerLive", () => {
        it("plain objects are live", () => {
            expect(isOwnerLive({})).toBe(true);
        });

        it("a destroyed handle is not live", () => {
            const owner = createOwner();
            owner.destroy();
            expect(isOwnerLive(owner)).toBe(false);
        });

        it("honours any object with an isDestroyed() method", () => {
            let destroyed = false;
            const view = { isDestroyed: () => destroyed };
            expect(isOwnerLive(view)).toBe(true);
            destroyed = true;
            expect(isOwnerLive(view)).toBe(false);
        });

        it("ignores a non-function isDestroyed property", () => {
            expect(isOwnerLive({ isDestroyed: true })).toBe(true);
        });

        it("an owner whose isDestroyed() throws is not live", () => {
            const disposed = {
                isDestroyed(): boolean {
                    throw new Error("disposed");
                },
            };
            expect(isOwnerLive(disposed)).toBe(false);
        });
    });
});
