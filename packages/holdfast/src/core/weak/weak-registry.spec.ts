/**
 * Contract: WeakRegistry -- owner-bound listener associations.
 *
 * Sections:
 *   1. add (per-owner combination)
 *   2. remove (coarse, per owner)
 *   3. removeOwner
 *   4. cleanupDead / cleanupDeadAll
 *   5. discard
 */
import { describe, expect, it, vi } from "vitest";
import { SignatureMismatchError } from "../errors";
import { createOwner } from "../owner/helpers";
import { defineEvent } from "../signature/signature";
import { WeakRegistry } from "./weak-registry";

const tick = defineEvent<[number]>("tick", "number");
const tickText = defineEvent<[string]>("tick", "string");
const ready = defineEvent("ready");

describe("WeakRegistry", () => {
    describe("add (per-owner combination)", () => {
        it("combines listeners of the same owner in registration order", () => {
            const reg = new WeakRegistry();
            const owner = {};
            const calls: string[] = [];
            reg.add(tick, (n) => calls.push(`f${n}`), owner);
            reg.add(tick, (n) => calls.push(`g${n}`), owner);
            reg.owners("tick")?.get(owner)?.invoke(1);
            expect(calls).toEqual(["f1", "g1"]);
            expect(reg.ownerCount("tick")).toBe(1);
        });

        it("distinct owners get independent associations", () => {
            const reg = new WeakRegistry();
            const ownerA = {};
            const ownerB = {};
            reg.add(tick, vi.fn(), ownerA);
            reg.add(tick, vi.fn(), ownerB);
            expect(reg.ownerCount("tick")).toBe(2);
        });

        it("owners under one name may use different signatures", () => {
            const reg = new WeakRegistry();
            const ownerA = {};
            const ownerB = {};
            reg.add(tick, vi.fn(), ownerA);
            expect(() => reg.add(tickText, vi.fn(), ownerB)).not.toThrow();
        });

        it("one owner cannot combine two signatures under one name", () => {
            const reg = new WeakRegistry();
            const owner = {};
            reg.add(tick, vi.fn(), owner);
            expect(() => reg.add(tickText, vi.fn(), owner)).toThrow(SignatureMismatchError);
            expect(reg.owners("tick")?.get(owner)?.size).toBe(1);
        });
    });

    describe("remove (coarse, per owner)", () => {
        it("removes all of the owner's listeners for the name", () => {
            const reg = new WeakRegistry();
            const owner = {};
            reg.add(tick, vi.fn(), owner);
            reg.add(tick, vi.fn(), owner);
            expect(reg.remove("tick", owner)).toBe(true);
            expect(reg.has("tick")).toBe(false);
        });

        it("leaves other owners intact", () => {
            const reg = new WeakRegistry();
            const a = {};
            const b = {};
            const g = vi.fn();
            reg.add(tick, vi.fn(), a);
            reg.add(tick, g, b);
            reg.remove("tick", a);
            expect(reg.ownerCount("tick")).toBe(1);
            reg.owners("tick")?.get(b)?.invoke(9);
            expect(g).toHaveBeenCalledWith(9);
        });

        it("is a no-op for unknown names and owners", () => {
            const reg = new WeakRegistry();
            const ownerA = {};
            reg.add(tick, vi.fn(), ownerA);
            expect(reg.remove("nope", {})).toBe(false);
            expect(reg.remove("tick", {})).toBe(false);
            expect(reg.ownerCount("tick")).toBe(1);
        });
    });

    describe("removeOwner", () => {
        it("removes the owner from every name", () => {
            const reg = new WeakRegistry();
            const owner = {};
            const other = {};
            reg.add(tick, vi.fn(), owner);
            reg.add(ready, vi.fn(), owner);
            reg.add(ready, vi.fn(), other);
            expect(reg.removeOwner(owner)).toBe(2);
            expect(reg.names()).toEqual(["ready"]);
            expect(reg.ownerCount("ready")).toBe(1);
        });

        it("returns 0 for an owner with no listeners", () => {
            expect(new WeakRegistry().removeOwner({})).toBe(0);
        });
    });

    describe("cleanupDead / cleanupDeadAll", () => {
        it("drops destroyed owners and deletes emptied names", () => {
            const reg = new WeakRegistry();
            const owner = createOwner();
            reg.add(tick, vi.fn(), owner);
            owner.destroy();
            expect(reg.cleanupDead("tick")).toBe(1);
            expect(reg.has("tick")).toBe(false);
        });

        it("cleanupDeadAll sweeps every name", () => {
            const reg = new WeakRegistry();
            const gone = createOwner();
            const kept = createOwner();
            reg.add(tick, vi.fn(), gone);
            reg.add(ready, vi.fn(), gone);
            reg.add(ready, vi.fn(), kept);
            gone.destroy();
            expect(reg.cleanupDeadAll()).toBe(2);
            expect(reg.names()).toEqual(["ready"]);
            expect(reg.ownerCount("ready")).toBe(1);
        });

        it("repeated sweeps with nothing dead change nothing", () => {
            const reg = new WeakRegistry();
            const owner = createOwner();
            const fn = vi.fn();
            reg.add(tick, fn, owner);
            expect(reg.cleanupDeadAll()).toBe(0);
            expect(reg.cleanupDeadAll()).toBe(0);
            expect(reg.owners("tick")?.get(owner)?.listeners()).toEqual([fn]);
        });
    });

    describe("discard", () => {
        it("removes the given owners and any dead ones", () => {
            const reg = new WeakRegistry();
            const failing = {};
            const dead = createOwner();
            const kept = {};
            reg.add(tick, vi.fn(), failing);
            reg.add(tick, vi.fn(), dead);
            reg.add(tick, vi.fn(), kept);
            dead.destroy();
            expect(reg.discard("tick", [failing])).toBe(2);
            expect(reg.ownerCount("tick")).toBe(1);
            expect(reg.owners("tick")?.has(kept)).toBe(true);
        });

        it("leaves a table created after `from` was read untouched", () => {
            const reg = new WeakRegistry();
            const owner = {};
            const fresh = vi.fn();
            reg.add(tick, vi.fn(), owner);
            const stale = reg.owners("tick");
            reg.clear();
            reg.add(tick, fresh, owner);
            expect(reg.discard("tick", [owner], stale)).toBe(0);
            expect(reg.owners("tick")?.get(owner)?.listeners()).toEqual([fresh]);
        });

        it("returns 0 for an unknown name", () => {
            expect(new WeakRegistry().discard("nope", [{}])).toBe(0);
        });
    });
});
