/**
 * Contract: entity handles and the slot arena.
 *
 * Sections:
 *   1. Handle packing
 *   2. Allocation & release
 *   3. Slot reuse & stale handles
 */
import { describe, expect, it } from "vitest";
import { createEntity, EntityAllocator, entityToString, getGeneration, getIndex } from "./entity";
import { MAX_ENTITIES, MAX_GENERATION } from "./types";

describe("Entity handles", () => {
    // -- 1. Handle packing --
    describe("Handle packing", () => {
        it("packs index and generation and unpacks them back", () => {
            const entity = createEntity(5, 3);
            expect(getIndex(entity)).toBe(5);
            expect(getGeneration(entity)).toBe(3);
            expect(entityToString(entity)).toBe("5v3");
        });

        it("keeps generations far beyond 12 bits", () => {
            const entity = createEntity(1, 4097);
            expect(getIndex(entity)).toBe(1);
            expect(getGeneration(entity)).toBe(4097);
        });

        it("the last slot at the last generation is still a safe integer", () => {
            const entity = createEntity(MAX_ENTITIES - 1, MAX_GENERATION);
            expect(Number.isSafeInteger(entity)).toBe(true);
            expect(getIndex(entity)).toBe(MAX_ENTITIES - 1);
            expect(getGeneration(entity)).toBe(MAX_GENERATION);
        });

        it("different generations of the same slot are different handles", () => {
            expect(createEntity(7, 0)).not.toBe(createEntity(7, 1));
        });
    });
});

describe("EntityAllocator", () => {
    // -- 2. Allocation & release --
    describe("Allocation & release", () => {
        it("hands out fresh slots in order and counts live entities", () => {
            const arena = new EntityAllocator();
            const a = arena.allocate();
            const b = arena.allocate();
            expect(entityToString(a)).toBe("0v0");
            expect(entityToString(b)).toBe("1v0");
            expect(arena.count).toBe(2);
        });

        it("release() returns true once, then false", () => {
            const arena = new EntityAllocator();
            const a = arena.allocate();
            expect(arena.release(a)).toBe(true);
            expect(arena.release(a)).toBe(false);
            expect(arena.isAlive(a)).toBe(false);
            expect(arena.count).toBe(0);
        });
    });

    // -- 3. Slot reuse & stale handles --
    describe("Slot reuse & stale handles", () => {
        it("reuses a freed slot with the next generation", () => {
            const arena = new EntityAllocator();
            const old = arena.allocate();
            arena.release(old);
            const reused = arena.allocate();
            expect(entityToString(reused)).toBe("0v1");
            expect(arena.isAlive(reused)).toBe(true);
            expect(arena.isAlive(old)).toBe(false);
        });

        it("a stale handle cannot release the new occupant", () => {
            const arena = new EntityAllocator();
            const old = arena.allocate();
            arena.release(old);
            const reused = arena.allocate();
            expect(arena.release(old)).toBe(false);
            expect(arena.isAlive(reused)).toBe(true);
        });

        it("a slot churned past 4096 reuses never hands back an old handle", () => {
            const arena = new EntityAllocator();
            const first = arena.allocate();
            arena.release(first);
            for (let i = 0; i < 4096; i++) {
                arena.release(arena.allocate());
            }

            const current = arena.allocate();
            expect(entityToString(current)).toBe("0v4097");
            expect(current).not.toBe(first);
            expect(arena.isAlive(first)).toBe(false);
            expect(arena.release(first)).toBe(false);
            expect(arena.isAlive(current)).toBe(true);
        });

        it("retires a slot whose generation is exhausted", () => {
            const arena = new EntityAllocator({ maxGeneration: 2 });
            for (let i = 0; i < 3; i++) {
                arena.release(arena.allocate());
            }

            expect(entityToString(arena.allocate())).toBe("1v0");
            expect(arena.count).toBe(1);
        });

        it("never-allocated handles are not alive", () => {
            const arena = new EntityAllocator();
            expect(arena.isAlive(createEntity(3, 0))).toBe(false);
        });
    });
});
