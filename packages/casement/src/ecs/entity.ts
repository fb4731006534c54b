import { type Entity, MAX_ENTITIES, MAX_GENERATION } from "./types";

export function createEntity(index: number, generation: number): Entity {
    return generation * MAX_ENTITIES + (index % MAX_ENTITIES);
}

export function getIndex(entity: Entity): number {
    return entity % MAX_ENTITIES;
}

export function getGeneration(entity: Entity): number {
    return Math.floor(entity / MAX_ENTITIES);
}

/** Debug form: `<index>v<generation>`. */
export function entityToString(entity: Entity): string {
    return `${getIndex(entity)}v${getGeneration(entity)}`;
}

/**
 * Slot arena for entity handles.
 *
 * Freed slots are recycled LIFO with their generation bumped, so handles to
 * the previous occupant stop resolving. A slot whose generation would pass
 * `maxGeneration` is retired instead of reused.
 */
export class EntityAllocator {
    private readonly maxGeneration: number;
    private readonly generations: number[] = [];
    private readonly alive: boolean[] = [];
    private readonly free: number[] = [];
    private _count = 0;

    constructor(options?: { maxGeneration?: number }) {
        this.maxGeneration = options?.maxGeneration ?? MAX_GENERATION;
    }

    get count(): number {
        return this._count;
    }

    allocate(): Entity {
        let index = this.free.pop();
        if (index === undefined) {
            index = this.generations.length;
            if (index >= MAX_ENTITIES) {
                throw new Error(`Entity limit reached: cannot allocate more than ${MAX_ENTITIES} entities`);
            }
            this.generations.push(0);
            this.alive.push(false);
        }

        this.alive[index] = true;
        this._count++;
        return createEntity(index, this.generations[index] ?? 0);
    }

    /** Returns false for stale or already freed handles. */
    release(entity: Entity): boolean {
        if (!this.isAlive(entity)) return false;

        const index = getIndex(entity);
        this.alive[index] = false;
        const next = (this.generations[index] ?? 0) + 1;
        this.generations[index] = next;
        if (next <= this.maxGeneration) {
            this.free.push(index);
        }
        this._count--;
        return true;
    }

    isAlive(entity: Entity): boolean {
        const index = getIndex(entity);
        return this.alive[index] === true && this.generations[index] === getGeneration(entity);
    }
}
