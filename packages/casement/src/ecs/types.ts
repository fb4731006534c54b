/**
 * Generation-checked entity handle.
 *
 * `entity % MAX_ENTITIES` is the arena slot and `entity / MAX_ENTITIES` the
 * slot's generation at allocation time. Generations only grow, so a handle
 * whose generation no longer matches its slot is stale and never resolves
 * again.
 */
export type Entity = number;

export const INDEX_BITS = 20;
export const MAX_ENTITIES = 1 << INDEX_BITS;
/** Highest generation a slot reaches while handles stay safe integers. The slot is retired after it. */
export const MAX_GENERATION = Math.floor(Number.MAX_SAFE_INTEGER / MAX_ENTITIES);

/** Key for a component side table. `T` is the stored value type. */
export interface ComponentType<T> {
    readonly kind: "component";
    readonly name: string;
    /** @internal Phantom type for value inference. */
    readonly __type?: T;
}

/** Key for a single-tick event channel. */
export interface EventType<T> {
    readonly kind: "event";
    readonly name: string;
    /** @internal Phantom type for payload inference. */
    readonly __type?: T;
}

/** Key for a world-global singleton value. */
export interface ResourceType<T> {
    readonly kind: "resource";
    readonly name: string;
    /** @internal Phantom type for value inference. */
    readonly __type?: T;
}

/** A component key paired with its value, as passed to `spawn()`. */
export interface ComponentValue<T> {
    readonly type: ComponentType<T>;
    readonly value: T;
}

export type QueryFilter = {
    /** Every listed component must be present. At least one is required. */
    with: readonly ComponentType<unknown>[];
    /** None of the listed components may be present. */
    without?: readonly ComponentType<unknown>[];
};
