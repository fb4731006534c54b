import { EntityAllocator, entityToString } from "./entity";
import { Events } from "./events";
import type { ComponentType, ComponentValue, Entity, EventType, QueryFilter, ResourceType } from "./types";

/**
 * World — entity arena plus one side table per component type.
 *
 * Methods here mutate immediately. Systems only read through this API and
 * queue their writes on {@link Commands}; direct mutation is for hosts and
 * plugins between ticks.
 */
export class World {
    private readonly allocator = new EntityAllocator();
    private readonly tables = new Map<ComponentType<unknown>, Map<Entity, unknown>>();
    private readonly channels = new Map<EventType<unknown>, Events<unknown>>();
    private readonly resources = new Map<ResourceType<unknown>, unknown>();

    // ── Entities ─────────────────────────────────────────────────────

    get entityCount(): number {
        return this.allocator.count;
    }

    spawn(...components: ComponentValue<unknown>[]): Entity {
        const entity = this.allocator.allocate();
        for (const { type, value } of components) {
            this.table(type).set(entity, value);
        }
        return entity;
    }

    /** Removes the entity and all of its components. False if it was already gone. */
    despawn(entity: Entity): boolean {
        if (!this.allocator.release(entity)) return false;
        for (const table of this.tables.values()) {
            table.delete(entity);
        }
        return true;
    }

    isAlive(entity: Entity): boolean {
        return this.allocator.isAlive(entity);
    }

    // ── Components ───────────────────────────────────────────────────

    /** Adds or replaces a component. Throws for dead or stale handles. */
    insert<T>(entity: Entity, type: ComponentType<T>, value: T): void {
        if (!this.isAlive(entity)) {
            throw new Error(`Cannot insert "${type.name}": entity ${entityToString(entity)} does not exist`);
        }
        this.table(type).set(entity, value);
    }

    /** Removes a component and returns its value, if there was one. */
    remove<T>(entity: Entity, type: ComponentType<T>): T | undefined {
        const table = this.table(type);
        const value = table.get(entity);
        table.delete(entity);
        return value;
    }

    /** Component value, or undefined when the entity is gone or lacks it. */
    get<T>(entity: Entity, type: ComponentType<T>): T | undefined {
        return this.table(type).get(entity);
    }

    has(entity: Entity, type: ComponentType<unknown>): boolean {
        return this.tables.get(type)?.has(entity) ?? false;
    }

    // ── Queries ──────────────────────────────────────────────────────

    /** Snapshot of entities matching the filter, in insertion order of the first `with` component. */
    query(filter: QueryFilter): Entity[] {
        const [first, ...rest] = filter.with;
        if (!first) {
            throw new Error("Query must name at least one component in `with`");
        }
        const without = filter.without ?? [];
        const result: Entity[] = [];

        for (const entity of this.table(first).keys()) {
            if (rest.every((type) => this.has(entity, type)) && !without.some((type) => this.has(entity, type))) {
                result.push(entity);
            }
        }
        return result;
    }

    /** Entities carrying `type`, paired with the component value. */
    each<T>(type: ComponentType<T>): [Entity, T][] {
        return [...this.table(type).entries()];
    }

    isEmpty(filter: QueryFilter): boolean {
        return this.query(filter).length === 0;
    }

    // ── Events ───────────────────────────────────────────────────────

    /** Registers an event channel. Idempotent: returns the existing channel on repeat calls. */
    registerEvent<T>(type: EventType<T>): Events<T> {
        const existing = this.channels.get(type);
        // Channels are keyed by their event type object, so the payload type matches.
        if (existing) return existing as Events<T>;

        const channel = new Events<T>(type.name);
        this.channels.set(type, channel);
        return channel;
    }

    hasEvent(type: EventType<unknown>): boolean {
        return this.channels.has(type);
    }

    events<T>(type: EventType<T>): Events<T> {
        const channel = this.channels.get(type);
        if (!channel) {
            throw new Error(`Event "${type.name}" is not registered`);
        }
        return channel as Events<T>;
    }

    /** Empties every channel. Returns the number of unread events dropped per channel name. */
    clearEvents(): Record<string, number> {
        const dropped: Record<string, number> = {};
        for (const channel of this.channels.values()) {
            const count = channel.clear();
            if (count > 0) dropped[channel.name] = count;
        }
        return dropped;
    }

    // ── Resources ────────────────────────────────────────────────────

    insertResource<T>(type: ResourceType<T>, value: T): void {
        this.resources.set(type, value);
    }

    hasResource(type: ResourceType<unknown>): boolean {
        return this.resources.has(type);
    }

    getResource<T>(type: ResourceType<T>): T | undefined {
        if (!this.resources.has(type)) return undefined;
        // Resources are keyed by their type object, so the stored value is a T.
        return this.resources.get(type) as T;
    }

    resource<T>(type: ResourceType<T>): T {
        if (!this.resources.has(type)) {
            throw new Error(`Resource "${type.name}" is not present in the world`);
        }
        return this.resources.get(type) as T;
    }

    // ── Internal ─────────────────────────────────────────────────────

    private table<T>(type: ComponentType<T>): Map<Entity, T> {
        let table = this.tables.get(type);
        if (!table) {
            table = new Map<Entity, T>();
            this.tables.set(type, table);
        }
        // Tables are keyed by their component type object, so every value is a T.
        return table as Map<Entity, T>;
    }
}
