import type { ComponentType, ComponentValue, EventType, ResourceType } from "./types";

function assertName(kind: string, name: string): void {
    if (!name || name.trim().length === 0) throw new Error(`${kind}: name is required`);
}

/**
 * Creates a component key. Identity is by object, not by name: two keys
 * created with the same name address different side tables.
 */
export function createComponent<T>(name: string): ComponentType<T> {
    assertName("createComponent", name);
    return { kind: "component", name };
}

/** Creates an event channel key. Register it on a world before sending. */
export function createEvent<T = void>(name: string): EventType<T> {
    assertName("createEvent", name);
    return { kind: "event", name };
}

export function createResource<T>(name: string): ResourceType<T> {
    assertName("createResource", name);
    return { kind: "resource", name };
}

/** Pairs a component key with a value for `World.spawn()`. */
export function component<T>(type: ComponentType<T>, value: T): ComponentValue<T> {
    return { type, value };
}
