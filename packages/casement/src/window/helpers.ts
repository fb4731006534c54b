import { component } from "../ecs/helpers";
import type { ComponentValue, Entity } from "../ecs/types";
import type { World } from "../ecs/world";
import { PrimaryWindow, SafetyToken, Window } from "./components";
import { WindowCloseRequested } from "./events";
import type { ReleaseSafetyToken, WindowInit } from "./types";

export type SpawnWindowOptions = {
    primary?: boolean;
    /** Attach this token up front instead of waiting for the provisioner. */
    token?: ReleaseSafetyToken;
};

/** Spawns a window entity directly. For hosts and plugins, between ticks. */
export function spawnWindow(world: World, init?: WindowInit, options?: SpawnWindowOptions): Entity {
    const components: ComponentValue<unknown>[] = [
        component(Window, { title: init?.title ?? "app", focused: init?.focused ?? true }),
    ];
    if (options?.primary) {
        components.push(component(PrimaryWindow, true));
    }
    if (options?.token) {
        components.push(component(SafetyToken, options.token));
    }
    return world.spawn(...components);
}

/** Queues a close request for the next tick's processor. */
export function requestClose(world: World, window: Entity): void {
    world.events(WindowCloseRequested).send({ window });
}
