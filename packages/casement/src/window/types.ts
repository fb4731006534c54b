import type { Entity } from "../ecs/types";
import type { KeyCode } from "../input/keyboard";

/** Per-window display state. The coordinator only reads `focused`. */
export interface WindowRecord {
    title: string;
    focused: boolean;
}

export interface WindowInit {
    title?: string;
    /** Defaults to true. */
    focused?: boolean;
}

/**
 * Capability owned by the surface/renderer side of a window.
 *
 * Polled every tick for every pending close, so it must be cheap and must
 * eventually return true once the surface is released, or the window never
 * closes through the safe path.
 */
export interface ReleaseSafetyToken {
    isSafeToCloseWindow(): boolean;
}

export type SurfaceTokenFactory = (window: Entity) => ReleaseSafetyToken;

export type WindowCloseRequest = {
    readonly window: Entity;
};

export type ExitCondition = "on-all-closed" | "on-primary-closed" | "dont-exit";

export type WindowPluginOptions = {
    /** Window spawned as primary when the plugin builds. `null` spawns none. Defaults to `{ title: "app" }`. */
    primaryWindow?: WindowInit | null;
    /** Defaults to `"on-all-closed"`. */
    exitCondition?: ExitCondition;
    /** Run the close request processor and pending retrier. Defaults to true. */
    closeWhenRequested?: boolean;
    /** Despawn focused windows when `key` is just pressed. Needs the input plugin. */
    closeOnKey?: { key: KeyCode };
    /**
     * Drop pending closes whose entity no longer exists. Defaults to true.
     * `false` keeps such entries forever, as a deferred close never resolves for a vanished window.
     */
    purgeVanishedPending?: boolean;
    /** Token attached to windows that have none. Defaults to a fresh {@link SurfaceToken}. */
    tokenFactory?: SurfaceTokenFactory;
};
