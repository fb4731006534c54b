import type { LogHandler, LogLevel } from "../core/logger/types";
import type { App } from "./app";

export type PluginId = string;

/** Unit of app configuration: adds systems, resources, events and entities at start. */
export interface Plugin {
    readonly id: PluginId;
    /** Plugins whose `build()` must run first. */
    readonly dependencies?: readonly PluginId[];
    build(app: App): void;
}

export type AppConfig = {
    plugins?: Plugin[];
    /** Pause between ticks in `run()`. Defaults to 16ms. */
    tickIntervalMs?: number;
    logger?: {
        handlers?: LogHandler[];
        level?: LogLevel;
        /** Attach the colorized console handler. Defaults to true. */
        console?: boolean;
    };
};

export type AppRunOptions = {
    /** Stop after this many ticks even if no exit signal arrived. */
    maxTicks?: number;
    /** Checked between ticks. */
    signal?: AbortSignal;
};

export type AppRunResult = {
    /** Ticks run since the app started. */
    ticks: number;
    /** True when the app stopped because of an exit signal or `stop()`. */
    exited: boolean;
    /** Tick on which the exit signal was read, if any. */
    exitTick: number | null;
};
