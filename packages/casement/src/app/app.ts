import { delay } from "es-toolkit";
import { createConsoleHandler } from "../core/logger/console-handler";
import { Logger } from "../core/logger/logger";
import { StateMachine } from "../core/state-machine/state-machine";
import { World } from "../ecs/world";
import { defineSystem } from "../schedule/helpers";
import { Schedule } from "../schedule/schedule";
import type { SystemConfig, SystemId } from "../schedule/types";
import { AppState } from "./enums";
import { AppExit } from "./events";
import type { AppConfig, AppRunOptions, AppRunResult, Plugin, PluginId } from "./types";

const APP_TRANSITIONS: Record<AppState, AppState[]> = {
    [AppState.CREATED]: [AppState.RUNNING, AppState.FAILED],
    [AppState.RUNNING]: [AppState.EXITING, AppState.FAILED],
    [AppState.EXITING]: [AppState.STOPPED],
    [AppState.STOPPED]: [],
    [AppState.FAILED]: [],
};

const DEFAULT_TICK_INTERVAL_MS = 16;

/**
 * App — host loop around a {@link World} and a {@link Schedule}.
 *
 * One `tick()` runs every system once, applies deferred commands at each
 * stage boundary, reads the exit channel and then clears every event channel
 * so no event outlives the tick it was read in.
 */
export class App {
    readonly state: StateMachine<AppState>;
    readonly logger: Logger;
    readonly world: World;
    private readonly schedule = new Schedule();
    private readonly plugins = new Map<PluginId, Plugin>();
    private readonly tickIntervalMs: number;
    private _tick = 0;
    private _exitTick: number | null = null;

    constructor(config?: AppConfig) {
        const interval = config?.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
        if (!Number.isFinite(interval) || interval < 0) {
            throw new Error(`tickIntervalMs must be a non-negative number, got ${interval}`);
        }
        this.tickIntervalMs = interval;

        this.state = new StateMachine<AppState>({
            transitions: APP_TRANSITIONS,
            initial: AppState.CREATED,
            name: "App",
        });

        this.logger = new Logger({ level: config?.logger?.level });
        if (config?.logger?.console !== false) {
            this.logger.addHandler(createConsoleHandler());
        }
        for (const handler of config?.logger?.handlers ?? []) {
            this.logger.addHandler(handler);
        }

        this.state.onTransition((from, to) => {
            this.logger.debug("app", `${from} → ${to}`, { tick: this._tick });
        });

        this.world = new World();
        this.world.registerEvent(AppExit);

        for (const plugin of config?.plugins ?? []) {
            this.addPlugin(plugin);
        }
    }

    get tickCount(): number {
        return this._tick;
    }

    get exitTick(): number | null {
        return this._exitTick;
    }

    // ── Configuration ────────────────────────────────────────────────

    /** Register a plugin. Duplicate ids are logged and skipped. */
    addPlugin(plugin: Plugin): this {
        this.state.assertState(AppState.CREATED);
        if (this.plugins.has(plugin.id)) {
            this.logger.warn("app", `Plugin "${plugin.id}" is already registered. Skipping.`);
            return this;
        }
        this.plugins.set(plugin.id, plugin);
        return this;
    }

    hasPlugin(id: PluginId): boolean {
        return this.plugins.has(id);
    }

    addSystem(config: SystemConfig): this {
        this.state.assertState(AppState.CREATED, AppState.RUNNING);
        this.schedule.add(defineSystem(config));
        return this;
    }

    /** System ids in execution order. */
    systems(): SystemId[] {
        return this.schedule.list();
    }

    // ── Lifecycle ────────────────────────────────────────────────────

    /** Builds plugins in dependency order and enters `running`. */
    start(): void {
        this.state.assertState(AppState.CREATED);
        try {
            for (const id of this.reorderPlugins()) {
                this.plugins.get(id)?.build(this);
                this.logger.debug("app", `plugin "${id}" built`);
            }
            // Resolve system order now so bad `after` wiring fails at start, not mid-tick.
            this.schedule.list();
        } catch (err) {
            this.logger.error("app", "start failed", {
                error: err instanceof Error ? err.message : String(err),
            });
            this.state.transition(AppState.FAILED);
            throw err;
        }
        this.state.transition(AppState.RUNNING);
    }

    /**
     * Runs one tick. Returns false once the app has stopped.
     * A system error moves the app to `failed` and is re-thrown.
     */
    tick(): boolean {
        this.state.assertState(AppState.RUNNING);
        const tick = ++this._tick;

        try {
            this.schedule.run(this.world, this.logger, tick);
        } catch (err) {
            this.state.transition(AppState.FAILED);
            throw err;
        }

        const exits = this.world.events(AppExit).drain();
        const dropped = this.world.clearEvents();
        if (Object.keys(dropped).length > 0) {
            this.logger.debug("app", "dropped unread events", { tick, ...dropped });
        }

        if (exits.length > 0) {
            this._exitTick = tick;
            this.logger.debug("app", "exit signal received", { tick, signals: exits.length });
            this.shutdown();
            return false;
        }
        return true;
    }

    /** Ticks until an exit signal, `maxTicks`, or an aborted signal. Starts the app if needed. */
    async run(options?: AppRunOptions): Promise<AppRunResult> {
        if (this.state.is(AppState.CREATED)) {
            this.start();
        }
        this.state.assertState(AppState.RUNNING);

        const maxTicks = options?.maxTicks;
        let ran = 0;
        while (this.state.is(AppState.RUNNING)) {
            if (options?.signal?.aborted) break;
            if (maxTicks !== undefined && ran >= maxTicks) break;

            this.tick();
            ran++;

            if (this.state.is(AppState.RUNNING)) {
                await delay(this.tickIntervalMs);
            }
        }

        return { ticks: this._tick, exited: this.state.is(AppState.STOPPED), exitTick: this._exitTick };
    }

    /** Stops a running app without an exit signal. */
    stop(): void {
        this.state.assertState(AppState.RUNNING);
        this.shutdown();
    }

    // ── Internal ─────────────────────────────────────────────────────

    private shutdown(): void {
        this.state.transition(AppState.EXITING);
        this.state.transition(AppState.STOPPED);
    }

    private reorderPlugins(): PluginId[] {
        const sorted: PluginId[] = [];
        const visited = new Set<PluginId>();
        const visiting = new Set<PluginId>();

        const visit = (id: PluginId) => {
            if (visiting.has(id)) {
                throw new Error(`Circular dependency detected: Plugin "${id}" depends on itself!`);
            }
            if (visited.has(id)) return;

            const plugin = this.plugins.get(id);
            if (!plugin) {
                throw new Error(`Missing dependency: Plugin "${id}" is not registered.`);
            }

            visiting.add(id);
            for (const dep of plugin.dependencies ?? []) {
                visit(dep);
            }
            visiting.delete(id);
            visited.add(id);
            sorted.push(id);
        };

        for (const id of this.plugins.keys()) {
            visit(id);
        }
        return sorted;
    }
}
