import {
    createApp,
    createInputPlugin,
    createWindowPlugin,
    type Entity,
    entityToString,
    Keyboard,
    type LogEntry,
    type ReleaseSafetyToken,
    requestClose,
    spawnWindow,
} from "@casement/core";
import type { Scenario, ScenarioLogLine, ScenarioResult, ScenarioRunOptions } from "./types";

/** Surface stand-in that turns safe on a fixed tick of the app it belongs to. */
export class ScriptedToken implements ReleaseSafetyToken {
    private readonly releaseAtTick: number;
    private readonly clock: () => number;

    constructor(releaseAtTick: number, clock: () => number) {
        this.releaseAtTick = releaseAtTick;
        this.clock = clock;
    }

    isSafeToCloseWindow(): boolean {
        return this.clock() >= this.releaseAtTick;
    }
}

/**
 * Runs a scenario on a fresh app, tick by tick, until it exits or reaches
 * `maxTicks`. Steps for tick N are applied right before tick N runs.
 */
export function runScenario(scenario: Scenario, options?: ScenarioRunOptions): ScenarioResult {
    const log: ScenarioLogLine[] = [];
    const names = new Map<string, string>();
    let tick = 0;

    const app = createApp({
        tickIntervalMs: 0,
        logger: { console: false, handlers: [(entry) => log.push(toLine(entry, tick, names))] },
    });

    const windowPlugin = createWindowPlugin({
        primaryWindow: null,
        exitCondition: scenario.plugin.exitCondition,
        closeWhenRequested: scenario.plugin.closeWhenRequested,
        closeOnKey: scenario.plugin.closeOnKey === undefined ? undefined : { key: scenario.plugin.closeOnKey },
        purgeVanishedPending: scenario.plugin.purgeVanishedPending,
    });
    app.addPlugin(createInputPlugin()).addPlugin(windowPlugin);
    app.start();

    const clock = () => app.tickCount;
    const handles = new Map<string, Entity>();
    for (const window of scenario.windows) {
        const entity = spawnWindow(
            app.world,
            { title: window.title ?? window.name, focused: window.focused },
            { primary: window.primary, token: new ScriptedToken(window.releaseAtTick ?? 0, clock) },
        );
        handles.set(window.name, entity);
        names.set(entityToString(entity), window.name);
    }

    const keyboard = app.world.resource(Keyboard);
    const maxTicks = options?.maxTicks ?? scenario.maxTicks;

    while (app.tickCount < maxTicks) {
        tick = app.tickCount + 1;
        for (const step of scenario.steps) {
            if (step.tick !== tick) continue;
            for (const name of step.close ?? []) {
                const entity = handles.get(name);
                if (entity !== undefined) requestClose(app.world, entity);
            }
            for (const key of step.release ?? []) keyboard.release(key);
            for (const key of step.press ?? []) keyboard.press(key);
        }
        if (!app.tick()) break;
    }

    const namesWhere = (predicate: (entity: Entity) => boolean) =>
        scenario.windows
            .filter((window) => {
                const entity = handles.get(window.name);
                return entity !== undefined && predicate(entity);
            })
            .map((window) => window.name);

    return {
        name: scenario.name,
        ticks: app.tickCount,
        exitTick: app.exitTick,
        remaining: namesWhere((entity) => app.world.isAlive(entity)),
        pending: namesWhere((entity) => windowPlugin.coordinator.isPending(entity)),
        log,
    };
}

function toLine(entry: LogEntry, tick: number, names: ReadonlyMap<string, string>): ScenarioLogLine {
    const line: ScenarioLogLine = { tick, level: entry.level, code: entry.code, message: entry.message };
    const handle = entry.details?.window;
    if (typeof handle === "string") {
        line.window = names.get(handle) ?? handle;
    }
    return line;
}
