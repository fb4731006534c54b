/**
 * Contract: window systems -- provisioner, key close, exit evaluators.
 *
 * Sections:
 *   1. provisionSurfaceTokens
 *   2. closeOnKey
 *   3. exitOnAllClosed
 *   4. exitOnPrimaryClosed
 */
import { describe, expect, it } from "vitest";
import { AppExit } from "../app/events";
import { Logger } from "../core/logger/logger";
import type { LogEntry } from "../core/logger/types";
import { Commands } from "../ecs/commands";
import type { Entity } from "../ecs/types";
import { World } from "../ecs/world";
import { ButtonInput } from "../input/button-input";
import { type KeyCode, Keyboard } from "../input/keyboard";
import { Stage } from "../schedule/enums";
import type { SystemConfig } from "../schedule/types";
import { SafetyToken, Window } from "./components";
import { spawnWindow } from "./helpers";
import { SurfaceToken } from "./surface-token";
import { closeOnKey, exitOnAllClosed, exitOnPrimaryClosed, provisionSurfaceTokens, WindowSystem } from "./systems";
import type { ReleaseSafetyToken } from "./types";

function harness() {
    const world = new World();
    world.registerEvent(AppExit);
    const entries: LogEntry[] = [];
    const logger = new Logger();
    logger.addHandler((entry) => entries.push(entry));

    /** Runs the system once, then flushes its commands like a stage boundary. */
    const run = (system: SystemConfig, tick = 1) => {
        const commands = new Commands();
        system.run({ world, commands, logger, tick });
        const queued = commands.length;
        commands.apply(world);
        return queued;
    };

    return { world, entries, run };
}

describe("window systems", () => {
    // -- 1. provisionSurfaceTokens --
    describe("provisionSurfaceTokens", () => {
        it("runs in PRE_UPDATE so tokens exist before close requests are processed", () => {
            const system = provisionSurfaceTokens();
            expect(system.id).toBe(WindowSystem.PROVISION_TOKENS);
            expect(system.stage).toBe(Stage.PRE_UPDATE);
        });

        it("attaches a default SurfaceToken to every window without one", () => {
            const { world, run } = harness();
            const a = spawnWindow(world, { title: "a" });
            const b = spawnWindow(world, { title: "b" });

            expect(run(provisionSurfaceTokens())).toBe(2);
            expect(world.get(a, SafetyToken)).toBeInstanceOf(SurfaceToken);
            expect(world.get(b, SafetyToken)).toBeInstanceOf(SurfaceToken);
        });

        it("leaves existing tokens alone and is idempotent", () => {
            const { world, run } = harness();
            const own: ReleaseSafetyToken = { isSafeToCloseWindow: () => false };
            const window = spawnWindow(world, {}, { token: own });

            expect(run(provisionSurfaceTokens())).toBe(0);
            expect(world.get(window, SafetyToken)).toBe(own);

            const other = spawnWindow(world);
            run(provisionSurfaceTokens());
            const provisioned = world.get(other, SafetyToken);
            expect(run(provisionSurfaceTokens())).toBe(0);
            expect(world.get(other, SafetyToken)).toBe(provisioned);
        });

        it("ignores entities that are not windows", () => {
            const { world, run } = harness();
            const plain = world.spawn();
            expect(run(provisionSurfaceTokens())).toBe(0);
            expect(world.has(plain, SafetyToken)).toBe(false);
        });

        it("asks the factory for each window's token", () => {
            const { world, run } = harness();
            const seen: Entity[] = [];
            const window = spawnWindow(world);

            run(
                provisionSurfaceTokens((entity) => {
                    seen.push(entity);
                    return { isSafeToCloseWindow: () => true };
                }),
            );

            expect(seen).toEqual([window]);
            expect(world.get(window, SafetyToken)?.isSafeToCloseWindow()).toBe(true);
        });

        it("the token is invisible until the commands are applied", () => {
            const { world } = harness();
            const window = spawnWindow(world);
            const commands = new Commands();

            provisionSurfaceTokens().run({ world, commands, logger: new Logger(), tick: 1 });

            expect(world.has(window, SafetyToken)).toBe(false);
            commands.apply(world);
            expect(world.has(window, SafetyToken)).toBe(true);
        });
    });

    // -- 2. closeOnKey --
    describe("closeOnKey", () => {
        function withKeyboard() {
            const h = harness();
            const keyboard = new ButtonInput<KeyCode>();
            h.world.insertResource(Keyboard, keyboard);
            return { ...h, keyboard };
        }

        it("despawns every focused window on the tick Escape goes down", () => {
            const { world, keyboard, run } = withKeyboard();
            const a = spawnWindow(world, { title: "a", focused: true });
            const b = spawnWindow(world, { title: "b", focused: true });
            const c = spawnWindow(world, { title: "c", focused: false });

            keyboard.press("Escape");
            expect(run(closeOnKey())).toBe(2);

            expect(world.isAlive(a)).toBe(false);
            expect(world.isAlive(b)).toBe(false);
            expect(world.isAlive(c)).toBe(true);
        });

        it("ignores a key that is held but not just pressed", () => {
            const { world, keyboard, run } = withKeyboard();
            const window = spawnWindow(world);

            keyboard.press("Escape");
            keyboard.clear();

            expect(keyboard.pressed("Escape")).toBe(true);
            expect(run(closeOnKey())).toBe(0);
            expect(world.isAlive(window)).toBe(true);
        });

        it("bypasses the safety token", () => {
            const { world, keyboard, run } = withKeyboard();
            const window = spawnWindow(world, {}, { token: { isSafeToCloseWindow: () => false } });

            keyboard.press("Escape");
            run(closeOnKey());

            expect(world.isAlive(window)).toBe(false);
        });

        it("honors a custom key", () => {
            const { world, keyboard, run } = withKeyboard();
            const window = spawnWindow(world);

            keyboard.press("Escape");
            run(closeOnKey("KeyQ"));
            expect(world.isAlive(window)).toBe(true);

            keyboard.press("KeyQ");
            run(closeOnKey("KeyQ"));
            expect(world.isAlive(window)).toBe(false);
        });

        it("does nothing without a keyboard resource", () => {
            const { world, run } = harness();
            const window = spawnWindow(world);
            expect(run(closeOnKey())).toBe(0);
            expect(world.isAlive(window)).toBe(true);
        });

        it("logs each closed window", () => {
            const { world, keyboard, run, entries } = withKeyboard();
            spawnWindow(world);
            keyboard.press("Escape");
            run(closeOnKey(), 4);

            expect(entries).toHaveLength(1);
            expect(entries[0]).toMatchObject({
                level: "debug",
                code: "window",
                message: "closing focused window on Escape",
                details: { window: "0v0", tick: 4 },
            });
        });
    });

    // -- 3. exitOnAllClosed --
    describe("exitOnAllClosed", () => {
        it("sends exactly one exit signal when no window exists", () => {
            const { world, run, entries } = harness();
            run(exitOnAllClosed(), 2);

            expect(world.events(AppExit).length).toBe(1);
            expect(entries.map((e) => e.message)).toEqual(["No windows are open, exiting"]);
        });

        it("stays silent while any window exists", () => {
            const { world, run } = harness();
            spawnWindow(world, { focused: false });
            run(exitOnAllClosed());
            expect(world.events(AppExit).length).toBe(0);
        });

        it("counts only entities that are windows", () => {
            const { world, run } = harness();
            world.spawn();
            run(exitOnAllClosed());
            expect(world.events(AppExit).length).toBe(1);
        });

        it("observes the world without queueing commands", () => {
            const { run } = harness();
            expect(run(exitOnAllClosed())).toBe(0);
        });
    });

    // -- 4. exitOnPrimaryClosed --
    describe("exitOnPrimaryClosed", () => {
        it("fires when the primary window is gone even though others remain", () => {
            const { world, run, entries } = harness();
            spawnWindow(world, { title: "secondary" });

            run(exitOnPrimaryClosed());

            expect(world.events(AppExit).length).toBe(1);
            expect(entries.map((e) => e.message)).toEqual(["Primary window was closed, exiting"]);
        });

        it("stays silent while the primary window exists", () => {
            const { world, run } = harness();
            spawnWindow(world, {}, { primary: true });
            run(exitOnPrimaryClosed());
            expect(world.events(AppExit).length).toBe(0);
        });

        it("fires alongside the all-closed policy when nothing is left", () => {
            const { world, run } = harness();
            run(exitOnAllClosed());
            run(exitOnPrimaryClosed());
            expect(world.events(AppExit).length).toBe(2);
        });

        it("ignores a primary marker on an entity that is not a window", () => {
            const { world, run } = harness();
            const window = spawnWindow(world, {}, { primary: true });
            world.remove(window, Window);

            run(exitOnPrimaryClosed());
            expect(world.events(AppExit).length).toBe(1);
        });
    });
});
