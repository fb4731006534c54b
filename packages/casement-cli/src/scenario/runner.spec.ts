/**
 * Contract: runScenario -- scripted ticks against a fresh app.
 *
 * Sections:
 *   1. Deferred close
 *   2. Exit policies
 *   3. Key close
 *   4. Log lines
 */
import { describe, expect, it } from "vitest";
import { runScenario, ScriptedToken } from "./runner";
import type { ScenarioLogLine } from "./types";
import { defineScenario } from "./validate";

const deferredClose = defineScenario({
    name: "deferred-close",
    windows: [
        { name: "main", primary: true, releaseAtTick: 3 },
        { name: "tools", focused: false },
    ],
    steps: [
        { tick: 1, close: ["main"] },
        { tick: 2, close: ["tools"] },
    ],
});

function windowLines(log: ScenarioLogLine[]) {
    return log.filter((line) => line.code === "window").map(({ tick, message, window }) => ({ tick, message, window }));
}

describe("runScenario", () => {
    // -- 1. Deferred close --
    describe("Deferred close", () => {
        it("holds a window until its surface releases, then exits when none remain", () => {
            const result = runScenario(deferredClose);

            expect(result).toMatchObject({ name: "deferred-close", ticks: 3, exitTick: 3, remaining: [], pending: [] });
            expect(windowLines(result.log)).toEqual([
                { tick: 1, message: "close deferred until the surface is released", window: "main" },
                { tick: 2, message: "window released", window: "tools" },
                { tick: 3, message: "pending window released", window: "main" },
                { tick: 3, message: "No windows are open, exiting", window: undefined },
            ]);
        });

        it("reports what is still open and pending when maxTicks cuts the run short", () => {
            const result = runScenario(deferredClose, { maxTicks: 2 });
            expect(result).toMatchObject({ ticks: 2, exitTick: null, remaining: ["main"], pending: ["main"] });
        });

        it("a second request for a closed window is dropped", () => {
            const result = runScenario(
                defineScenario({
                    windows: [{ name: "main" }],
                    steps: [
                        { tick: 1, close: ["main"] },
                        { tick: 2, close: ["main"] },
                    ],
                    plugin: { exitCondition: "dont-exit" },
                    maxTicks: 2,
                }),
            );

            expect(windowLines(result.log)).toEqual([
                { tick: 1, message: "window released", window: "main" },
                { tick: 2, message: "close request dropped: window has no surface token", window: "main" },
            ]);
        });
    });

    // -- 2. Exit policies --
    describe("Exit policies", () => {
        it("on-primary-closed leaves secondary windows open", () => {
            const result = runScenario(
                defineScenario({
                    windows: [{ name: "main", primary: true }, { name: "side" }],
                    steps: [{ tick: 1, close: ["main"] }],
                    plugin: { exitCondition: "on-primary-closed" },
                }),
            );
            expect(result).toMatchObject({ ticks: 1, exitTick: 1, remaining: ["side"] });
        });

        it("a scenario without windows exits on the first tick", () => {
            expect(runScenario(defineScenario({})).exitTick).toBe(1);
        });

        it("dont-exit runs until maxTicks", () => {
            const result = runScenario(defineScenario({ plugin: { exitCondition: "dont-exit" }, maxTicks: 4 }));
            expect(result).toMatchObject({ ticks: 4, exitTick: null });
        });
    });

    // -- 3. Key close --
    describe("Key close", () => {
        it("a held key closes the focused window once", () => {
            const result = runScenario(
                defineScenario({
                    windows: [
                        { name: "a", focused: true },
                        { name: "b", focused: false },
                    ],
                    steps: [{ tick: 1, press: ["Escape"] }],
                    plugin: { exitCondition: "dont-exit", closeOnKey: "Escape" },
                    maxTicks: 3,
                }),
            );

            expect(result).toMatchObject({ ticks: 3, exitTick: null, remaining: ["b"] });
            expect(windowLines(result.log)).toEqual([
                { tick: 1, message: "closing focused window on Escape", window: "a" },
            ]);
        });

        it("key presses do nothing without closeOnKey", () => {
            const result = runScenario(
                defineScenario({
                    windows: [{ name: "a" }],
                    steps: [{ tick: 1, press: ["Escape"] }],
                    maxTicks: 2,
                }),
            );
            expect(result.remaining).toEqual(["a"]);
        });
    });

    // -- 4. Log lines --
    describe("Log lines", () => {
        it("stamps startup lines with tick 0 and the exit with its tick", () => {
            const { log } = runScenario(deferredClose);
            expect(log[0]?.tick).toBe(0);
            expect(log.find((line) => line.message === "exit signal received")).toEqual({
                tick: 3,
                level: "debug",
                code: "app",
                message: "exit signal received",
            });
        });
    });
});

describe("ScriptedToken", () => {
    it("turns safe on its release tick", () => {
        let now = 1;
        const token = new ScriptedToken(2, () => now);
        expect(token.isSafeToCloseWindow()).toBe(false);
        now = 2;
        expect(token.isSafeToCloseWindow()).toBe(true);
    });
});
