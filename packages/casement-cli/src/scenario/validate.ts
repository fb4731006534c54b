import type { ExitCondition, KeyCode } from "@casement/core";
import type { Scenario, ScenarioPluginOptions, ScenarioStep, ScenarioWindow } from "./types";

const EXIT_CONDITIONS: readonly ExitCondition[] = ["on-all-closed", "on-primary-closed", "dont-exit"];
export const DEFAULT_MAX_TICKS = 100;

type Fields = { [key: string]: unknown };

/** Thrown by {@link defineScenario}; `issues` holds one line per problem found. */
export class ScenarioError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid scenario:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
        this.name = "ScenarioError";
        this.issues = issues;
    }
}

/**
 * Validates untyped scenario input (usually parsed JSON) and fills defaults.
 *
 * @throws {ScenarioError} listing every problem, not just the first.
 */
export function defineScenario(input: unknown): Scenario {
    if (!isObject(input)) {
        throw new ScenarioError(["scenario must be a JSON object"]);
    }

    const issues: string[] = [];

    let name = "scenario";
    if (input.name !== undefined) {
        if (typeof input.name === "string" && input.name.trim().length > 0) {
            name = input.name;
        } else {
            issues.push("name must be a non-empty string");
        }
    }

    const windows = readWindows(input.windows, issues);
    const steps = readSteps(input.steps, new Set(windows.map((w) => w.name)), issues);
    const plugin = readPlugin(input.plugin, issues);
    const maxTicks = optionalCount(input, "maxTicks", "", 1, issues) ?? DEFAULT_MAX_TICKS;
    for (const step of steps) {
        if (step.tick > maxTicks) {
            issues.push(`step for tick ${step.tick} is past maxTicks (${maxTicks}) and would never run`);
        }
    }

    if (issues.length > 0) {
        throw new ScenarioError(issues);
    }
    return { name, windows, steps, plugin, maxTicks };
}

// ── Sections ────────────────────────────────────────────────────────

function readWindows(value: unknown, issues: string[]): ScenarioWindow[] {
    if (value === undefined) return [];
    if (!Array.isArray(value)) {
        issues.push("windows must be an array");
        return [];
    }

    const windows: ScenarioWindow[] = [];
    const seen = new Set<string>();
    value.forEach((raw: unknown, i: number) => {
        const at = `windows[${i}]`;
        if (!isObject(raw)) {
            issues.push(`${at} must be an object`);
            return;
        }
        if (typeof raw.name !== "string" || raw.name.trim().length === 0) {
            issues.push(`${at}.name must be a non-empty string`);
            return;
        }
        if (seen.has(raw.name)) {
            issues.push(`${at}: duplicate window name "${raw.name}"`);
        }
        seen.add(raw.name);

        windows.push({
            name: raw.name,
            title: optionalString(raw, "title", at, issues),
            primary: optionalBoolean(raw, "primary", at, issues),
            focused: optionalBoolean(raw, "focused", at, issues),
            releaseAtTick: optionalCount(raw, "releaseAtTick", at, 0, issues),
        });
    });

    const primaries = windows.filter((w) => w.primary);
    if (primaries.length > 1) {
        issues.push(`at most one window can be primary, got ${primaries.map((w) => `"${w.name}"`).join(", ")}`);
    }
    return windows;
}

function readSteps(value: unknown, windowNames: ReadonlySet<string>, issues: string[]): ScenarioStep[] {
    if (value === undefined) return [];
    if (!Array.isArray(value)) {
        issues.push("steps must be an array");
        return [];
    }

    const steps: ScenarioStep[] = [];
    value.forEach((raw: unknown, i: number) => {
        const at = `steps[${i}]`;
        if (!isObject(raw)) {
            issues.push(`${at} must be an object`);
            return;
        }
        const tick = optionalCount(raw, "tick", at, 1, issues);
        if (tick === undefined) {
            if (raw.tick === undefined) issues.push(`${at}.tick is required`);
            return;
        }

        const close = optionalNames(raw, "close", at, issues);
        for (const name of close ?? []) {
            if (!windowNames.has(name)) {
                issues.push(`${at}.close: unknown window "${name}"`);
            }
        }

        steps.push({
            tick,
            close,
            press: optionalNames(raw, "press", at, issues),
            release: optionalNames(raw, "release", at, issues),
        });
    });
    return steps;
}

function readPlugin(value: unknown, issues: string[]): ScenarioPluginOptions {
    if (value === undefined) return {};
    if (!isObject(value)) {
        issues.push("plugin must be an object");
        return {};
    }

    let exitCondition: ExitCondition | undefined;
    if (value.exitCondition !== undefined) {
        if (isExitCondition(value.exitCondition)) {
            exitCondition = value.exitCondition;
        } else {
            issues.push(`plugin.exitCondition must be one of ${EXIT_CONDITIONS.map((c) => `"${c}"`).join(", ")}`);
        }
    }

    const closeOnKey: KeyCode | undefined = optionalString(value, "closeOnKey", "plugin", issues);
    if (closeOnKey !== undefined && closeOnKey.trim().length === 0) {
        issues.push("plugin.closeOnKey must be a non-empty key code");
    }

    return {
        exitCondition,
        closeWhenRequested: optionalBoolean(value, "closeWhenRequested", "plugin", issues),
        closeOnKey,
        purgeVanishedPending: optionalBoolean(value, "purgeVanishedPending", "plugin", issues),
    };
}

// ── Field readers ───────────────────────────────────────────────────

function isObject(value: unknown): value is Fields {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isExitCondition(value: unknown): value is ExitCondition {
    return EXIT_CONDITIONS.some((condition) => condition === value);
}

function path(at: string, key: string): string {
    return at ? `${at}.${key}` : key;
}

function optionalString(raw: Fields, key: string, at: string, issues: string[]): string | undefined {
    const value = raw[key];
    if (value === undefined || typeof value === "string") return value;
    issues.push(`${path(at, key)} must be a string`);
    return undefined;
}

function optionalBoolean(raw: Fields, key: string, at: string, issues: string[]): boolean | undefined {
    const value = raw[key];
    if (value === undefined || typeof value === "boolean") return value;
    issues.push(`${path(at, key)} must be a boolean`);
    return undefined;
}

function optionalCount(raw: Fields, key: string, at: string, min: number, issues: string[]): number | undefined {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (typeof value === "number" && Number.isInteger(value) && value >= min) return value;
    issues.push(`${path(at, key)} must be an integer >= ${min}`);
    return undefined;
}

function optionalNames(raw: Fields, key: string, at: string, issues: string[]): string[] | undefined {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (Array.isArray(value) && value.every((item) => typeof item === "string" && item.length > 0)) {
        return value.map(String);
    }
    issues.push(`${path(at, key)} must be an array of non-empty strings`);
    return undefined;
}
