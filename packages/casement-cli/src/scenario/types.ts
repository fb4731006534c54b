import type { ExitCondition, KeyCode, LogLevel } from "@casement/core";

export interface ScenarioWindow {
    /** Unique name used by steps and in the summary. */
    name: string;
    title?: string;
    primary?: boolean;
    /** Defaults to true. */
    focused?: boolean;
    /** First tick on which the window's surface reports safe to close. Defaults to 0 (always safe). */
    releaseAtTick?: number;
}

export interface ScenarioStep {
    /** Applied right before this tick runs. 1-based. */
    tick: number;
    /** Window names to send close requests for. */
    close?: string[];
    press?: KeyCode[];
    release?: KeyCode[];
}

export interface ScenarioPluginOptions {
    exitCondition?: ExitCondition;
    closeWhenRequested?: boolean;
    closeOnKey?: KeyCode;
    purgeVanishedPending?: boolean;
}

export interface Scenario {
    name: string;
    windows: ScenarioWindow[];
    steps: ScenarioStep[];
    plugin: ScenarioPluginOptions;
    maxTicks: number;
}

export interface ScenarioRunOptions {
    /** Overrides the scenario's own `maxTicks`. */
    maxTicks?: number;
}

/** One app log entry, with entity handles replaced by window names. */
export interface ScenarioLogLine {
    tick: number;
    level: LogLevel;
    code: string;
    message: string;
    window?: string;
}

export interface ScenarioResult {
    name: string;
    ticks: number;
    exitTick: number | null;
    /** Names of windows still open, in declaration order. */
    remaining: string[];
    /** Names of windows whose close is still deferred. */
    pending: string[];
    log: ScenarioLogLine[];
}
