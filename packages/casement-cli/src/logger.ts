import type { ScenarioLogLine, ScenarioWindow } from "./scenario/types";

// ── ANSI constants ──────────────────────────────────────────────────

const yellow = "\x1b[33m";
const green = "\x1b[32m";
const cyan = "\x1b[36m";
const red = "\x1b[31m";
const magenta = "\x1b[35m";
const dim = "\x1b[90m";
const bold = "\x1b[1m";
const reset = "\x1b[0m";

// ── Log level gating ────────────────────────────────────────────────

export type LogLevel = "info" | "warn" | "error" | "silent";

const levels: Record<LogLevel, number> = { info: 0, warn: 1, error: 2, silent: 3 };

export const LOG_LEVELS = Object.keys(levels);

let currentLevel: LogLevel = "info";

export function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(levels, value);
}

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

// ── Basic log functions ─────────────────────────────────────────────

export function warn(msg: string): void {
    if (levels[currentLevel] > levels.warn) return;
    console.log(`  ${yellow}⚠ ${msg}${reset}`);
}

export function error(msg: string): void {
    if (levels[currentLevel] > levels.error) return;
    console.error(`  ${red}✗ ${msg}${reset}`);
}

export function note(msg: string): void {
    if (levels[currentLevel] > levels.info) return;
    console.log(`    ${dim}${msg}${reset}`);
}

// ── Timer ───────────────────────────────────────────────────────────

export function startTimer(): () => string {
    const startedAt = Date.now();
    return () => formatDuration(Date.now() - startedAt);
}

export function formatDuration(ms: number): string {
    if (ms < 1000) return `${ms}ms`;
    const seconds = ms / 1000;
    if (seconds < 60) return `${seconds.toFixed(1)}s`;
    const minutes = Math.floor(seconds / 60);
    const rest = Math.round(seconds % 60)
        .toString()
        .padStart(2, "0");
    return `${minutes}m${rest}s`;
}

// ── Step output with dot-leaders ────────────────────────────────────

const STEP_WIDTH = 26;

export function step(label: string, duration: string, extra?: string): void {
    if (levels[currentLevel] > levels.info) return;
    const dotsLen = Math.max(2, STEP_WIDTH - label.length - 1);
    const dots = "·".repeat(dotsLen);
    const dur = duration.padStart(5);
    const suffix = extra ? `  ${dim}${extra}${reset}` : "";
    console.log(`  ${label} ${dim}${dots}${reset} ${green}✓${reset} ${green}${dur}${reset}${suffix}`);
}

export function stepFail(label: string, message: string): void {
    const dotsLen = Math.max(2, STEP_WIDTH - label.length - 1);
    const dots = "·".repeat(dotsLen);
    console.error(`  ${label} ${dim}${dots}${reset} ${red}✗ ${message}${reset}`);
}

// ── Tick log ────────────────────────────────────────────────────────

function colorMessage(line: ScenarioLogLine): string {
    if (line.level === "error") return `${red}${line.message}${reset}`;
    if (line.level === "warn") return `${yellow}${line.message}${reset}`;
    if (line.message.includes("exiting") || line.message.startsWith("exit")) return `${magenta}${line.message}${reset}`;
    if (line.message.includes("released")) return `${green}${line.message}${reset}`;
    if (line.message.startsWith("close deferred")) return `${cyan}${line.message}${reset}`;
    return line.message;
}

export function tickLog(line: ScenarioLogLine): void {
    if (levels[currentLevel] > levels.info) return;
    const tick = line.tick === 0 ? "start" : `t${line.tick}`;
    const target = line.window ? ` ${dim}${line.window}${reset}` : "";
    console.log(`  ${dim}${tick.padStart(5)}${reset} ${yellow}[${line.code}]${reset} ${colorMessage(line)}${target}`);
}

// ── Footer ──────────────────────────────────────────────────────────

export function footer(message: string, detail?: string): void {
    if (levels[currentLevel] > levels.info) return;
    console.log(`\n  ${bold}${green}✓ ${message}${reset}`);
    if (detail) {
        console.log(`    ${yellow}→ ${detail}${reset}`);
    }
    console.log("");
}

// ── Session header ──────────────────────────────────────────────────

export interface SessionMeta {
    command: "simulate" | "validate";
    scenario: string;
    windows: ScenarioWindow[];
}

// biome-ignore lint/complexity/useRegexLiterals: ANSI escape sequences need String.raw
const ANSI_RE = new RegExp(String.raw`\x1b\[[0-9;]*m`, "g");

function visibleLength(value: string): number {
    return value.replace(ANSI_RE, "").length;
}

function padVisible(value: string, width: number): string {
    const len = visibleLength(value);
    return value + " ".repeat(Math.max(0, width - len));
}

function windowFlags(window: ScenarioWindow): string {
    const flags: string[] = [];
    if (window.primary) flags.push(`${cyan}primary${reset}`);
    if (window.focused ?? true) flags.push(`${yellow}focused${reset}`);
    return flags.length > 0 ? flags.join(" ") : `${dim}(none)${reset}`;
}

export function logSession(meta: SessionMeta): void {
    if (levels[currentLevel] > levels.info) return;

    console.log(`\n${bold}${yellow}⚡ casement ${meta.command}${reset} → ${cyan}${meta.scenario}${reset}\n`);

    if (meta.windows.length === 0) {
        console.log(`  ${dim}Windows${reset}  none\n`);
        return;
    }

    const rows = meta.windows.map((window) => ({
        name: window.name,
        flags: windowFlags(window),
        release: `${dim}${window.releaseAtTick ? `t${window.releaseAtTick}` : "immediate"}${reset}`,
    }));

    const nameWidth = Math.max("Window".length, ...rows.map((r) => visibleLength(r.name))) + 2;
    const flagsWidth = Math.max("Flags".length, ...rows.map((r) => visibleLength(r.flags))) + 2;

    console.log(`  ${dim}${padVisible("Window", nameWidth)}${padVisible("Flags", flagsWidth)}Release${reset}`);
    for (const row of rows) {
        console.log(`  ${padVisible(row.name, nameWidth)}${padVisible(row.flags, flagsWidth)}${row.release}`);
    }
    console.log("");
}
