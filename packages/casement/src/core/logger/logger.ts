import type { LoggerContext } from "../types";
import type { LogEntry, LoggerOptions, LogHandler, LogLevel } from "./types";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, warn: 1, error: 2 };

export class Logger implements LoggerContext {
    private readonly handlers: Set<LogHandler> = new Set();
    private _level: LogLevel;

    constructor(options?: LoggerOptions) {
        this._level = options?.level ?? "debug";
    }

    get level(): LogLevel {
        return this._level;
    }

    set level(level: LogLevel) {
        this._level = level;
    }

    addHandler(handler: LogHandler): void {
        this.handlers.add(handler);
    }

    removeHandler(handler: LogHandler): void {
        this.handlers.delete(handler);
    }

    debug(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("debug", code, message, details);
    }

    warn(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("warn", code, message, details);
    }

    error(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("error", code, message, details);
    }

    private emit(level: LogLevel, code: string, message: string, details?: Record<string, unknown>): void {
        if (LEVEL_RANK[level] < LEVEL_RANK[this._level]) return;

        const entry: LogEntry = { level, code, message, details, timestamp: Date.now() };
        for (const handler of this.handlers) {
            handler(entry);
        }
    }
}
