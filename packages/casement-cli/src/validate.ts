import { error, isLogLevel, LOG_LEVELS, setLogLevel, stepFail, warn } from "./logger";
import type { LoadedScenario } from "./scenario/loader";
import { loadScenario } from "./scenario/loader";
import { ScenarioError } from "./scenario/validate";

// ── Option validation ──────────────────────────────────────────────

/** Applies --log-level. Warns on unrecognized values and keeps the current level. */
export function validateLogLevel(value: string | undefined): void {
    if (value === undefined) return;
    if (isLogLevel(value)) {
        setLogLevel(value);
        return;
    }
    warn(`Unknown --log-level value "${value}". Valid values: ${LOG_LEVELS.join(", ")}. Defaulting to "info".`);
}

/** Parses --max-ticks. Exits on anything but a positive integer. */
export function validateMaxTicks(value: number | string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const ticks = Number(value);
    if (!Number.isInteger(ticks) || ticks < 1) {
        error(`--max-ticks must be a positive integer, got "${value}"`);
        process.exit(1);
    }
    return ticks;
}

// ── Scenario file validation ───────────────────────────────────────

/** Loads a scenario, or prints every problem with it and exits with code 1. */
export async function loadScenarioOrExit(file: string): Promise<LoadedScenario> {
    try {
        return await loadScenario(file);
    } catch (err) {
        stepFail("load", file);
        if (err instanceof ScenarioError) {
            for (const issue of err.issues) error(issue);
        } else {
            error(err instanceof Error ? err.message : String(err));
        }
        process.exit(1);
    }
}
