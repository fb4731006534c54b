import { footer, logSession, note, startTimer, step, tickLog } from "../logger";
import { runScenario } from "../scenario/runner";
import { loadScenarioOrExit, validateLogLevel, validateMaxTicks } from "../validate";

interface SimulateOptions {
    maxTicks?: number | string;
    logLevel?: string;
}

export async function simulate(file: string, options: SimulateOptions): Promise<void> {
    validateLogLevel(options.logLevel);
    const maxTicks = validateMaxTicks(options.maxTicks);
    const timer = startTimer();

    // 1. Load and validate
    const { scenario } = await loadScenarioOrExit(file);
    logSession({ command: "simulate", scenario: scenario.name, windows: scenario.windows });

    // 2. Run and replay the tick log
    const result = runScenario(scenario, { maxTicks });
    for (const line of result.log) {
        tickLog(line);
    }

    // 3. Summary
    step("simulate", timer(), `${result.ticks} tick(s)`);
    note(`remaining: ${result.remaining.length > 0 ? result.remaining.join(", ") : "(none)"}`);
    if (result.pending.length > 0) {
        note(`pending: ${result.pending.join(", ")}`);
    }

    if (result.exitTick !== null) {
        footer(`Exited on tick ${result.exitTick}`);
    } else {
        footer(
            `Stopped after ${result.ticks} tick(s) without an exit signal`,
            "raise --max-ticks or check the exit condition",
        );
    }
}
