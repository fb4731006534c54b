import { footer, logSession, startTimer, step } from "../logger";
import { loadScenarioOrExit, validateLogLevel } from "../validate";

interface ValidateOptions {
    logLevel?: string;
}

export async function validate(file: string, options: ValidateOptions): Promise<void> {
    validateLogLevel(options.logLevel);
    const timer = startTimer();

    const { scenario } = await loadScenarioOrExit(file);

    logSession({ command: "validate", scenario: scenario.name, windows: scenario.windows });
    step("validate", timer(), `${scenario.windows.length} window(s), ${scenario.steps.length} step(s)`);
    footer("Scenario is valid");
}
