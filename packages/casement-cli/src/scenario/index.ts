export { loadScenario } from "./loader";
export type { LoadedScenario } from "./loader";
export { runScenario, ScriptedToken } from "./runner";
export type {
    Scenario,
    ScenarioLogLine,
    ScenarioPluginOptions,
    ScenarioResult,
    ScenarioRunOptions,
    ScenarioStep,
    ScenarioWindow,
} from "./types";
export { DEFAULT_MAX_TICKS, defineScenario, ScenarioError } from "./validate";
