import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { Scenario } from "./types";
import { defineScenario } from "./validate";

export interface LoadedScenario {
    scenario: Scenario;
    /** Absolute path to the scenario file */
    path: string;
}

/** Reads and validates a JSON scenario file, relative to `cwd`. */
export async function loadScenario(file: string, cwd: string = process.cwd()): Promise<LoadedScenario> {
    const absolutePath = resolve(cwd, file);

    if (!existsSync(absolutePath)) {
        throw new Error(`Scenario file not found: ${absolutePath}`);
    }

    const source = await readFile(absolutePath, "utf-8");
    let parsed: unknown;
    try {
        parsed = JSON.parse(source);
    } catch (err) {
        throw new Error(`${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }

    return { scenario: defineScenario(parsed), path: absolutePath };
}
