import { Stage } from "./enums";
import type { System, SystemConfig } from "./types";

/**
 * Creates a {@link System} from a configuration object.
 *
 * @throws If `config.id` is empty or the system lists itself in `after`.
 */
export function defineSystem(config: SystemConfig): System {
    if (!config.id || config.id.trim().length === 0) {
        throw new Error("System must have an id");
    }
    const after = [...new Set(config.after ?? [])];
    if (after.includes(config.id)) {
        throw new Error(`System "${config.id}" cannot run after itself`);
    }

    return {
        id: config.id,
        stage: config.stage ?? Stage.UPDATE,
        after,
        run: config.run,
    };
}
