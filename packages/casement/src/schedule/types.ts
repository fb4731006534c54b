import type { LoggerContext } from "../core/types";
import type { Commands } from "../ecs/commands";
import type { World } from "../ecs/world";
import type { Stage } from "./enums";

export type SystemId = string;

/** What a system sees during one run. */
export type SystemContext = {
    /** Read access. Writes made here directly bypass the deferred-mutation contract. */
    world: World;
    /** Deferred writes, applied at the end of the system's stage. */
    commands: Commands;
    logger: LoggerContext;
    /** 1-based number of the tick being run. */
    tick: number;
};

export interface SystemConfig {
    id: SystemId;
    /** Defaults to {@link Stage.UPDATE}. */
    stage?: Stage;
    /** Systems that must run before this one. They must live in the same or an earlier stage. */
    after?: SystemId[];
    run(ctx: SystemContext): void;
}

export interface System {
    readonly id: SystemId;
    readonly stage: Stage;
    readonly after: readonly SystemId[];
    run(ctx: SystemContext): void;
}

export type ScheduleReport = {
    systems: number;
    commandsApplied: number;
    commandsSkipped: number;
};
