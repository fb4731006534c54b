import type { LoggerContext } from "../core/types";
import { Commands } from "../ecs/commands";
import type { World } from "../ecs/world";
import { type Stage, STAGE_ORDER } from "./enums";
import type { ScheduleReport, System, SystemId } from "./types";

/**
 * Schedule — ordered system runner.
 *
 * Systems run stage by stage. Inside a stage they run in dependency order
 * (`after`), ties broken by registration order. Each stage gets a fresh
 * command buffer which is applied once every system of the stage has run.
 */
export class Schedule {
    private readonly systems = new Map<SystemId, System>();
    private ordered: System[] | null = null;

    add(system: System): void {
        if (this.systems.has(system.id)) {
            throw new Error(`System "${system.id}" is already registered`);
        }
        this.systems.set(system.id, system);
        this.ordered = null;
    }

    has(id: SystemId): boolean {
        return this.systems.has(id);
    }

    /** System ids in execution order. */
    list(): SystemId[] {
        return this.order().map((s) => s.id);
    }

    run(world: World, logger: LoggerContext, tick: number): ScheduleReport {
        const report: ScheduleReport = { systems: 0, commandsApplied: 0, commandsSkipped: 0 };
        const order = this.order();

        for (const stage of STAGE_ORDER) {
            const commands = new Commands();

            for (const system of order) {
                if (system.stage !== stage) continue;
                try {
                    system.run({ world, commands, logger, tick });
                } catch (err) {
                    logger.error("scheduler", `system "${system.id}" failed`, {
                        stage,
                        tick,
                        error: err instanceof Error ? err.message : String(err),
                    });
                    throw err;
                }
                report.systems++;
            }

            const applied = commands.apply(world);
            report.commandsApplied += applied.applied;
            report.commandsSkipped += applied.skipped.length;
            if (applied.skipped.length > 0) {
                logger.debug("scheduler", "skipped commands for vanished entities", {
                    stage,
                    tick,
                    skipped: applied.skipped.map((s) => `${s.kind} ${s.entity}`),
                });
            }
        }

        return report;
    }

    private order(): System[] {
        if (!this.ordered) {
            this.ordered = this.reorder();
        }
        return this.ordered;
    }

    private reorder(): System[] {
        const stageIndex = (stage: Stage) => STAGE_ORDER.indexOf(stage);
        const sorted: System[] = [];
        const visited = new Set<SystemId>();
        const visiting = new Set<SystemId>();

        const visit = (id: SystemId, requiredBy: System | null) => {
            const system = this.systems.get(id);
            if (!system) {
                throw new Error(`Missing dependency: System "${id}" required by "${requiredBy?.id}" is not registered.`);
            }
            if (requiredBy && stageIndex(system.stage) > stageIndex(requiredBy.stage)) {
                throw new Error(
                    `System "${requiredBy.id}" (${requiredBy.stage}) cannot run after "${id}" (${system.stage}): ` +
                        "dependencies must be in the same or an earlier stage.",
                );
            }
            if (visiting.has(id)) {
                throw new Error(`Circular dependency detected: System "${id}" depends on itself!`);
            }
            if (visited.has(id)) return;

            visiting.add(id);
            for (const dep of system.after) {
                visit(dep, system);
            }
            visiting.delete(id);
            visited.add(id);
            sorted.push(system);
        };

        for (const id of this.systems.keys()) {
            visit(id, null);
        }

        // Stable by stage; the DFS order inside a stage already respects `after`.
        return STAGE_ORDER.flatMap((stage) => sorted.filter((s) => s.stage === stage));
    }
}
