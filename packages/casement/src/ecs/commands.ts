import { entityToString } from "./entity";
import type { ComponentType, ComponentValue, Entity } from "./types";
import type { World } from "./world";

export type CommandKind = "spawn" | "insert" | "remove" | "despawn";

interface Command {
    readonly kind: CommandKind;
    readonly entity: Entity | null;
    /** Returns false when the target was gone by the time the buffer is applied. */
    apply(world: World): boolean;
}

export type CommandsReport = {
    applied: number;
    /** Commands whose target entity no longer existed. */
    skipped: { kind: CommandKind; entity: string }[];
};

/**
 * Deferred structural mutations.
 *
 * Systems queue work here instead of editing the world while they iterate it.
 * Nothing is visible until the scheduler calls `apply()` at the next stage
 * boundary. Commands against an entity that is gone by then are skipped, so
 * two despawns of the same window release it once.
 */
export class Commands {
    private queue: Command[] = [];

    get length(): number {
        return this.queue.length;
    }

    spawn(...components: ComponentValue<unknown>[]): this {
        this.queue.push({
            kind: "spawn",
            entity: null,
            apply: (world) => {
                world.spawn(...components);
                return true;
            },
        });
        return this;
    }

    insert<T>(entity: Entity, type: ComponentType<T>, value: T): this {
        this.queue.push({
            kind: "insert",
            entity,
            apply: (world) => {
                if (!world.isAlive(entity)) return false;
                world.insert(entity, type, value);
                return true;
            },
        });
        return this;
    }

    remove<T>(entity: Entity, type: ComponentType<T>): this {
        this.queue.push({
            kind: "remove",
            entity,
            apply: (world) => {
                if (!world.isAlive(entity)) return false;
                world.remove(entity, type);
                return true;
            },
        });
        return this;
    }

    despawn(entity: Entity): this {
        this.queue.push({ kind: "despawn", entity, apply: (world) => world.despawn(entity) });
        return this;
    }

    /** Applies queued commands in order and empties the buffer. */
    apply(world: World): CommandsReport {
        const pending = this.queue;
        this.queue = [];

        const report: CommandsReport = { applied: 0, skipped: [] };
        for (const command of pending) {
            if (command.apply(world)) {
                report.applied++;
            } else {
                report.skipped.push({
                    kind: command.kind,
                    entity: command.entity === null ? "<new>" : entityToString(command.entity),
                });
            }
        }
        return report;
    }
}
