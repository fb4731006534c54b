import { entityToString } from "../ecs/entity";
import type { Entity } from "../ecs/types";
import type { SystemContext } from "../schedule/types";
import { SafetyToken } from "./components";
import { WindowCloseRequested } from "./events";

export type CloseCoordinatorOptions = {
    /** Drop pending entries whose entity no longer exists. Defaults to true. */
    purgeVanished?: boolean;
};

/**
 * CloseCoordinator — deferred-close protocol for windows.
 *
 * A close request releases the window only when its safety token says the
 * surface is done with it. Otherwise the window waits in `pending` and is
 * re-checked every tick. Each instance owns its own pending set.
 *
 * Invariant: a live window is pending iff a close was requested for it and
 * its last safety check failed.
 */
export class CloseCoordinator {
    private readonly waiting = new Set<Entity>();
    private readonly purgeVanished: boolean;

    constructor(options?: CloseCoordinatorOptions) {
        this.purgeVanished = options?.purgeVanished ?? true;
    }

    get pending(): ReadonlySet<Entity> {
        return this.waiting;
    }

    isPending(window: Entity): boolean {
        return this.waiting.has(window);
    }

    /** Reads this tick's close requests: release now, defer, or drop when the window has no token. */
    processRequests({ world, commands, logger, tick }: SystemContext): void {
        for (const { window } of world.events(WindowCloseRequested).drain()) {
            const token = world.get(window, SafetyToken);
            if (!token) {
                logger.debug("window", "close request dropped: window has no surface token", {
                    window: entityToString(window),
                    tick,
                });
                continue;
            }

            if (token.isSafeToCloseWindow()) {
                commands.despawn(window);
                this.waiting.delete(window);
                logger.debug("window", "window released", { window: entityToString(window), tick });
            } else if (!this.waiting.has(window)) {
                this.waiting.add(window);
                logger.debug("window", "close deferred until the surface is released", {
                    window: entityToString(window),
                    tick,
                });
            }
        }
    }

    /** Re-checks every pending window. */
    retryPending({ world, commands, logger, tick }: SystemContext): void {
        for (const window of this.waiting) {
            const token = world.get(window, SafetyToken);

            if (token) {
                if (token.isSafeToCloseWindow()) {
                    commands.despawn(window);
                    this.waiting.delete(window);
                    logger.debug("window", "pending window released", { window: entityToString(window), tick });
                }
                continue;
            }

            // No token: either not provisioned yet (keep) or the entity is gone.
            if (this.purgeVanished && !world.isAlive(window)) {
                this.waiting.delete(window);
                logger.debug("window", "pending close dropped: window no longer exists", {
                    window: entityToString(window),
                    tick,
                });
            }
        }
    }
}
