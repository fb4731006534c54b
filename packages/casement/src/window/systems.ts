import { AppExit } from "../app/events";
import { entityToString } from "../ecs/entity";
import { type KeyCode, Keyboard } from "../input/keyboard";
import { Stage } from "../schedule/enums";
import type { SystemConfig } from "../schedule/types";
import { PrimaryWindow, SafetyToken, Window } from "./components";
import type { CloseCoordinator } from "./coordinator";
import { SurfaceToken } from "./surface-token";
import type { SurfaceTokenFactory } from "./types";

export const WindowSystem = {
    PROVISION_TOKENS: "window:provision-surface-tokens",
    CLOSE_ON_KEY: "window:close-on-key",
    PROCESS_CLOSE_REQUESTS: "window:process-close-requests",
    RETRY_PENDING_CLOSES: "window:retry-pending-closes",
    EXIT_ON_ALL_CLOSED: "window:exit-on-all-closed",
    EXIT_ON_PRIMARY_CLOSED: "window:exit-on-primary-closed",
} as const;

const defaultTokenFactory: SurfaceTokenFactory = () => new SurfaceToken();

/** Gives every window without a safety token a fresh one. */
export function provisionSurfaceTokens(factory: SurfaceTokenFactory = defaultTokenFactory): SystemConfig {
    return {
        id: WindowSystem.PROVISION_TOKENS,
        stage: Stage.PRE_UPDATE,
        run: ({ world, commands }) => {
            for (const window of world.query({ with: [Window], without: [SafetyToken] })) {
                commands.insert(window, SafetyToken, factory(window));
            }
        },
    };
}

export function processCloseRequests(coordinator: CloseCoordinator): SystemConfig {
    return {
        id: WindowSystem.PROCESS_CLOSE_REQUESTS,
        stage: Stage.UPDATE,
        run: (ctx) => coordinator.processRequests(ctx),
    };
}

export function retryPendingCloses(coordinator: CloseCoordinator): SystemConfig {
    return {
        id: WindowSystem.RETRY_PENDING_CLOSES,
        stage: Stage.UPDATE,
        after: [WindowSystem.PROCESS_CLOSE_REQUESTS],
        run: (ctx) => coordinator.retryPending(ctx),
    };
}

/**
 * Despawns focused windows on the tick `key` goes down. Skips the safety
 * token entirely, so it is meant for prototypes and examples.
 */
export function closeOnKey(key: KeyCode = "Escape"): SystemConfig {
    return {
        id: WindowSystem.CLOSE_ON_KEY,
        stage: Stage.UPDATE,
        run: ({ world, commands, logger, tick }) => {
            if (!world.getResource(Keyboard)?.justPressed(key)) return;

            for (const [window, record] of world.each(Window)) {
                if (!record.focused) continue;
                commands.despawn(window);
                logger.debug("window", `closing focused window on ${key}`, { window: entityToString(window), tick });
            }
        },
    };
}

export function exitOnAllClosed(): SystemConfig {
    return {
        id: WindowSystem.EXIT_ON_ALL_CLOSED,
        stage: Stage.POST_UPDATE,
        run: ({ world, logger, tick }) => {
            if (world.isEmpty({ with: [Window] })) {
                logger.debug("window", "No windows are open, exiting", { tick });
                world.events(AppExit).send();
            }
        },
    };
}

export function exitOnPrimaryClosed(): SystemConfig {
    return {
        id: WindowSystem.EXIT_ON_PRIMARY_CLOSED,
        stage: Stage.POST_UPDATE,
        run: ({ world, logger, tick }) => {
            if (world.isEmpty({ with: [Window, PrimaryWindow] })) {
                logger.debug("window", "Primary window was closed, exiting", { tick });
                world.events(AppExit).send();
            }
        },
    };
}
