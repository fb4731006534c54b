import type { App } from "../app/app";
import type { Plugin, PluginId } from "../app/types";
import { INPUT_PLUGIN_ID } from "../input/plugin";
import { CloseCoordinator } from "./coordinator";
import { WindowCloseRequested } from "./events";
import { spawnWindow } from "./helpers";
import {
    closeOnKey,
    exitOnAllClosed,
    exitOnPrimaryClosed,
    processCloseRequests,
    provisionSurfaceTokens,
    retryPendingCloses,
} from "./systems";
import type { ExitCondition, WindowPluginOptions } from "./types";

export const WINDOW_PLUGIN_ID = "window";

const EXIT_CONDITIONS: readonly ExitCondition[] = ["on-all-closed", "on-primary-closed", "dont-exit"];

type ResolvedOptions = Required<Omit<WindowPluginOptions, "closeOnKey" | "tokenFactory">> &
    Pick<WindowPluginOptions, "closeOnKey" | "tokenFactory">;

/**
 * WindowPlugin — wires the window lifecycle into an app.
 *
 * Registers the close-request channel, spawns the primary window, and adds
 * the token provisioner, the close coordinator's systems, the exit policy
 * and (optionally) the key-triggered close.
 */
export class WindowPlugin implements Plugin {
    readonly id = WINDOW_PLUGIN_ID;
    readonly dependencies: readonly PluginId[];
    readonly coordinator: CloseCoordinator;
    private readonly options: ResolvedOptions;

    constructor(options: ResolvedOptions) {
        this.options = options;
        this.dependencies = options.closeOnKey ? [INPUT_PLUGIN_ID] : [];
        this.coordinator = new CloseCoordinator({ purgeVanished: options.purgeVanishedPending });
    }

    get exitCondition(): ExitCondition {
        return this.options.exitCondition;
    }

    build(app: App): void {
        const { world } = app;
        world.registerEvent(WindowCloseRequested);

        if (this.options.primaryWindow !== null) {
            spawnWindow(world, this.options.primaryWindow, { primary: true });
        }

        app.addSystem(provisionSurfaceTokens(this.options.tokenFactory));

        if (this.options.closeOnKey) {
            app.addSystem(closeOnKey(this.options.closeOnKey.key));
        }

        if (this.options.closeWhenRequested) {
            app.addSystem(processCloseRequests(this.coordinator));
            app.addSystem(retryPendingCloses(this.coordinator));
        }

        switch (this.options.exitCondition) {
            case "on-all-closed":
                app.addSystem(exitOnAllClosed());
                break;
            case "on-primary-closed":
                app.addSystem(exitOnPrimaryClosed());
                break;
            case "dont-exit":
                break;
        }
    }
}

/**
 * Creates a {@link WindowPlugin} from options, filling defaults.
 *
 * @throws On an unknown `exitCondition`, an empty `closeOnKey.key`, or a non-function `tokenFactory`.
 */
export function createWindowPlugin(options?: WindowPluginOptions): WindowPlugin {
    const exitCondition = options?.exitCondition ?? "on-all-closed";
    if (!EXIT_CONDITIONS.includes(exitCondition)) {
        throw new Error(
            `Unknown exitCondition "${exitCondition}". Expected one of: ${EXIT_CONDITIONS.map((c) => `"${c}"`).join(", ")}`,
        );
    }
    if (options?.closeOnKey && options.closeOnKey.key.trim().length === 0) {
        throw new Error("closeOnKey.key must be a non-empty key code");
    }
    if (options?.tokenFactory !== undefined && typeof options.tokenFactory !== "function") {
        throw new Error("tokenFactory must be a function");
    }

    return new WindowPlugin({
        primaryWindow: options?.primaryWindow === undefined ? { title: "app" } : options.primaryWindow,
        exitCondition,
        closeWhenRequested: options?.closeWhenRequested ?? true,
        closeOnKey: options?.closeOnKey,
        purgeVanishedPending: options?.purgeVanishedPending ?? true,
        tokenFactory: options?.tokenFactory,
    });
}
