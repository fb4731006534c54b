import type { App } from "../app/app";
import type { Plugin } from "../app/types";
import { Stage } from "../schedule/enums";
import { ButtonInput } from "./button-input";
import { type KeyCode, Keyboard } from "./keyboard";

export const INPUT_PLUGIN_ID = "input";

/** Installs the {@link Keyboard} resource and clears its edges at the end of every tick. */
export class InputPlugin implements Plugin {
    readonly id = INPUT_PLUGIN_ID;

    build(app: App): void {
        if (!app.world.hasResource(Keyboard)) {
            app.world.insertResource(Keyboard, new ButtonInput<KeyCode>());
        }

        app.addSystem({
            id: "input:clear-keyboard",
            stage: Stage.LAST,
            run: ({ world }) => {
                world.getResource(Keyboard)?.clear();
            },
        });
    }
}

export function createInputPlugin(): InputPlugin {
    return new InputPlugin();
}
