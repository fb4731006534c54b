import { createResource } from "../ecs/helpers";
import type { ButtonInput } from "./button-input";

/** Key names follow `KeyboardEvent.code`. */
export type KeyCode =
    | "Escape"
    | "Enter"
    | "Space"
    | "Tab"
    | "Backspace"
    | "KeyQ"
    | "KeyW"
    | "F4"
    | (string & {});

export const Keyboard = createResource<ButtonInput<KeyCode>>("Keyboard");
