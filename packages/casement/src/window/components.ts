import { createComponent } from "../ecs/helpers";
import type { ReleaseSafetyToken, WindowRecord } from "./types";

export const Window = createComponent<WindowRecord>("Window");

/** Marker for the one window whose closing ends the app under `"on-primary-closed"`. */
export const PrimaryWindow = createComponent<true>("PrimaryWindow");

/** Release-safety token. Absent until the provisioner has seen the window. */
export const SafetyToken = createComponent<ReleaseSafetyToken>("SafetyToken");
