import { App } from "./app";
import type { AppConfig } from "./types";

export function createApp(config?: AppConfig): App {
    return new App(config);
}
