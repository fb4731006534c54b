import { createEvent } from "../ecs/helpers";
import type { WindowCloseRequest } from "./types";

/** Sent by window-system glue when the platform asks a window to close. */
export const WindowCloseRequested = createEvent<WindowCloseRequest>("WindowCloseRequested");
