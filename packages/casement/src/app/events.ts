import { createEvent } from "../ecs/helpers";

/**
 * Exit signal. No payload; the app stops at the end of any tick in which one
 * was sent, however many were sent.
 */
export const AppExit = createEvent("AppExit");
