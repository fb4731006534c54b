export enum AppState {
    CREATED = "created",
    RUNNING = "running",
    EXITING = "exiting",
    STOPPED = "stopped",
    FAILED = "failed",
}
