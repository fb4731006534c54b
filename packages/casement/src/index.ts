// ── App (host loop) ─────────────────────────────────────────────────
export { App } from "./app/app";
export { AppState } from "./app/enums";
export { AppExit } from "./app/events";
export { createApp } from "./app/helpers";
export type { AppConfig, AppRunOptions, AppRunResult, Plugin, PluginId } from "./app/types";
// ── Logger ──────────────────────────────────────────────────────────
export { createConsoleHandler } from "./core/logger/console-handler";
export { Logger } from "./core/logger/logger";
export type { LogEntry, LoggerOptions, LogHandler, LogLevel } from "./core/logger/types";
// ── State machine ───────────────────────────────────────────────────
export { StateMachine } from "./core/state-machine/state-machine";
export type { StateMachineConfig, TransitionListener } from "./core/state-machine/types";
export type { LoggerContext } from "./core/types";
// ── ECS ─────────────────────────────────────────────────────────────
export { Commands } from "./ecs/commands";
export type { CommandKind, CommandsReport } from "./ecs/commands";
export { createEntity, EntityAllocator, entityToString, getGeneration, getIndex } from "./ecs/entity";
export { Events } from "./ecs/events";
export { component, createComponent, createEvent, createResource } from "./ecs/helpers";
export { INDEX_BITS, MAX_ENTITIES, MAX_GENERATION } from "./ecs/types";
export type { ComponentType, ComponentValue, Entity, EventType, QueryFilter, ResourceType } from "./ecs/types";
export { World } from "./ecs/world";
// ── Input ───────────────────────────────────────────────────────────
export { ButtonInput } from "./input/button-input";
export { Keyboard } from "./input/keyboard";
export type { KeyCode } from "./input/keyboard";
export { createInputPlugin, INPUT_PLUGIN_ID, InputPlugin } from "./input/plugin";
// ── Schedule ────────────────────────────────────────────────────────
export { Stage, STAGE_ORDER } from "./schedule/enums";
export { defineSystem } from "./schedule/helpers";
export { Schedule } from "./schedule/schedule";
export type { ScheduleReport, System, SystemConfig, SystemContext, SystemId } from "./schedule/types";
// ── Window ──────────────────────────────────────────────────────────
export { PrimaryWindow, SafetyToken, Window } from "./window/components";
export { CloseCoordinator } from "./window/coordinator";
export type { CloseCoordinatorOptions } from "./window/coordinator";
export { WindowCloseRequested } from "./window/events";
export { requestClose, spawnWindow } from "./window/helpers";
export type { SpawnWindowOptions } from "./window/helpers";
export { createWindowPlugin, WINDOW_PLUGIN_ID, WindowPlugin } from "./window/plugin";
export { SurfaceToken } from "./window/surface-token";
export {
    closeOnKey,
    exitOnAllClosed,
    exitOnPrimaryClosed,
    processCloseRequests,
    provisionSurfaceTokens,
    retryPendingCloses,
    WindowSystem,
} from "./window/systems";
export type {
    ExitCondition,
    ReleaseSafetyToken,
    SurfaceTokenFactory,
    WindowCloseRequest,
    WindowInit,
    WindowPluginOptions,
    WindowRecord,
} from "./window/types";
