/** Tick phases, run in declaration order. Commands are applied after each one. */
export enum Stage {
    FIRST = "first",
    PRE_UPDATE = "pre-update",
    UPDATE = "update",
    POST_UPDATE = "post-update",
    LAST = "last",
}

export const STAGE_ORDER: readonly Stage[] = [
    Stage.FIRST,
    Stage.PRE_UPDATE,
    Stage.UPDATE,
    Stage.POST_UPDATE,
    Stage.LAST,
];
