import type { StateMachineConfig, TransitionListener } from "./types";

/**
 * Table-driven finite state machine.
 *
 * Every transition not listed in `transitions[current]` throws and leaves the
 * state untouched. Listeners run synchronously after the state has changed.
 */
export class StateMachine<TState extends string> {
    private _current: TState;
    private readonly transitions: Record<TState, TState[]>;
    private readonly name: string;
    private readonly listeners: Set<TransitionListener<TState>> = new Set();

    constructor(config: StateMachineConfig<TState>) {
        this._current = config.initial;
        this.transitions = config.transitions;
        this.name = config.name ?? "StateMachine";
    }

    get current(): TState {
        return this._current;
    }

    /** True when the machine is in any of the given states. */
    is(...states: TState[]): boolean {
        return states.includes(this._current);
    }

    canTransition(target: TState): boolean {
        return this.transitions[this._current].includes(target);
    }

    transition(target: TState): void {
        if (!this.canTransition(target)) {
            throw new Error(`Illegal transition: "${this._current}" → "${target}" for "${this.name}"`);
        }
        const from = this._current;
        this._current = target;
        for (const listener of this.listeners) {
            listener(from, target);
        }
    }

    assertState(...allowed: TState[]): void {
        if (!this.is(...allowed)) {
            const list = allowed.map((s) => `"${s}"`).join(", ");
            throw new Error(`"${this.name}" expected state ${list}, but current is "${this._current}"`);
        }
    }

    onTransition(cb: TransitionListener<TState>): () => void {
        this.listeners.add(cb);
        return () => {
            this.listeners.delete(cb);
        };
    }
}
