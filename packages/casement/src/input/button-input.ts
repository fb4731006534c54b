/**
 * Held-button state with per-tick press edges.
 *
 * `press()` of a button that is already held is not a new edge, so
 * `justPressed()` fires once per physical press no matter how many ticks the
 * button stays down. Edges are cleared by `clear()` at the end of each tick.
 */
export class ButtonInput<T> {
    private readonly held = new Set<T>();
    private readonly pressedEdges = new Set<T>();

    press(input: T): void {
        if (this.held.has(input)) return;
        this.held.add(input);
        this.pressedEdges.add(input);
    }

    release(input: T): void {
        this.held.delete(input);
    }

    pressed(input: T): boolean {
        return this.held.has(input);
    }

    justPressed(input: T): boolean {
        return this.pressedEdges.has(input);
    }

    /** Forget this tick's edges. Held buttons stay held. */
    clear(): void {
        this.pressedEdges.clear();
    }
}
