/**
 * Single-tick event channel.
 *
 * Producers `send()`. The one consumer of the channel `drain()`s it, which
 * empties it, so an event is read at most once. Whatever is left unread when
 * the host calls `clear()` at the end of the tick is dropped.
 */
export class Events<T> {
    private queue: T[] = [];

    constructor(readonly name: string) {}

    get length(): number {
        return this.queue.length;
    }

    send(event: T): void {
        this.queue.push(event);
    }

    /** Takes every pending event in send order. */
    drain(): T[] {
        const drained = this.queue;
        this.queue = [];
        return drained;
    }

    /** Drops pending events. Returns how many were dropped. */
    clear(): number {
        const dropped = this.queue.length;
        this.queue = [];
        return dropped;
    }
}
