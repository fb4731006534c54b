import type { ReleaseSafetyToken } from "./types";

/**
 * Default safety token: safe once the surface owner holds no lease on it.
 *
 * The renderer `acquire()`s a lease while it uses the window's surface and
 * calls the returned release function when done. Releasing twice is a no-op.
 */
export class SurfaceToken implements ReleaseSafetyToken {
    private leases = 0;

    get leaseCount(): number {
        return this.leases;
    }

    acquire(): () => void {
        this.leases++;
        let released = false;
        return () => {
            if (released) return;
            released = true;
            this.leases--;
        };
    }

    isSafeToCloseWindow(): boolean {
        return this.leases === 0;
    }
}
