import { describe, expect, it } from "vitest";
import { SurfaceToken } from "./surface-token";

describe("SurfaceToken", () => {
    it("is safe with no leases", () => {
        expect(new SurfaceToken().isSafeToCloseWindow()).toBe(true);
    });

    it("is unsafe until every lease is released", () => {
        const token = new SurfaceToken();
        const releaseA = token.acquire();
        const releaseB = token.acquire();

        releaseA();
        expect(token.leaseCount).toBe(1);
        expect(token.isSafeToCloseWindow()).toBe(false);

        releaseB();
        expect(token.isSafeToCloseWindow()).toBe(true);
    });

    it("releasing the same lease twice is a no-op", () => {
        const token = new SurfaceToken();
        const releaseA = token.acquire();
        token.acquire();

        releaseA();
        releaseA();

        expect(token.leaseCount).toBe(1);
    });
});
