import { describe, expect, it, vi } from "vitest";
import { ResourceCache } from "@/shared/ui/rendering/resourceCache";
import { StartupError } from "@/shared/utils/errors";

describe("ResourceCache", () => {
    it("initializes each key once", () => {
        const cache = new ResourceCache<string, { key: string }>("icons");
        const init = vi.fn((key: string) => ({ key }));

        const first = cache.getOrInit("plus", init);
        const again = cache.getOrInit("plus", init);
        const other = cache.getOrInit("trash", init);

        expect(first).toBe(again);
        expect(other).toEqual({ key: "trash" });
        expect(init).toHaveBeenCalledTimes(2);
        expect(cache.size).toBe(2);
        expect(cache.has("plus")).toBe(true);
    });

    it("does not cache a failed initialization", () => {
        const cache = new ResourceCache<string, number>("icons");

        expect(() =>
            cache.getOrInit("plus", () => {
                throw new Error("malformed");
            }),
        ).toThrow("malformed");
        expect(cache.has("plus")).toBe(false);
        expect(cache.getOrInit("plus", () => 7)).toBe(7);
    });

    it("rejects a key requested while it is being built", () => {
        const cache = new ResourceCache<string, number>("icons");
        const build = (): number => cache.getOrInit("plus", build) + 1;

        expect(() => cache.getOrInit("plus", build)).toThrow(StartupError);
        expect(() => cache.getOrInit("plus", build)).toThrow(
            'icons: "plus" was requested while it was still being initialized',
        );
        expect(cache.size).toBe(0);
    });
});
