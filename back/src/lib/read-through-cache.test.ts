import { describe, it, expect, vi } from "vitest";
import { ReadThroughCache } from "./read-through-cache.js";

function createClock(start = 1_000) {
  let time = start;
  return {
    now: () => time,
    advance: (ms: number) => {
      time += ms;
    },
  };
}

describe("ReadThroughCache", () => {
  it("should serve the same value within the TTL without reloading", async () => {
    const clock = createClock();
    const load = vi.fn(async () => [{ id: 1 }]);
    const cache = new ReadThroughCache({ ttlMs: 60_000, load, now: clock.now });

    const first = await cache.get();
    clock.advance(59_999);
    const second = await cache.get();

    expect(second.value).toBe(first.value);
    expect(second.refreshedAt).toBe(1_000);
    expect(load).toHaveBeenCalledTimes(1);
  });

  it("should reload once the TTL has elapsed", async () => {
    const clock = createClock();
    const load = vi
      .fn<() => Promise<string>>()
      .mockResolvedValueOnce("first")
      .mockResolvedValueOnce("second");
    const cache = new ReadThroughCache({ ttlMs: 60_000, load, now: clock.now });

    await cache.get();
    clock.advance(60_000);
    const entry = await cache.get();

    expect(entry).toEqual({ value: "second", refreshedAt: 61_000 });
    expect(load).toHaveBeenCalledTimes(2);
  });

  it("should share one load between concurrent callers", async () => {
    let resolveLoad: (value: string) => void = () => {};
    const load = vi.fn(
      () =>
        new Promise<string>((resolve) => {
          resolveLoad = resolve;
        }),
    );
    const cache = new ReadThroughCache({ ttlMs: 60_000, load });

    const pending = [cache.get(), cache.get(), cache.get()];
    resolveLoad("rows");
    const entries = await Promise.all(pending);

    expect(load).toHaveBeenCalledTimes(1);
    expect(entries.map((e) => e.value)).toEqual(["rows", "rows", "rows"]);
  });

  it("should not cache a failed load", async () => {
    const load = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("down"))
      .mockResolvedValueOnce("rows");
    const cache = new ReadThroughCache({ ttlMs: 60_000, load });

    await expect(cache.get()).rejects.toThrow("down");
    await expect(cache.get()).resolves.toMatchObject({ value: "rows" });
    expect(load).toHaveBeenCalledTimes(2);
  });
});
