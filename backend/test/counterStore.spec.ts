import { describe, it, expect, beforeEach } from "vitest";
import { RedisCounterStore } from "../src/services";
import { BackendUnavailable } from "../src/utils/errors";
import { MemoryKeyValueHandle } from "./helpers/memoryHandles";

describe("RedisCounterStore", () => {
  let handle: MemoryKeyValueHandle;
  let store: RedisCounterStore;

  beforeEach(() => {
    handle = new MemoryKeyValueHandle();
    store = new RedisCounterStore(handle, 50);
  });

  it("creates the key on first increment and returns 1", async () => {
    await expect(store.increment("visits")).resolves.toBe(1);
    expect(handle.values.get("visits")).toBe("1");
  });

  it("returns 0 for a key that was never incremented", async () => {
    await expect(store.get("never-touched")).resolves.toBe(0);
  });

  it("reads back the stored value", async () => {
    await store.increment("visits");
    await store.increment("visits");

    await expect(store.get("visits")).resolves.toBe(2);
  });

  it("hands out 1..N exactly once across concurrent increments", async () => {
    const N = 50;
    const results = await Promise.all(Array.from({ length: N }, () => store.increment("visits")));

    const sorted = [...results].sort((a, b) => a - b);
    expect(sorted).toEqual(Array.from({ length: N }, (_, i) => i + 1));
    expect(new Set(results).size).toBe(N);
  });

  it("keeps separate keys independent", async () => {
    await store.increment("visits");
    await store.increment("visits");

    await expect(store.increment("other")).resolves.toBe(1);
  });

  it("wraps a refused connection in BackendUnavailable", async () => {
    handle.available = false;

    const failure = store.increment("visits");
    await expect(failure).rejects.toBeInstanceOf(BackendUnavailable);
    await expect(failure).rejects.toThrow("Backend unavailable: INCR visits failed: Connection refused");
  });

  it("resumes from the stored value after a failed increment", async () => {
    await store.increment("visits");
    await store.increment("visits");

    handle.available = false;
    await expect(store.increment("visits")).rejects.toBeInstanceOf(BackendUnavailable);

    handle.available = true;
    await expect(store.increment("visits")).resolves.toBe(3);
  });

  it("turns a backend that never answers into BackendUnavailable", async () => {
    handle.hang = true;

    await expect(store.increment("visits")).rejects.toThrow(
      "Backend unavailable: INCR visits failed: Operation timed out after 50ms"
    );
  });

  it("rejects a key holding something other than a counter", async () => {
    handle.values.set("visits", "hello");

    await expect(store.get("visits")).rejects.toThrow('Backend unavailable: GET visits returned non-counter value "hello"');
  });

  it("carries status 503 for the HTTP layer", async () => {
    handle.available = false;

    await expect(store.get("visits")).rejects.toMatchObject({ statusCode: 503, status: false });
  });
});
