import { describe, it, expect } from "vitest";
import { MySqlVersionStore, VERSION_QUERY } from "../src/services";
import { BackendUnavailable } from "../src/utils/errors";
import { FakeSqlHandle } from "./helpers/memoryHandles";

describe("MySqlVersionStore", () => {
  it("runs SELECT VERSION() and returns the first column unchanged", async () => {
    const handle = new FakeSqlHandle([{ "VERSION()": "8.0.36-0ubuntu0.22.04.1" }]);
    const store = new MySqlVersionStore(handle, 50);

    await expect(store.version()).resolves.toBe("8.0.36-0ubuntu0.22.04.1");
    expect(handle.queries).toEqual([VERSION_QUERY]);
    expect(VERSION_QUERY).toBe("SELECT VERSION()");
  });

  it("fails with BackendUnavailable when the query is rejected", async () => {
    const handle = new FakeSqlHandle([]);
    handle.available = false;
    const store = new MySqlVersionStore(handle, 50);

    const failure = store.version();
    await expect(failure).rejects.toBeInstanceOf(BackendUnavailable);
    await expect(failure).rejects.toThrow(
      "Backend unavailable: SELECT VERSION() failed: Access denied for user 'root'"
    );
  });

  it("fails when the query returns no rows", async () => {
    const store = new MySqlVersionStore(new FakeSqlHandle([]), 50);

    await expect(store.version()).rejects.toThrow("Backend unavailable: SELECT VERSION() returned no rows");
  });

  it("fails when the first column is not a string", async () => {
    const store = new MySqlVersionStore(new FakeSqlHandle([{ "VERSION()": 8 }]), 50);

    await expect(store.version()).rejects.toThrow("Backend unavailable: SELECT VERSION() returned a non-string value");
  });
});
