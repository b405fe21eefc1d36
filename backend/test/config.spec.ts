import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config";
import { ConfigError } from "../src/utils/errors";

describe("loadConfig", () => {
  it("falls back to the documented defaults for the key-value variant", () => {
    const config = loadConfig({});

    expect(config.datastore).toBe("redis");
    expect(config.http).toEqual({ host: "0.0.0.0", port: 5001 });
    expect(config.redis).toEqual({ host: "redis", port: 6379, password: undefined, database: 0 });
    expect(config.counterKey).toBe("visits");
    expect(config.backendTimeoutMs).toBe(2000);
    expect(config.startup).toEqual({
      maxAttempts: 0,
      initialDelayMs: 500,
      maxDelayMs: 10000,
      backoff: "exponential",
    });
  });

  it("uses port 5002 and the MySQL defaults for the relational variant", () => {
    const config = loadConfig({ DATASTORE: "mysql" });

    expect(config.http.port).toBe(5002);
    expect(config.mysql).toEqual({
      host: "mysql",
      port: 3306,
      user: "root",
      password: "password",
      database: "testdb",
    });
  });

  it("reads overrides from the environment map", () => {
    const config = loadConfig({
      PORT: "8080",
      REDIS_HOST: "cache.internal",
      REDIS_PORT: "6380",
      REDIS_PASSWORD: "test-secret",
      REDIS_DB: "2",
      STARTUP_MAX_ATTEMPTS: "3",
      STARTUP_BACKOFF: "constant",
    });

    expect(config.http.port).toBe(8080);
    expect(config.redis).toEqual({ host: "cache.internal", port: 6380, password: "test-secret", database: 2 });
    expect(config.startup.maxAttempts).toBe(3);
    expect(config.startup.backoff).toBe("constant");
  });

  it("treats an empty Redis password as no password", () => {
    expect(loadConfig({ REDIS_PASSWORD: "" }).redis.password).toBeUndefined();
  });

  it("returns a frozen snapshot", () => {
    const config = loadConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.redis)).toBe(true);
    expect(Object.isFrozen(config.startup)).toBe(true);
  });

  it("rejects an unparseable port", () => {
    expect(() => loadConfig({ REDIS_PORT: "six" })).toThrow(ConfigError);
    expect(() => loadConfig({ REDIS_PORT: "six" })).toThrow('Invalid configuration: "REDIS_PORT" must be a number');
  });

  it("rejects an out-of-range port", () => {
    expect(() => loadConfig({ PORT: "70000" })).toThrow('"PORT" must be a valid port');
  });

  it("rejects an unknown datastore", () => {
    expect(() => loadConfig({ DATASTORE: "mongodb" })).toThrow('"DATASTORE" must be one of [redis, mysql]');
  });

  it("rejects a negative attempt budget", () => {
    expect(() => loadConfig({ STARTUP_MAX_ATTEMPTS: "-1" })).toThrow(
      "STARTUP_MAX_ATTEMPTS must be 0 (retry forever) or a positive attempt count"
    );
  });
});
