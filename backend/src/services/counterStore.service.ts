import type { CounterStore, KeyValueHandle } from "../interfaces";
import { BackendUnavailable } from "../utils/errors";
import { withTimeout } from "../utils/timeout/withTimeout";

/**
 * Counter kept in Redis. Increments go through the server's INCR, so any
 * number of workers can share one key without losing updates. Nothing is
 * cached here: every call reads or writes the backend.
 */
export class RedisCounterStore implements CounterStore {
  constructor(
    private readonly handle: KeyValueHandle,
    private readonly timeoutMs: number
  ) {}

  increment(key: string): Promise<number> {
    return this.run(`INCR ${key}`, () => this.handle.incr(key));
  }

  async get(key: string): Promise<number> {
    const raw = await this.run(`GET ${key}`, () => this.handle.get(key));
    if (raw === null) return 0;

    const value = Number(raw);
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new BackendUnavailable(`GET ${key} returned non-counter value "${raw}"`);
    }
    return value;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(fn(), this.timeoutMs);
    } catch (error) {
      throw BackendUnavailable.from(operation, error);
    }
  }
}
