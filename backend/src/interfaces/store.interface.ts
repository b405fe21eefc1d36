export interface CounterStore {
  /** Atomically adds one to `key` and returns the new value. */
  increment(key: string): Promise<number>;
  /** Current value, 0 for a key never incremented. */
  get(key: string): Promise<number>;
}

export interface VersionStore {
  version(): Promise<string>;
}
