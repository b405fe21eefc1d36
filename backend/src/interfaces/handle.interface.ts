/**
 * An owned connection to the datastore. Created once at startup, shared by
 * every request, closed at process exit.
 */
export interface ConnectionHandle {
  close(): Promise<void>;
}

/** Key-value side: only the commands the counter needs. */
export interface KeyValueHandle extends ConnectionHandle {
  /** Server-side atomic INCR; returns the new value. */
  incr(key: string): Promise<number>;
  get(key: string): Promise<string | null>;
}

export type SqlRow = Record<string, unknown>;

export interface SqlHandle extends ConnectionHandle {
  query(sql: string): Promise<SqlRow[]>;
}
