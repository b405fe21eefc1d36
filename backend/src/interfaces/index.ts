export type { ConnectionHandle, KeyValueHandle, SqlHandle, SqlRow } from "./handle.interface";
export type { CounterStore, VersionStore } from "./store.interface";
