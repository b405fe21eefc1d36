import { CounterService, VersionService } from "./counter.service";
import { RedisCounterStore } from "./counterStore.service";
import { MySqlVersionStore, VERSION_QUERY } from "./versionStore.service";
import { waitForDependency, backoffDelay } from "./startupGate.service";

export type { StartupGateOptions } from "./startupGate.service";
export { CounterService, VersionService, RedisCounterStore, MySqlVersionStore, VERSION_QUERY, waitForDependency, backoffDelay }
