export { loadConfig } from "./config";
export type { Config, RedisSettings, MySqlSettings, StartupSettings } from "./config";
