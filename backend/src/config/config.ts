import dotenv from "dotenv"
import { type Backoff, type Datastore, DEFAULT_HTTP_PORT } from "../constant";
import { validateEnv } from "../validators";

dotenv.config();

type RedisSettings = {
    readonly host: string;
    readonly port: number;
    readonly password?: string;
    readonly database: number;
}

type MySqlSettings = {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
}

type StartupSettings = {
    /** 0 retries until the dependency answers */
    readonly maxAttempts: number;
    readonly initialDelayMs: number;
    readonly maxDelayMs: number;
    readonly backoff: Backoff;
}

type Config = {
    readonly datastore: Datastore;
    readonly http: { readonly host: string; readonly port: number };
    readonly redis: RedisSettings;
    readonly mysql: MySqlSettings;
    readonly counterKey: string;
    readonly backendTimeoutMs: number;
    readonly startup: StartupSettings;
}

/**
 * Resolves the process configuration from an environment map. Called once at
 * startup; throws ConfigError on the first malformed value.
 */
function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const vars = validateEnv(env);

    return Object.freeze({
        datastore: vars.DATASTORE,
        http: Object.freeze({
            host: vars.HOST,
            port: vars.PORT ?? DEFAULT_HTTP_PORT[vars.DATASTORE],
        }),
        redis: Object.freeze({
            host: vars.REDIS_HOST,
            port: vars.REDIS_PORT,
            password: vars.REDIS_PASSWORD || undefined,
            database: vars.REDIS_DB,
        }),
        mysql: Object.freeze({
            host: vars.MYSQL_HOST,
            port: vars.MYSQL_PORT,
            user: vars.MYSQL_USER,
            password: vars.MYSQL_PASSWORD,
            database: vars.MYSQL_DATABASE,
        }),
        counterKey: vars.COUNTER_KEY,
        backendTimeoutMs: vars.BACKEND_TIMEOUT_MS,
        startup: Object.freeze({
            maxAttempts: vars.STARTUP_MAX_ATTEMPTS,
            initialDelayMs: vars.STARTUP_INITIAL_DELAY_MS,
            maxDelayMs: vars.STARTUP_MAX_DELAY_MS,
            backoff: vars.STARTUP_BACKOFF,
        }),
    });
}

export type { Config, RedisSettings, MySqlSettings, StartupSettings };
export { loadConfig };
