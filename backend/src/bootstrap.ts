import { loadConfig, type Config, type MySqlSettings, type RedisSettings } from "./config";
import type { Server } from "http";
import type { Express } from "express";
import { createApp, type AppServices } from "./app";
import { DATASTORE, SERVICE_STATE, type ServiceState } from "./constant";
import { connectMySQL, connectRedis } from "./db";
import type { ConnectionHandle, KeyValueHandle, SqlHandle } from "./interfaces";
import logger from "./logger/logger";
import {
    CounterService,
    MySqlVersionStore,
    RedisCounterStore,
    VersionService,
    waitForDependency,
    type StartupGateOptions,
} from "./services";

export interface Connectors {
    redis: (settings: RedisSettings, timeoutMs: number) => Promise<KeyValueHandle>;
    mysql: (settings: MySqlSettings, timeoutMs: number) => Promise<SqlHandle>;
}

export interface PreparedService {
    services: AppServices;
    handle: ConnectionHandle;
}

export type Prepare = (config: Config) => Promise<PreparedService>;

export interface RunningService {
    server: Server;
    handle: ConnectionHandle;
    lifecycle: ServiceLifecycle;
    /** Stops accepting requests, then closes the datastore handle. */
    stop(): Promise<void>;
}

/** Starting until the port is bound, Ready from then on. */
export class ServiceLifecycle {
    private current: ServiceState = SERVICE_STATE.STARTING;

    get state(): ServiceState {
        return this.current;
    }

    markReady(): void {
        this.current = SERVICE_STATE.READY;
    }
}

const defaultConnectors: Connectors = {
    redis: connectRedis,
    mysql: connectMySQL,
};

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Runs the startup gate against the configured datastore and wires the
 * resulting handle into its store and service. Rejects with
 * DependencyUnreachable when a bounded gate runs out of attempts.
 */
export async function prepareService(
    config: Config,
    connectors: Connectors = defaultConnectors,
    sleep?: StartupGateOptions["sleep"]
): Promise<PreparedService> {
    const gate: StartupGateOptions = { ...config.startup, sleep };
    const timeoutMs = config.backendTimeoutMs;

    if (config.datastore === DATASTORE.MYSQL) {
        const handle = await waitForDependency("MySQL", () => connectors.mysql(config.mysql, timeoutMs), gate);
        const versionService = new VersionService(new MySqlVersionStore(handle, timeoutMs));
        return { handle, services: { datastore: DATASTORE.MYSQL, versionService } };
    }

    const handle = await waitForDependency("Redis", () => connectors.redis(config.redis, timeoutMs), gate);
    const counterService = new CounterService(new RedisCounterStore(handle, timeoutMs), config.counterKey);
    return { handle, services: { datastore: DATASTORE.REDIS, counterService } };
}

function listen(app: Express, port: number, host: string): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port, host);
        server.once("error", reject);
        server.once("listening", () => {
            server.off("error", reject);
            resolve(server);
        });
    });
}

/**
 * Waits for the datastore, then binds the HTTP port. Nothing listens while
 * the gate is still retrying; if the bind fails (EADDRINUSE and the like) the
 * datastore handle is closed before the error is rethrown.
 */
export async function startServer(
    config: Config,
    prepare: Prepare = prepareService,
    lifecycle: ServiceLifecycle = new ServiceLifecycle()
): Promise<RunningService> {
    logger.info(`[Server] ${lifecycle.state}: waiting for ${config.datastore}`);

    const { services, handle } = await prepare(config);
    const app = createApp(services);

    let server: Server;
    try {
        server = await listen(app, config.http.port, config.http.host);
    } catch (error) {
        logger.error(`[Server] Cannot listen on ${config.http.host}:${config.http.port}: ${errorMessage(error)}`);
        try {
            await handle.close();
        } catch (closeError) {
            logger.error(`[Server] Failed to close ${config.datastore} connection: ${errorMessage(closeError)}`);
        }
        throw error;
    }

    server.on("error", (error: Error) => {
        logger.error(`[Server] HTTP server error: ${error.message}`);
    });
    lifecycle.markReady();
    logger.info(`[Server] ${lifecycle.state}: listening on ${config.http.host}:${config.http.port} (${config.datastore})`);

    return {
        server,
        handle,
        lifecycle,
        stop: async () => {
            await new Promise<void>((resolve, reject) => {
                server.close((err) => (err ? reject(err) : resolve()));
            });
            await handle.close();
        },
    };
}

/**
 * Resolves the configuration from `env` and starts the service. A malformed
 * value rejects with ConfigError before any connection is attempted.
 */
export async function launch(
    env: NodeJS.ProcessEnv = process.env,
    prepare: Prepare = prepareService
): Promise<RunningService> {
    const config = loadConfig(env);
    return startServer(config, prepare);
}
