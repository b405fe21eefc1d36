import { createClient } from "redis";
import type { RedisSettings } from "../config";
import type { KeyValueHandle } from "../interfaces";
import logger from "../logger/logger";

const MAX_RECONNECT_DELAY_MS = 3000;

/**
 * Opens one Redis connection and checks it with PING. Until that first
 * connection succeeds the client does not retry on its own; the startup gate
 * decides when to try again. Afterwards a dropped connection is re-established
 * in the background while commands fail fast instead of queueing.
 */
async function connectRedis(settings: RedisSettings, timeoutMs: number): Promise<KeyValueHandle> {
    let established = false;
    const address = `${settings.host}:${settings.port}/${settings.database}`;

    const client = createClient({
        socket: {
            host: settings.host,
            port: settings.port,
            connectTimeout: timeoutMs,
            // before the first success, hand the socket error back to the startup gate
            reconnectStrategy: (retries: number, cause: Error) =>
                established ? Math.min(retries * 100, MAX_RECONNECT_DELAY_MS) : cause,
        },
        password: settings.password,
        database: settings.database,
        disableOfflineQueue: true,
    });

    client.on("error", (err: Error) => {
        logger.error(`[Redis] ${err.message}`);
    });
    client.on("reconnecting", () => {
        logger.warn(`[Redis] Reconnecting to ${address}`);
    });
    client.on("ready", () => {
        logger.info(`[Redis] Ready at ${address}`);
    });

    try {
        await client.connect();
        await client.ping();
    } catch (error) {
        if (client.isOpen) {
            await client.disconnect();
        }
        throw error;
    }
    established = true;

    return {
        incr: (key) => client.incr(key),
        get: (key) => client.get(key),
        close: async () => {
            if (client.isOpen) {
                await client.quit();
            }
        },
    };
}

export default connectRedis;
