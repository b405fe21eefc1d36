import { createPool, type RowDataPacket } from "mysql2/promise";
import type { MySqlSettings } from "../config";
import type { SqlHandle } from "../interfaces";
import logger from "../logger/logger";

/**
 * Builds a connection pool and proves it by checking out one connection and
 * pinging the server. The pool is ended if the check fails, so a failed
 * attempt leaves no sockets behind.
 */
async function connectMySQL(settings: MySqlSettings, timeoutMs: number): Promise<SqlHandle> {
    const pool = createPool({
        host: settings.host,
        port: settings.port,
        user: settings.user,
        password: settings.password,
        database: settings.database,
        connectTimeout: timeoutMs,
        waitForConnections: true,
        connectionLimit: 10,
    });

    try {
        const connection = await pool.getConnection();
        try {
            await connection.ping();
        } finally {
            connection.release();
        }
    } catch (error) {
        await pool.end();
        throw error;
    }

    logger.info(`[MySQL] Connected to ${settings.host}:${settings.port}/${settings.database}`);

    return {
        async query(sql) {
            const [rows] = await pool.query<RowDataPacket[]>(sql);
            return rows;
        },
        close: () => pool.end(),
    };
}

export default connectMySQL;
