import { launch, type RunningService } from "./bootstrap";
import logger from "./logger/logger";

function stopOnSignal(running: RunningService): void {
    const shutdown = (signal: NodeJS.Signals) => {
        logger.info(`[Server] ${signal} received, shutting down`);
        running.stop().then(
            () => process.exit(0),
            (error: unknown) => {
                logger.error(`[Server] Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
                process.exit(1);
            }
        );
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
}

// ConfigError, DependencyUnreachable and bind failures all end here, never Ready.
launch()
    .then(stopOnSignal)
    .catch((error: unknown) => {
        logger.error(`[Server] Startup failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
    });
