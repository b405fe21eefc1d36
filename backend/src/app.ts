import express, { type Express } from "express";
import cors from "cors";
import createRoutes from "./routes";
import { globalErrorHandler, notFoundHandler } from "./utils";
import type { CounterService, VersionService } from "./services";
import { DATASTORE } from "./constant";

export type AppServices =
    | { datastore: typeof DATASTORE.REDIS; counterService: CounterService }
    | { datastore: typeof DATASTORE.MYSQL; versionService: VersionService };

/**
 * Builds the HTTP app around already-connected services. Does not listen.
 */
export function createApp(services: AppServices): Express {
    const app = express();

    app.use(cors());
    app.use(createRoutes(services));
    app.use(notFoundHandler);
    app.use(globalErrorHandler);

    return app;
}
