import express from "express";
import { counterController, versionController } from "../controllers";
import type { AppServices } from "../app";
import { DATASTORE } from "../constant";

export default function createRoutes(services: AppServices): express.Router {
    const router = express.Router();

    if (services.datastore === DATASTORE.REDIS) {
        router.get("/", counterController.greet(services.counterService));
        router.get("/count", counterController.countVisit(services.counterService));
    } else {
        router.get("/", versionController.greet(services.versionService));
        router.get("/version", versionController.describeVersion(services.versionService));
    }

    return router;
}
