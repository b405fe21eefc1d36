import { NextFunction, Request, Response } from "express";
import { StatusCodes } from "http-status-codes";
import { ApiErrorResponse, routeApiMessage } from "../api-response";
import logger from "../../logger/logger";

function globalErrorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
    if (res.headersSent) {
        return next(err);
    }

    const apiError = err instanceof ApiErrorResponse
        ? err
        : new ApiErrorResponse(StatusCodes.INTERNAL_SERVER_ERROR, routeApiMessage.internalError);

    if (apiError.statusCode >= StatusCodes.INTERNAL_SERVER_ERROR) {
        const detail = err instanceof Error ? err.message : String(err);
        logger.error(`${req.method} ${req.originalUrl} -> ${apiError.statusCode}: ${detail}`);
    }

    res.status(apiError.statusCode).json(apiError);
}

export default globalErrorHandler;
