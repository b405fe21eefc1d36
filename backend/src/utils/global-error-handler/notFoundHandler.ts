import { NextFunction, Request, Response } from "express";
import { StatusCodes } from "http-status-codes";
import { ApiErrorResponse, routeApiMessage } from "../api-response";

function notFoundHandler(req: Request, res: Response, next: NextFunction): void {
    next(new ApiErrorResponse(StatusCodes.NOT_FOUND, routeApiMessage.routeNotFound(req.method, req.originalUrl)));
}

export default notFoundHandler;
