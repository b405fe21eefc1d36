import { NextFunction, Request, Response } from "express";
import { StatusCodes } from "http-status-codes";
import type { CounterService, VersionService } from "../services";
import { ApiErrorResponse } from "../utils/api-response";

function sendText(res: Response, message: string): void {
  res.status(StatusCodes.OK).type("text/plain").send(message);
}

// Backend failures keep their 503; anything else is a 500.
function forwardError(error: unknown, next: NextFunction): void {
  if (error instanceof ApiErrorResponse) {
    return next(error);
  }
  const msg = error instanceof Error ? error.message : String(error);
  next(new ApiErrorResponse(StatusCodes.INTERNAL_SERVER_ERROR, msg));
}

//---------- Welcome ----->
function greet(service: CounterService | VersionService) {
  return (req: Request, res: Response): void => {
    sendText(res, service.greet());
  };
}

//---------- Visit counter (key-value) ----->
function countVisit(service: CounterService) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      sendText(res, await service.countVisit());
    } catch (error) {
      forwardError(error, next);
    }
  };
}

//---------- Backend version (relational) ----->
function describeVersion(service: VersionService) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      sendText(res, await service.describe());
    } catch (error) {
      forwardError(error, next);
    }
  };
}

export { greet, countVisit, describeVersion }
