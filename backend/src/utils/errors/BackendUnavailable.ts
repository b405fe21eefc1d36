import { StatusCodes } from "http-status-codes";
import ApiErrorResponse from "../api-response/ApiErrorResponse";

/**
 * A datastore operation failed: connection refused or reset, auth rejected,
 * timed out, or answered with something unusable. Surfaces as a 503 for the
 * request that hit it; the process keeps serving.
 */
class BackendUnavailable extends ApiErrorResponse {
    constructor(reason: string, cause?: unknown) {
        super(StatusCodes.SERVICE_UNAVAILABLE, `Backend unavailable: ${reason}`);
        this.name = "BackendUnavailable";
        this.cause = cause;
    }

    static from(operation: string, error: unknown): BackendUnavailable {
        if (error instanceof BackendUnavailable) return error;
        const reason = error instanceof Error ? error.message : String(error);
        return new BackendUnavailable(`${operation} failed: ${reason}`, error);
    }
}

export default BackendUnavailable;
