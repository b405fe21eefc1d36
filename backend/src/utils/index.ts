import { ApiErrorResponse } from "./api-response";
import globalErrorHandler from "./global-error-handler/globalErrorHandler";
import notFoundHandler from "./global-error-handler/notFoundHandler";
import { BackendUnavailable, DependencyUnreachable, ConfigError } from "./errors";
import { withTimeout, sleep } from "./timeout/withTimeout";

export { ApiErrorResponse, globalErrorHandler, notFoundHandler, BackendUnavailable, DependencyUnreachable, ConfigError, withTimeout, sleep }
