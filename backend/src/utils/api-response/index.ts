import ApiErrorResponse from "./ApiErrorResponse";
import { counterApiMessage, versionApiMessage, routeApiMessage } from "./counter.apiMessages";

export { ApiErrorResponse, counterApiMessage, versionApiMessage, routeApiMessage }
