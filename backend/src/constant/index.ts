export { DATASTORE, BACKOFF, SERVICE_STATE, DEFAULT_HTTP_PORT } from "./common/common.constant";
export type { Datastore, Backoff, ServiceState } from "./common/common.constant";
