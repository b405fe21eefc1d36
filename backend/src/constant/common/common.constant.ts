export const DATASTORE = {
  REDIS: "redis",
  MYSQL: "mysql",
} as const;

export const BACKOFF = {
  CONSTANT: "constant",
  EXPONENTIAL: "exponential",
} as const;

export const SERVICE_STATE = {
  STARTING: "Starting",
  READY: "Ready",
} as const;

export const DEFAULT_HTTP_PORT = {
  [DATASTORE.REDIS]: 5001,
  [DATASTORE.MYSQL]: 5002,
} as const;

export type Datastore = (typeof DATASTORE)[keyof typeof DATASTORE];
export type Backoff = (typeof BACKOFF)[keyof typeof BACKOFF];
export type ServiceState = (typeof SERVICE_STATE)[keyof typeof SERVICE_STATE];
