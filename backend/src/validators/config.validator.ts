import Joi from "joi";
import { BACKOFF, DATASTORE, type Backoff, type Datastore } from "../constant";
import { ConfigError } from "../utils/errors";

export interface EnvVars {
  DATASTORE: Datastore;
  PORT?: number;
  HOST: string;
  REDIS_HOST: string;
  REDIS_PORT: number;
  REDIS_PASSWORD?: string;
  REDIS_DB: number;
  MYSQL_HOST: string;
  MYSQL_PORT: number;
  MYSQL_USER: string;
  MYSQL_PASSWORD: string;
  MYSQL_DATABASE: string;
  COUNTER_KEY: string;
  BACKEND_TIMEOUT_MS: number;
  STARTUP_MAX_ATTEMPTS: number;
  STARTUP_INITIAL_DELAY_MS: number;
  STARTUP_MAX_DELAY_MS: number;
  STARTUP_BACKOFF: Backoff;
}

const envSchema = Joi.object<EnvVars>({
  DATASTORE: Joi.string()
    .valid(...Object.values(DATASTORE))
    .default(DATASTORE.REDIS),

  PORT: Joi.number().port().optional(),
  HOST: Joi.string().trim().default("0.0.0.0"),

  // compose service name
  REDIS_HOST: Joi.string().trim().default("redis"),
  REDIS_PORT: Joi.number().port().default(6379),
  REDIS_PASSWORD: Joi.string().allow("").optional(),
  REDIS_DB: Joi.number().integer().min(0).default(0),

  MYSQL_HOST: Joi.string().trim().default("mysql"),
  MYSQL_PORT: Joi.number().port().default(3306),
  MYSQL_USER: Joi.string().trim().default("root"),
  MYSQL_PASSWORD: Joi.string().allow("").default("password"),
  MYSQL_DATABASE: Joi.string().trim().default("testdb"),

  COUNTER_KEY: Joi.string().trim().default("visits"),
  BACKEND_TIMEOUT_MS: Joi.number().integer().positive().default(2000),

  STARTUP_MAX_ATTEMPTS: Joi.number()
    .integer()
    .min(0)
    .default(0)
    .messages({
      "number.min": "STARTUP_MAX_ATTEMPTS must be 0 (retry forever) or a positive attempt count",
    }),
  STARTUP_INITIAL_DELAY_MS: Joi.number().integer().min(0).default(500),
  STARTUP_MAX_DELAY_MS: Joi.number().integer().min(0).default(10000),
  STARTUP_BACKOFF: Joi.string()
    .valid(...Object.values(BACKOFF))
    .default(BACKOFF.EXPONENTIAL),
}).unknown(true);

export default function validateEnv(env: NodeJS.ProcessEnv): EnvVars {
  const { error, value } = envSchema.validate(env);
  if (error) {
    throw new ConfigError(error.message);
  }
  return value;
}
