import validateEnv from "./config.validator";

export type { EnvVars } from "./config.validator";
export { validateEnv }
