/**
 * Server configuration: schema, validation and environment loading.
 */

export { LogLevelSchema, ServerConfigSchema } from "./schema.ts";
export type { ServerConfig } from "./schema.ts";
export { validateConfig } from "./validate.ts";
export { configFromEnv } from "./env.ts";
export type { Env } from "./env.ts";
