import type { ServerConfig } from "./schema.ts";
import { validateConfig } from "./validate.ts";

export type Env = Record<string, string | undefined>;

function parseBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  // Left as a string so validation reports it
  return value;
}

function parseInteger(value: string | undefined): number | string | undefined {
  if (value === undefined) return undefined;
  return /^\d+$/.test(value.trim()) ? Number(value) : value;
}

/**
 * Read server settings from environment variables.
 *
 * | Variable                            | Setting                    |
 * | ----------------------------------- | -------------------------- |
 * | `JUNCTION_LOG_LEVEL`                | logLevel                   |
 * | `JUNCTION_LOG_JSON`                 | logJson                    |
 * | `JUNCTION_DEVELOPMENT`              | development                |
 * | `JUNCTION_PATH_VARIABLES_ATTRIBUTE` | pathVariablesAttributeName |
 * | `PORT`                              | port                       |
 * | `HOST`                              | hostname                   |
 *
 * Unset variables are left out.
 *
 * @throws {ConfigurationError} If a value does not validate
 */
export function configFromEnv(env: Env = process.env): ServerConfig {
  const raw: Record<string, unknown> = {
    logLevel: env.JUNCTION_LOG_LEVEL,
    logJson: parseBoolean(env.JUNCTION_LOG_JSON),
    development: parseBoolean(env.JUNCTION_DEVELOPMENT),
    pathVariablesAttributeName: env.JUNCTION_PATH_VARIABLES_ATTRIBUTE,
    port: parseInteger(env.PORT),
    hostname: env.HOST,
  };

  for (const key of Object.keys(raw)) {
    if (raw[key] === undefined) delete raw[key];
  }

  return validateConfig(raw);
}
