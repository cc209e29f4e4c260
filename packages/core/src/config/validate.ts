import { Value } from "@sinclair/typebox/value";
import { ConfigurationError } from "../errors/mod.ts";
import type { ValidationIssue } from "../errors/mod.ts";
import { type ServerConfig, ServerConfigSchema } from "./schema.ts";

/**
 * Check server settings against the schema.
 *
 * @throws {ConfigurationError} Listing every failing field
 */
export function validateConfig(config: unknown): ServerConfig {
  if (Value.Check(ServerConfigSchema, config)) {
    return config;
  }

  const issues: ValidationIssue[] = [
    ...Value.Errors(ServerConfigSchema, config),
  ].map((err) => ({
    field: err.path.replace(/^\//, "").replace(/\//g, ".") || "(root)",
    message: err.message,
    code: String(err.type),
  }));

  const summary = issues
    .map((issue) => `${issue.field}: ${issue.message}`)
    .join(", ");
  throw new ConfigurationError(`Invalid configuration: ${summary}`, issues);
}
