import { type Static, Type } from "@sinclair/typebox";

export const LogLevelSchema = Type.Union([
  Type.Literal("trace"),
  Type.Literal("debug"),
  Type.Literal("info"),
  Type.Literal("warn"),
  Type.Literal("error"),
  Type.Literal("fatal"),
  Type.Literal("silent"),
]);

/**
 * Plain-data server settings. Collaborators (dispatcher, logger) are
 * passed beside these and are not validated.
 */
export const ServerConfigSchema = Type.Object({
  pathVariablesAttributeName: Type.Optional(Type.String({ minLength: 1 })),
  development: Type.Optional(Type.Boolean()),
  logLevel: Type.Optional(LogLevelSchema),
  logJson: Type.Optional(Type.Boolean()),
  port: Type.Optional(Type.Integer({ minimum: 1, maximum: 65535 })),
  hostname: Type.Optional(Type.String({ minLength: 1 })),
});

export type ServerConfig = Static<typeof ServerConfigSchema>;
