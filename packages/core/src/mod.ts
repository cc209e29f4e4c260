/**
 * Junction Core
 */

export { Server } from "./app/mod.ts";
export type { ListeningServer, ListenOptions, ServerOptions } from "./app/mod.ts";

export {
  configFromEnv,
  LogLevelSchema,
  ServerConfigSchema,
  validateConfig,
} from "./config/mod.ts";
export type { Env, ServerConfig } from "./config/mod.ts";

export {
  Dispatcher,
  DispatchStack,
  isMiddleware,
  returnResponse,
} from "./dispatching/mod.ts";
export type {
  DispatcherOptions,
  Middleware,
  MiddlewareFactory,
  MiddlewareFn,
  MiddlewareRef,
  Next,
} from "./dispatching/mod.ts";

export {
  ConfigurationError,
  defaultErrorTransformer,
  errorToResponse,
  InternalError,
  isOperationalError,
  JunctionError,
  MethodNotAllowedError,
  NotFoundError,
  UnauthorizedError,
} from "./errors/mod.ts";
export type {
  ErrorResponse,
  ErrorToResponseOptions,
  ErrorTransformer,
  ValidationIssue,
} from "./errors/mod.ts";

export { createLogger, isLogger } from "./logger/mod.ts";
export type {
  LogDestination,
  Logger,
  LoggerConfig,
  LogLevel,
} from "./logger/mod.ts";

export { pathOf, ServerRequest, ServerResponse } from "./message/mod.ts";
export type { ResponseBody, ServerResponseInit } from "./message/mod.ts";

export { errorHandler, requestLogger } from "./middleware/mod.ts";
export type { ErrorHandlerOptions } from "./middleware/mod.ts";

export {
  ANY_METHOD,
  MethodMap,
  Route,
  RouteFactory,
  Router,
} from "./routing/mod.ts";
export type {
  PathVariables,
  RouteInfo,
  RouteMatch,
  RouteMatcher,
  RouterOptions,
  RouteType,
} from "./routing/mod.ts";
