/**
 * Built-in middleware.
 */

export {
  errorHandler,
  type ErrorHandlerOptions,
  requestLogger,
} from "./builtin/mod.ts";
