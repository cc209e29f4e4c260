/**
 * Errors module - structured error handling.
 */

export { JunctionError } from "./base.ts";
export {
  ConfigurationError,
  InternalError,
  MethodNotAllowedError,
  NotFoundError,
  UnauthorizedError,
} from "./http.ts";
export {
  defaultErrorTransformer,
  errorToResponse,
  isOperationalError,
} from "./transformer.ts";
export type { ErrorToResponseOptions } from "./transformer.ts";
export type {
  ErrorResponse,
  ErrorTransformer,
  ValidationIssue,
} from "./types.ts";
