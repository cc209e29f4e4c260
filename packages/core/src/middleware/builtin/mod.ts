/**
 * Built-in middleware.
 */

export { errorHandler } from "./error-handler.ts";
export type { ErrorHandlerOptions } from "./error-handler.ts";
export { requestLogger } from "./logger.ts";
