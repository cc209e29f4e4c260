/**
 * Error handling middleware.
 */

import type { Middleware } from "../../dispatching/types.ts";
import {
  defaultErrorTransformer,
  type ErrorTransformer,
} from "../../errors/mod.ts";
import type { Logger } from "../../logger/types.ts";
import type { ServerRequest } from "../../message/request.ts";
import type { ServerResponse } from "../../message/response.ts";

export interface ErrorHandlerOptions {
  /** Include details and stack traces in error bodies. */
  development?: boolean;
  transformer?: ErrorTransformer;
  logger?: Logger;
  /** Custom rendering; replaces the default JSON body. */
  onError?: (
    error: unknown,
    request: ServerRequest,
    response: ServerResponse,
  ) => ServerResponse | Promise<ServerResponse>;
}

/**
 * Create error handling middleware.
 *
 * Catches errors from downstream middleware and converts them to error
 * responses. Nothing upstream of it is covered, so add it first.
 *
 * @example
 * ```typescript
 * server.add(errorHandler({ development: true, logger }));
 * ```
 */
export function errorHandler(options: ErrorHandlerOptions = {}): Middleware {
  const transformer = options.transformer ?? defaultErrorTransformer;

  return {
    async dispatch(request, response, next) {
      try {
        return await next(request, response);
      } catch (error) {
        if (options.onError) {
          return await options.onError(error, request, response);
        }

        const err = transformer(error);
        if (!err.isOperational) {
          options.logger?.error("request failed", {
            method: request.method,
            path: request.getPath(),
            error: err.message,
          });
        }

        return err.applyTo(response, options.development ?? false);
      }
    },
  };
}
