/**
 * Request logging middleware.
 */

import type { Middleware } from "../../dispatching/types.ts";
import type { Logger } from "../../logger/types.ts";

/**
 * Create request logging middleware.
 *
 * Logs method, path, status and duration once downstream middleware
 * has produced a response.
 *
 * @example
 * ```typescript
 * server.add(requestLogger(logger));
 * // INFO  request method=GET path=/cats status=200 durationMs=3
 * ```
 */
export function requestLogger(logger: Logger): Middleware {
  return {
    async dispatch(request, response, next) {
      const start = Date.now();
      const result = await next(request, response);

      logger.info("request", {
        method: request.method,
        path: request.getPath(),
        status: result.status,
        durationMs: Date.now() - start,
      });

      return result;
    },
  };
}
