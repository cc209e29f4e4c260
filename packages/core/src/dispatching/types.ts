/**
 * Middleware type definitions.
 */

import type { ServerRequest } from "../message/request.ts";
import type { ServerResponse } from "../message/response.ts";

/**
 * Continuation: "the rest of the pipeline".
 *
 * Calling it continues processing; not calling it ends the chain.
 */
export type Next = (
  request: ServerRequest,
  response: ServerResponse,
) => Promise<ServerResponse>;

/**
 * Middleware object.
 *
 * @example
 * ```typescript
 * const poweredBy: Middleware = {
 *   async dispatch(request, response, next) {
 *     const result = await next(request, response);
 *     return result.withHeader("X-Powered-By", "junction");
 *   },
 * };
 * ```
 */
export interface Middleware {
  dispatch(
    request: ServerRequest,
    response: ServerResponse,
    next: Next,
  ): ServerResponse | Promise<ServerResponse>;
}

/**
 * Middleware function.
 *
 * Returns the response, or a Middleware object to dispatch in its place
 * (which lets a function act as a lazy factory).
 */
export type MiddlewareFn = (
  request: ServerRequest,
  response: ServerResponse,
  next: Next,
) =>
  | ServerResponse
  | Middleware
  | Promise<ServerResponse | Middleware>;

/**
 * Anything the Dispatcher knows how to run:
 * - a Middleware object,
 * - a middleware function,
 * - the name of a middleware registered with the Dispatcher,
 * - a list of references, run in order as a DispatchStack.
 */
export type MiddlewareRef =
  | Middleware
  | MiddlewareFn
  | string
  | readonly MiddlewareRef[];

/**
 * Creates the middleware registered under a name.
 */
export type MiddlewareFactory = () => Middleware | MiddlewareFn;
