/**
 * Ordered middleware, dispatched as a chain of continuations.
 */

import type { ServerRequest } from "../message/request.ts";
import type { ServerResponse } from "../message/response.ts";
import type { Dispatcher } from "./dispatcher.ts";
import type { Middleware, MiddlewareRef, Next } from "./types.ts";

/**
 * A DispatchStack is itself middleware, so stacks nest.
 *
 * Each middleware receives a `next` that dispatches the one after it; the
 * last one receives the `next` the stack itself was given. A middleware
 * that returns without calling `next` ends the chain, and the stack's own
 * `next` is then never called.
 *
 * @example
 * ```typescript
 * const stack = new DispatchStack(dispatcher)
 *   .add(cors)
 *   .add(router);
 *
 * const response = await stack.dispatch(request, response, next);
 * ```
 */
export class DispatchStack implements Middleware {
  private readonly stack: MiddlewareRef[] = [];

  constructor(private readonly dispatcher: Dispatcher) {}

  /**
   * Append middleware. Order of addition is order of execution.
   */
  add(middleware: MiddlewareRef): this {
    this.stack.push(middleware);
    return this;
  }

  get length(): number {
    return this.stack.length;
  }

  dispatch(
    request: ServerRequest,
    response: ServerResponse,
    next: Next,
  ): Promise<ServerResponse> {
    let chain = next;

    for (let i = this.stack.length - 1; i >= 0; i--) {
      const middleware = this.stack[i];
      const following = chain;
      chain = (req, res) =>
        this.dispatcher.dispatch(middleware, req, res, following);
    }

    return chain(request, response);
  }
}
