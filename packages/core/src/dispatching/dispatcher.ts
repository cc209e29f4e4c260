/**
 * Normalizes middleware references into something that can be invoked.
 */

import { ConfigurationError } from "../errors/mod.ts";
import type { ServerRequest } from "../message/request.ts";
import { ServerResponse } from "../message/response.ts";
import { DispatchStack } from "./stack.ts";
import type {
  Middleware,
  MiddlewareFactory,
  MiddlewareRef,
  Next,
} from "./types.ts";

export interface DispatcherOptions {
  /** Named middleware, resolved when a string reference is dispatched. */
  registry?: Record<string, MiddlewareFactory>;
}

export function isMiddleware(value: unknown): value is Middleware {
  return (
    typeof value === "object" &&
    value !== null &&
    "dispatch" in value &&
    typeof value.dispatch === "function"
  );
}

/**
 * Dispatcher for middleware references.
 *
 * @example
 * ```typescript
 * const dispatcher = new Dispatcher({
 *   registry: { auth: () => new AuthMiddleware() },
 * });
 *
 * const response = await dispatcher.dispatch(
 *   ["auth", (req, res) => res.withText("hello")],
 *   request,
 *   new ServerResponse(),
 *   async (_req, res) => res,
 * );
 * ```
 */
export class Dispatcher {
  private registry: Map<string, MiddlewareFactory>;

  constructor(options: DispatcherOptions = {}) {
    this.registry = new Map(Object.entries(options.registry ?? {}));
  }

  /**
   * Register a named middleware factory.
   */
  register(name: string, factory: MiddlewareFactory): this {
    this.registry.set(name, factory);
    return this;
  }

  has(name: string): boolean {
    return this.registry.has(name);
  }

  /**
   * Run a middleware reference.
   *
   * @throws {ConfigurationError} If a string reference names nothing registered
   */
  async dispatch(
    middleware: MiddlewareRef,
    request: ServerRequest,
    response: ServerResponse,
    next: Next,
  ): Promise<ServerResponse> {
    if (typeof middleware === "string") {
      return this.dispatch(this.resolve(middleware), request, response, next);
    }

    if (isMiddlewareList(middleware)) {
      const stack = new DispatchStack(this);
      for (const item of middleware) {
        stack.add(item);
      }
      return stack.dispatch(request, response, next);
    }

    if (isMiddleware(middleware)) {
      return middleware.dispatch(request, response, next);
    }

    const result = await middleware(request, response, next);
    if (result instanceof ServerResponse) {
      return result;
    }
    return result.dispatch(request, response, next);
  }

  private resolve(name: string): MiddlewareRef {
    const factory = this.registry.get(name);
    if (!factory) {
      throw new ConfigurationError(`Unknown middleware: ${name}`);
    }
    return factory();
  }
}

function isMiddlewareList(
  value: MiddlewareRef,
): value is readonly MiddlewareRef[] {
  return Array.isArray(value);
}
