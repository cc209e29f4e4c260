/**
 * Per-route mapping from HTTP method to middleware.
 */

import type { Dispatcher } from "../dispatching/dispatcher.ts";
import type { Middleware, MiddlewareRef, Next } from "../dispatching/types.ts";
import { MethodNotAllowedError } from "../errors/mod.ts";
import type { ServerRequest } from "../message/request.ts";
import type { ServerResponse } from "../message/response.ts";

/** Method token that matches any method without its own entry. */
export const ANY_METHOD = "*";

export class MethodMap implements Middleware {
  private map = new Map<string, MiddlewareRef>();

  constructor(private readonly dispatcher: Dispatcher) {}

  /**
   * Register middleware for one or more methods.
   *
   * `methodSpec` may be a single method ("GET"), a comma-separated list
   * ("GET,PUT,DELETE") or "*" for any method. Tokens are trimmed and
   * upper-cased; registering a method again replaces its middleware.
   */
  register(methodSpec: string, middleware: MiddlewareRef): this {
    for (const token of methodSpec.split(",")) {
      const method = token.trim().toUpperCase();
      if (method) {
        this.map.set(method, middleware);
      }
    }
    return this;
  }

  /**
   * Resolve the middleware for a method.
   *
   * Returns null when nothing is registered for it; the caller answers
   * with 405 Method Not Allowed.
   */
  getMiddleware(method: string): MiddlewareRef | null {
    const key = method.toUpperCase();
    const exact = this.map.get(key);
    if (exact !== undefined) return exact;

    const any = this.map.get(ANY_METHOD);
    if (any !== undefined) return any;

    if (key === "HEAD") {
      return this.map.get("GET") ?? null;
    }
    return null;
  }

  /**
   * Method tokens in registration order, including "*".
   */
  getMethods(): string[] {
    return [...this.map.keys()];
  }

  /**
   * Value for the Allow header.
   */
  getAllowedMethods(): string[] {
    const allowed = this.getMethods().filter((m) => m !== ANY_METHOD);
    if (this.map.has("GET") && !allowed.includes("HEAD")) {
      allowed.push("HEAD");
    }
    if (!allowed.includes("OPTIONS")) {
      allowed.push("OPTIONS");
    }
    return allowed;
  }

  dispatch(
    request: ServerRequest,
    response: ServerResponse,
    next: Next,
  ): Promise<ServerResponse> {
    const middleware = this.getMiddleware(request.method);
    if (middleware !== null) {
      return this.dispatcher.dispatch(middleware, request, response, next);
    }

    const allowed = this.getAllowedMethods();
    if (request.method === "OPTIONS") {
      return Promise.resolve(
        response.withStatus(200).withHeader("Allow", allowed.join(", ")),
      );
    }
    return Promise.resolve(
      new MethodNotAllowedError(allowed).applyTo(response),
    );
  }
}
