/**
 * Router: resolves a request to one route and dispatches its middleware.
 *
 * Resolution order:
 * 1. Static routes, by exact path (O(1) map lookup)
 * 2. Prefix routes, longest matching prefix wins
 * 3. Pattern routes, first registered match wins
 *
 * Static always outranks prefix, and prefix outranks pattern, whatever
 * order the routes were registered in.
 */

import { Dispatcher } from "../dispatching/dispatcher.ts";
import { returnResponse } from "../dispatching/next.ts";
import type { Middleware, MiddlewareRef, Next } from "../dispatching/types.ts";
import { NotFoundError } from "../errors/mod.ts";
import type { Logger } from "../logger/types.ts";
import type { ServerRequest } from "../message/request.ts";
import type { ServerResponse } from "../message/response.ts";
import { EMPTY_VARIABLES, prefixOf, RouteFactory } from "./factory.ts";
import type { Route } from "./route.ts";
import type { PathVariables, RouteInfo, RouteMatch } from "./types.ts";

export interface RouterOptions {
  /** Dispatcher used to run route middleware. */
  dispatcher?: Dispatcher;
  /**
   * When set, matched path variables are stored on the request as a single
   * attribute with this name. Otherwise each variable becomes its own
   * attribute.
   */
  pathVariablesAttributeName?: string;
  logger?: Logger;
}

/**
 * Router class for registering routes and dispatching requests to them.
 *
 * A Router is middleware: add it to a DispatchStack, or call `handle()`
 * directly.
 *
 * @example
 * ```typescript
 * const router = new Router();
 *
 * router.register("GET", "/cats", listCats);
 * router.register("GET,PUT,DELETE", "/cats/{id}", catResource);
 * router.register("GET", "/assets/*", serveAsset);
 *
 * const response = await router.handle(request, new ServerResponse());
 * ```
 */
export class Router implements Middleware {
  private readonly factory: RouteFactory;
  private readonly pathVariablesAttributeName: string | undefined;
  private readonly logger: Logger | undefined;
  // Every route, by the exact string it was registered with
  private readonly routes = new Map<string, Route>();
  private readonly staticRoutes = new Map<string, Route>();
  // Keyed by the target with its trailing "*" removed
  private readonly prefixRoutes = new Map<string, Route>();
  private readonly patternRoutes: Route[] = [];

  constructor(options: RouterOptions = {}) {
    this.factory = new RouteFactory(options.dispatcher ?? new Dispatcher());
    this.pathVariablesAttributeName = options.pathVariablesAttributeName;
    this.logger = options.logger;
  }

  /**
   * Register middleware for a target and method.
   *
   * `method` may be a single method ("GET"), a comma-separated list
   * ("GET,PUT,DELETE") or "*" for any method.
   *
   * `target` may be:
   * - an exact path ("/cats/")
   * - a prefix ending in "*" ("/cats/*")
   * - a URI template ("/cats/{id}")
   * - a delimited regular expression ("~^/cats/([0-9]+)$~")
   *
   * Registering a target again reuses its route and adds (or replaces)
   * method entries.
   *
   * @throws {ConfigurationError} If a regular expression target is invalid
   */
  register(method: string, target: string, middleware: MiddlewareRef): this {
    this.getRouteForTarget(target).methodMap.register(method, middleware);
    return this;
  }

  /**
   * Find the route for a path.
   *
   * The path must already be stripped of query string and fragment.
   */
  find(path: string): RouteMatch | null {
    const staticRoute = this.staticRoutes.get(path);
    if (staticRoute) {
      return { route: staticRoute, variables: EMPTY_VARIABLES };
    }

    const prefixRoute = this.getPrefixRoute(path);
    if (prefixRoute) {
      return { route: prefixRoute, variables: EMPTY_VARIABLES };
    }

    for (const route of this.patternRoutes) {
      const variables = route.match(path);
      if (variables) {
        return { route, variables };
      }
    }

    return null;
  }

  /**
   * Dispatch the request to the matching route.
   *
   * Answers with a NotFoundError body, without calling `next`, when no
   * route matches.
   */
  dispatch(
    request: ServerRequest,
    response: ServerResponse,
    next: Next,
  ): Promise<ServerResponse> {
    const match = this.find(request.getPath());
    if (!match) {
      return Promise.resolve(new NotFoundError().applyTo(response));
    }

    if (match.route.type === "pattern") {
      request = this.withPathVariables(request, match.variables);
    }

    return match.route.dispatch(request, response, next);
  }

  /**
   * Dispatch with a continuation that returns the response unchanged.
   */
  handle(
    request: ServerRequest,
    response: ServerResponse,
  ): Promise<ServerResponse> {
    return this.dispatch(request, response, returnResponse);
  }

  /**
   * Registered routes, in registration order.
   */
  getRoutes(): RouteInfo[] {
    return [...this.routes.values()].map((route) => ({
      target: route.target,
      type: route.type,
      methods: route.methodMap.getMethods(),
    }));
  }

  private withPathVariables(
    request: ServerRequest,
    variables: PathVariables,
  ): ServerRequest {
    if (this.pathVariablesAttributeName) {
      return request.withAttribute(this.pathVariablesAttributeName, {
        ...variables,
      });
    }

    for (const [name, value] of Object.entries(variables)) {
      request = request.withAttribute(name, value);
    }
    return request;
  }

  private getRouteForTarget(target: string): Route {
    const existing = this.routes.get(target);
    if (existing) return existing;

    const route = this.factory.create(target);
    this.routes.set(target, route);

    switch (route.type) {
      case "static":
        this.staticRoutes.set(target, route);
        break;
      case "prefix":
        this.prefixRoutes.set(prefixOf(target), route);
        break;
      case "pattern":
        this.patternRoutes.push(route);
        break;
    }

    this.logger?.debug("route registered", { target, type: route.type });
    return route;
  }

  private getPrefixRoute(path: string): Route | null {
    let best: Route | null = null;
    let bestLength = -1;

    for (const [prefix, route] of this.prefixRoutes) {
      if (prefix.length > bestLength && path.startsWith(prefix)) {
        best = route;
        bestLength = prefix.length;
      }
    }

    return best;
  }
}
