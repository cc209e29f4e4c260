/**
 * A single routing entry.
 */

import type { Dispatcher } from "../dispatching/dispatcher.ts";
import type { Middleware, Next } from "../dispatching/types.ts";
import type { ServerRequest } from "../message/request.ts";
import type { ServerResponse } from "../message/response.ts";
import { MethodMap } from "./method_map.ts";
import type { PathVariables, RouteMatcher, RouteType } from "./types.ts";

/**
 * Route for one registration target.
 *
 * The matcher is fixed at construction and matching keeps no state, so one
 * route serves any number of requests at once.
 */
export class Route implements Middleware {
  readonly methodMap: MethodMap;

  constructor(
    /** The string the route was registered with. */
    readonly target: string,
    readonly type: RouteType,
    private readonly matcher: RouteMatcher,
    dispatcher: Dispatcher,
    /** Template variable names, in order of appearance. */
    readonly variableNames: readonly string[] = [],
  ) {
    this.methodMap = new MethodMap(dispatcher);
  }

  match(path: string): PathVariables | null {
    return this.matcher(path);
  }

  dispatch(
    request: ServerRequest,
    response: ServerResponse,
    next: Next,
  ): Promise<ServerResponse> {
    return this.methodMap.dispatch(request, response, next);
  }
}
