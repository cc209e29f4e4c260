/**
 * Type definitions for the routing module.
 */

import type { Route } from "./route.ts";

/**
 * How a route matches paths, decided once when the route is created.
 *
 * - `static`: one literal path
 * - `prefix`: any path starting with a literal prefix (target ends in `*`)
 * - `pattern`: a URI template (`/cats/{id}`) or a delimited regular
 *   expression (`~^/cats/(\d+)$~`)
 */
export type RouteType = "static" | "prefix" | "pattern";

/**
 * Values extracted from the path by a pattern route.
 */
export type PathVariables = Readonly<Record<string, string>>;

/**
 * Tests a path. Returns the extracted variables, or null when the path
 * does not match.
 */
export type RouteMatcher = (path: string) => PathVariables | null;

/**
 * Result of resolving a path against a router.
 */
export interface RouteMatch {
  route: Route;
  variables: PathVariables;
}

/**
 * Registered route, as listed by `Router.getRoutes()`.
 */
export interface RouteInfo {
  target: string;
  type: RouteType;
  methods: string[];
}
