/**
 * Routing engine: route classification, method maps and the router.
 */

export { Router } from "./router.ts";
export type { RouterOptions } from "./router.ts";
export { Route } from "./route.ts";
export { ANY_METHOD, MethodMap } from "./method_map.ts";
export {
  compileRegex,
  compileTemplate,
  EMPTY_VARIABLES,
  parseDelimitedRegex,
  prefixOf,
  RouteFactory,
} from "./factory.ts";
export type {
  PathVariables,
  RouteInfo,
  RouteMatch,
  RouteMatcher,
  RouteType,
} from "./types.ts";
