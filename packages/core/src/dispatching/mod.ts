/**
 * Middleware dispatching - reference normalization and ordered stacks.
 */

export { Dispatcher, isMiddleware } from "./dispatcher.ts";
export type { DispatcherOptions } from "./dispatcher.ts";
export { DispatchStack } from "./stack.ts";
export { returnResponse } from "./next.ts";
export type {
  Middleware,
  MiddlewareFactory,
  MiddlewareFn,
  MiddlewareRef,
  Next,
} from "./types.ts";
