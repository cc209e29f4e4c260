/**
 * Middleware stacks: wrapping, short-circuiting and named middleware.
 *
 * Run with: npx tsx examples/middleware.ts
 */

import {
  errorHandler,
  type Middleware,
  type MiddlewareFn,
  requestLogger,
  Server,
  UnauthorizedError,
} from "@junction/core";

const timing: Middleware = {
  async dispatch(request, response, next) {
    const start = performance.now();
    const result = await next(request, response);
    return result.withHeader(
      "Server-Timing",
      `app;dur=${(performance.now() - start).toFixed(1)}`,
    );
  },
};

const requireToken: MiddlewareFn = (request, response, next) => {
  if (request.getHeader("Authorization") !== "Bearer test-token") {
    throw new UnauthorizedError();
  }
  return next(request.withAttribute("user", "demo"), response);
};

const server = new Server({
  development: true,
  registry: { auth: () => requireToken },
});
const router = server.createRouter();

router
  .register("GET", "/public", (_req, res) => res.withText("anyone"))
  .register("GET", "/private/*", [
    "auth",
    (req, res) => res.withText(`hello ${String(req.getAttribute("user"))}`),
  ]);

server
  .add(errorHandler({ development: true, logger: server.logger }))
  .add(requestLogger(server.logger))
  .add(timing)
  .add(router);

await server.listen({ port: 8001 });
