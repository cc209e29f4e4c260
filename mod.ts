/**
 * Junction - HTTP routing with continuation-passing middleware.
 *
 * @example
 * ```typescript
 * import { Server } from "@junction/core";
 *
 * const server = new Server();
 * const router = server.createRouter();
 *
 * router.register("GET", "/", (_req, res) => res.withText("Hello from Junction!"));
 *
 * server.add(router);
 * await server.listen({ port: 8000 });
 * ```
 *
 * @module
 */

export * from "@junction/core";
