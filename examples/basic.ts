/**
 * Basic routing: static, prefix, template and regex targets.
 *
 * Run with: npx tsx examples/basic.ts
 */

import { configFromEnv, requestLogger, Server } from "@junction/core";

const server = new Server(configFromEnv());
const router = server.createRouter();

const cats = new Map([
  ["1", { id: "1", name: "Molly" }],
  ["2", { id: "2", name: "Oscar" }],
]);

router
  .register("GET", "/", (_req, res) => res.withText("Hello from Junction!"))
  .register("GET", "/cats", (_req, res) => res.withJson([...cats.values()]))
  .register("GET", "/cats/{id}", (req, res) => {
    const cat = cats.get(String(req.getAttribute("id")));
    return cat ? res.withJson(cat) : res.withStatus(404);
  })
  .register("GET", "~^/years/(?<year>\\d{4})$~", (req, res) =>
    res.withJson({ year: Number(req.getAttribute("year")) }))
  .register("GET,HEAD", "/static/*", (req, res) =>
    res.withText(`static file: ${req.getPath()}`));

server.add(requestLogger(server.logger)).add(router);

await server.listen();
