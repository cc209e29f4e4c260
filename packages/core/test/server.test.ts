import { afterEach, describe, expect, it } from "vitest";
import { Server } from "../src/app/mod.ts";
import type { ListeningServer } from "../src/app/mod.ts";
import type { Middleware } from "../src/dispatching/mod.ts";
import { ConfigurationError, NotFoundError } from "../src/errors/mod.ts";
import { createLogger } from "../src/logger/mod.ts";
import { ServerRequest } from "../src/message/mod.ts";

function quietServer(options: ConstructorParameters<typeof Server>[0] = {}) {
  const lines: string[] = [];
  const logger = createLogger({
    json: true,
    destination: { write: (line) => lines.push(line) },
  });
  return { lines, server: new Server({ ...options, logger }) };
}

describe("Server", () => {
  it("should reject invalid configuration", () => {
    expect(() => new Server({ port: 70000 })).toThrow(ConfigurationError);
  });

  it("should answer 200 with an empty body when no middleware is added", async () => {
    const { server } = quietServer();

    const response = await server.fetch(new Request("http://localhost/"));

    expect(response.status).toBe(200);
    expect(await response.text()).toBe("");
  });

  it("should route requests through a router", async () => {
    const { server } = quietServer();
    const router = server.createRouter();
    router.register("GET", "/cats/{id}", (req, res) =>
      res.withJson({ id: req.getAttribute("id") }));
    server.add(router);

    const response = await server.fetch(
      new Request("http://localhost/cats/42?verbose=1"),
    );

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ id: "42" });
  });

  it("should answer 404 for unrouted paths", async () => {
    const { server } = quietServer();
    server.add(server.createRouter());

    const response = await server.fetch(new Request("http://localhost/nope"));

    expect(response.status).toBe(404);
  });

  it("should answer 405 with Allow for unrouted methods", async () => {
    const { server } = quietServer();
    const router = server.createRouter();
    router.register("GET", "/cats", (_req, res) => res.withText("cats"));
    server.add(router);

    const response = await server.fetch(
      new Request("http://localhost/cats", { method: "POST", body: "{}" }),
    );

    expect(response.status).toBe(405);
    expect(response.headers.get("Allow")).toBe("GET, HEAD, OPTIONS");
  });

  it("should share its path-variable setting with routers", async () => {
    const { server } = quietServer({ pathVariablesAttributeName: "vars" });
    const router = server.createRouter();
    router.register("GET", "/cats/{id}", (req, res) =>
      res.withJson(req.getAttribute("vars")));
    server.add(router);

    const response = await server.fetch(new Request("http://localhost/cats/7"));

    expect(await response.json()).toEqual({ id: "7" });
  });

  it("should share its registry with routers", async () => {
    const { server } = quietServer({
      registry: {
        hello: () => (_req, res) => res.withText("hi from registry"),
      },
    });
    server.add(server.createRouter().register("GET", "/", "hello"));

    const response = await server.fetch(new Request("http://localhost/"));

    expect(await response.text()).toBe("hi from registry");
  });

  it("should run root middleware around the router", async () => {
    const { server } = quietServer();
    const poweredBy: Middleware = {
      async dispatch(request, response, next) {
        const result = await next(request, response);
        return result.withHeader("X-Powered-By", "junction");
      },
    };
    const router = server.createRouter();
    router.register("GET", "/", (_req, res) => res.withText("home"));
    server.add(poweredBy).add(router);

    const response = await server.fetch(new Request("http://localhost/"));

    expect(response.headers.get("X-Powered-By")).toBe("junction");
    expect(await response.text()).toBe("home");
  });

  it("should turn thrown errors into JSON error responses", async () => {
    const { server, lines } = quietServer();
    server.add(() => {
      throw new Error("kaput");
    });

    const response = await server.fetch(new Request("http://localhost/x"));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      error: { message: "kaput", code: "INTERNAL_ERROR", status: 500 },
    });
    const entry = JSON.parse(lines[0]);
    expect(entry.level).toBe("error");
    expect(entry.path).toBe("/x");
  });

  it("should log operational errors at error level without a stack", async () => {
    const { server, lines } = quietServer();
    server.add(() => {
      throw new NotFoundError("No such cat");
    });

    const response = await server.fetch(new Request("http://localhost/cats/9"));

    expect(response.status).toBe(404);
    const entry = JSON.parse(lines[0]);
    expect(entry.level).toBe("error");
    expect(entry.msg).toBe("No such cat");
    expect(entry.code).toBe("NOT_FOUND");
    expect(entry.stack).toBeUndefined();
  });

  it("should include details in development mode", async () => {
    const { server } = quietServer({ development: true });
    server.add(() => {
      throw new NotFoundError("No such cat", { id: "9" });
    });

    const response = await server.fetch(new Request("http://localhost/"));
    expect(await response.json()).toMatchObject({
      error: { code: "NOT_FOUND", details: { id: "9" } },
    });
  });

  it("should report unknown middleware names as configuration errors", async () => {
    const { server } = quietServer();
    server.add("missing");

    const response = await server.fetch(new Request("http://localhost/"));

    expect(response.status).toBe(500);
    expect(await response.json()).toMatchObject({
      error: { code: "CONFIGURATION_ERROR", status: 500 },
    });
  });

  it("should respond to ServerRequests directly", async () => {
    const { server } = quietServer();
    server.add((_req, res) => res.withStatus(202));

    const response = await server.respond(new ServerRequest({ target: "/" }));

    expect(response.status).toBe(202);
  });
});

describe("Server.listen()", () => {
  let listening: ListeningServer | null = null;

  afterEach(async () => {
    await listening?.close();
    listening = null;
  });

  async function start(server: Server): Promise<string> {
    const handle = await server.listen({ port: 0, hostname: "127.0.0.1" });
    listening = handle;
    return `http://127.0.0.1:${handle.port}`;
  }

  it("should bind to a free port and log it", async () => {
    const { server, lines } = quietServer();

    await start(server);

    expect(listening?.hostname).toBe("127.0.0.1");
    expect(listening?.port).toBeGreaterThan(0);
    const entry = JSON.parse(lines[0]);
    expect(entry.msg).toBe("listening");
    expect(entry.port).toBe(listening?.port);
  });

  it("should hand the bound address to onListen", async () => {
    const { server, lines } = quietServer();
    const seen: { hostname: string; port: number }[] = [];

    const handle = await server.listen({
      port: 0,
      hostname: "127.0.0.1",
      onListen: (params) => seen.push(params),
    });
    listening = handle;

    expect(seen).toEqual([{ hostname: "127.0.0.1", port: handle.port }]);
    expect(lines).toEqual([]);
  });

  it("should pass request bodies through", async () => {
    const { server } = quietServer();
    const router = server.createRouter();
    router.register("POST", "/echo", async (req, res) =>
      res.withText(`got ${req.raw ? await req.raw.text() : ""}`));
    server.add(router);
    const url = await start(server);

    const response = await fetch(`${url}/echo`, {
      method: "POST",
      body: "whiskers",
    });

    expect(response.status).toBe(200);
    expect(await response.text()).toBe("got whiskers");
  });

  it("should forward status and headers, one line per cookie", async () => {
    const { server } = quietServer();
    server.add((_req, res) =>
      res
        .withStatus(201)
        .withHeader("X-Cat", "tom")
        .withAddedHeader("Set-Cookie", "a=1")
        .withAddedHeader("Set-Cookie", "b=2")
        .withText("made"));
    const url = await start(server);

    const response = await fetch(`${url}/cats`);

    expect(response.status).toBe(201);
    expect(response.headers.get("X-Cat")).toBe("tom");
    expect(response.headers.get("Content-Type")).toBe(
      "text/plain; charset=utf-8",
    );
    expect(response.headers.getSetCookie()).toEqual(["a=1", "b=2"]);
    expect(await response.text()).toBe("made");
  });

  it("should answer unrouted paths with a JSON 404", async () => {
    const { server } = quietServer();
    server.add(server.createRouter());
    const url = await start(server);

    const response = await fetch(`${url}/nope?next=/x`);

    expect(response.status).toBe(404);
    expect(await response.text()).toBe(
      '{"error":{"message":"Not Found","code":"NOT_FOUND","status":404}}',
    );
  });

  it("should stop accepting connections once closed", async () => {
    const { server } = quietServer();
    const url = await start(server);
    const response = await fetch(url);
    await response.text();

    await listening?.close();
    listening = null;

    await expect(fetch(url)).rejects.toThrow();
  });
});
