import type { ServerConfig } from "../config/schema.ts";
import { validateConfig } from "../config/validate.ts";
import { Dispatcher } from "../dispatching/dispatcher.ts";
import { returnResponse } from "../dispatching/next.ts";
import { DispatchStack } from "../dispatching/stack.ts";
import type { MiddlewareRef } from "../dispatching/types.ts";
import {
  defaultErrorTransformer,
  type ErrorTransformer,
} from "../errors/mod.ts";
import { createLogger } from "../logger/logger.ts";
import type { Logger } from "../logger/types.ts";
import { ServerRequest } from "../message/request.ts";
import { ServerResponse } from "../message/response.ts";
import { Router } from "../routing/router.ts";
import { serve } from "./listen.ts";
import type { ListenOptions, ListeningServer, ServerOptions } from "./types.ts";

/**
 * Outermost harness: a root DispatchStack plus conversion to and from
 * fetch Request/Response.
 *
 * Middleware errors end up here. They are logged and answered with a JSON
 * error body; details and stack traces are included in development mode.
 *
 * @example
 * ```typescript
 * const server = new Server({ logLevel: "debug" });
 * const router = server.createRouter();
 *
 * router.register("GET", "/cats/{id}", (req, res) =>
 *   res.withJson({ id: req.getAttribute("id") }));
 *
 * server.add(requestLogger(server.logger)).add(router);
 *
 * await server.listen({ port: 8080 });
 * ```
 */
export class Server {
  readonly config: ServerConfig;
  readonly logger: Logger;
  readonly dispatcher: Dispatcher;
  private readonly stack: DispatchStack;
  private readonly errorTransformer: ErrorTransformer;

  /**
   * @throws {ConfigurationError} If the settings do not validate
   */
  constructor(options: ServerOptions = {}) {
    const { dispatcher, registry, logger, errorTransformer, ...config } =
      options;

    this.config = validateConfig(config);
    this.logger = logger ?? createLogger({
      name: "junction",
      level: this.config.logLevel ?? "info",
      json: this.config.logJson ?? false,
    });
    this.dispatcher = dispatcher ?? new Dispatcher();
    for (const [name, factory] of Object.entries(registry ?? {})) {
      this.dispatcher.register(name, factory);
    }
    this.errorTransformer = errorTransformer ?? defaultErrorTransformer;
    this.stack = new DispatchStack(this.dispatcher);
  }

  /**
   * Append middleware to the root stack.
   */
  add(middleware: MiddlewareRef): this {
    this.stack.add(middleware);
    return this;
  }

  /**
   * Create a router sharing this server's dispatcher, logger and
   * path-variable setting.
   */
  createRouter(): Router {
    return new Router({
      dispatcher: this.dispatcher,
      pathVariablesAttributeName: this.config.pathVariablesAttributeName,
      logger: this.logger.child({ name: "router" }),
    });
  }

  /**
   * Run the root stack for a request, starting from an empty 200 response.
   */
  respond(request: ServerRequest): Promise<ServerResponse> {
    return this.stack.dispatch(request, new ServerResponse(), returnResponse);
  }

  fetch = async (request: Request): Promise<Response> => {
    const serverRequest = ServerRequest.from(request);
    try {
      const response = await this.respond(serverRequest);
      return response.toResponse();
    } catch (error) {
      return this.handleError(error, serverRequest);
    }
  };

  listen(options: ListenOptions = {}): Promise<ListeningServer> {
    return serve(this.fetch, {
      port: options.port ?? this.config.port ?? 8000,
      hostname: options.hostname ?? this.config.hostname ?? "0.0.0.0",
      onListen: options.onListen,
      logger: this.logger,
    });
  }

  private handleError(error: unknown, request: ServerRequest): Response {
    const err = this.errorTransformer(error);
    const data = {
      method: request.method,
      path: request.getPath(),
      status: err.status,
      code: err.code,
    };

    this.logger.error(
      err.message,
      err.isOperational ? data : { ...data, stack: err.stack },
    );

    return err.toResponse(this.config.development ?? false);
  }
}
