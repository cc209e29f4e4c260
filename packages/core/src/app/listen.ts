import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import type { Logger } from "../logger/types.ts";
import type { ListeningServer } from "./types.ts";

type FetchHandler = (request: Request) => Promise<Response>;

interface ServeOptions {
  port: number;
  hostname: string;
  onListen?: (params: { hostname: string; port: number }) => void;
  logger: Logger;
}

async function toRequest(
  incoming: IncomingMessage,
  fallbackHost: string,
): Promise<Request> {
  const method = incoming.method ?? "GET";
  const url = new URL(
    incoming.url ?? "/",
    `http://${incoming.headers.host ?? fallbackHost}`,
  );

  const headers = new Headers();
  for (const [name, value] of Object.entries(incoming.headers)) {
    if (Array.isArray(value)) {
      for (const v of value) headers.append(name, v);
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }

  if (method === "GET" || method === "HEAD") {
    return new Request(url, { method, headers });
  }

  const chunks: Buffer[] = [];
  for await (const chunk of incoming) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return new Request(url, {
    method,
    headers,
    body: new Uint8Array(Buffer.concat(chunks)),
  });
}

async function writeResponse(
  response: Response,
  outgoing: ServerResponse,
): Promise<void> {
  outgoing.statusCode = response.status;
  response.headers.forEach((value, name) => {
    if (name !== "set-cookie") outgoing.setHeader(name, value);
  });
  // One header line per cookie.
  const cookies = response.headers.getSetCookie();
  if (cookies.length > 0) outgoing.setHeader("set-cookie", cookies);
  const body = response.body ? Buffer.from(await response.arrayBuffer()) : null;
  outgoing.end(body ?? undefined);
}

/**
 * Bind a fetch-style handler to a node:http server.
 *
 * Bodies are buffered in both directions.
 */
export function serve(
  handler: FetchHandler,
  options: ServeOptions,
): Promise<ListeningServer> {
  const fallbackHost = `${options.hostname}:${options.port}`;

  const server = createServer((incoming, outgoing) => {
    toRequest(incoming, fallbackHost)
      .then(handler)
      .then((response) => writeResponse(response, outgoing))
      .catch((error: unknown) => {
        options.logger.error("failed to serve request", {
          error: error instanceof Error ? error.message : String(error),
        });
        if (!outgoing.headersSent) {
          outgoing.statusCode = 500;
        }
        outgoing.end();
      });
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, options.hostname, () => {
      server.off("error", reject);
      const address = server.address();
      const port = isAddressInfo(address) ? address.port : options.port;
      const params = { hostname: options.hostname, port };

      if (options.onListen) {
        options.onListen(params);
      } else {
        options.logger.info("listening", params);
      }

      resolve({
        ...params,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((error) => (error ? fail(error) : done()));
            server.closeIdleConnections();
          }),
      });
    });
  });
}

function isAddressInfo(value: unknown): value is AddressInfo {
  return typeof value === "object" && value !== null && "port" in value;
}
