import type { ServerConfig } from "../config/schema.ts";
import type { Dispatcher } from "../dispatching/dispatcher.ts";
import type { MiddlewareFactory } from "../dispatching/types.ts";
import type { ErrorTransformer } from "../errors/types.ts";
import type { Logger } from "../logger/types.ts";

export type ServerOptions = ServerConfig & {
  /** Dispatcher shared by the server and every router it creates. */
  dispatcher?: Dispatcher;
  /** Named middleware, added to the dispatcher's registry. */
  registry?: Record<string, MiddlewareFactory>;
  logger?: Logger;
  errorTransformer?: ErrorTransformer;
};

export interface ListenOptions {
  port?: number;
  hostname?: string;
  onListen?: (params: { hostname: string; port: number }) => void;
}

export interface ListeningServer {
  readonly hostname: string;
  readonly port: number;
  close(): Promise<void>;
}
