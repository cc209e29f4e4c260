export { Server } from "./server.ts";
export type { ListeningServer, ListenOptions, ServerOptions } from "./types.ts";
