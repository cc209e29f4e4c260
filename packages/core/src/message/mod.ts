/**
 * Request and response value objects.
 */

export { pathOf, ServerRequest } from "./request.ts";
export { ServerResponse } from "./response.ts";
export type { ResponseBody, ServerResponseInit } from "./response.ts";
