import type { Next } from "./types.ts";

/**
 * Continuation that ends processing, returning the response unchanged.
 */
export const returnResponse: Next = (_request, response) =>
  Promise.resolve(response);
