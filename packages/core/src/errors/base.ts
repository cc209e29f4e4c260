/**
 * Base error class for Junction.
 */

import { ServerResponse } from "../message/response.ts";
import type { ErrorResponse } from "./types.ts";

/**
 * An error that knows the HTTP answer it stands for.
 *
 * Middleware may throw it, and the router and method maps use its
 * subclasses to render their own 404 and 405 outcomes, so every error
 * body has the same shape.
 *
 * @example
 * ```typescript
 * throw new JunctionError("Out of cats", 503, "NO_CATS");
 * ```
 */
export class JunctionError extends Error {
  readonly status: number;
  /** Machine-readable code, e.g. `NOT_FOUND` */
  readonly code: string;
  /** Shown in development mode only */
  readonly details?: unknown;
  /** False for programming and wiring errors, which are logged with a stack */
  readonly isOperational: boolean;

  constructor(
    message: string,
    status = 500,
    code = "INTERNAL_ERROR",
    details?: unknown,
    isOperational = true,
  ) {
    super(message);
    this.name = "JunctionError";
    this.status = status;
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(development = false): ErrorResponse {
    const error: ErrorResponse["error"] = {
      message: this.message,
      code: this.code,
      status: this.status,
    };
    if (!development) {
      return { error };
    }

    if (this.details !== undefined) error.details = this.details;
    if (this.stack) error.stack = this.stack.split("\n").map((l) => l.trim());
    return { error };
  }

  /**
   * Render this error onto a response from the middleware chain.
   *
   * Headers already on the response are kept.
   */
  applyTo(response: ServerResponse, development = false): ServerResponse {
    return response
      .withStatus(this.status)
      .withJson(this.toJSON(development));
  }

  toResponse(development = false): Response {
    return this.applyTo(new ServerResponse(), development).toResponse();
  }
}
