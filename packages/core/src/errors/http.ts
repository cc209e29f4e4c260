/**
 * HTTP and configuration error classes.
 */

import type { ServerResponse } from "../message/response.ts";
import { JunctionError } from "./base.ts";
import type { ValidationIssue } from "./types.ts";

/**
 * 401 Unauthorized error.
 */
export class UnauthorizedError extends JunctionError {
  constructor(message = "Unauthorized", details?: unknown) {
    super(message, 401, "UNAUTHORIZED", details);
    this.name = "UnauthorizedError";
  }
}

/**
 * 404 Not Found error.
 */
export class NotFoundError extends JunctionError {
  constructor(message = "Not Found", details?: unknown) {
    super(message, 404, "NOT_FOUND", details);
    this.name = "NotFoundError";
  }
}

/**
 * 405 Method Not Allowed error.
 *
 * Rendered with an `Allow` header listing `allowed`.
 */
export class MethodNotAllowedError extends JunctionError {
  readonly allowed: string[];

  constructor(allowed: string[] = [], message = "Method Not Allowed") {
    super(message, 405, "METHOD_NOT_ALLOWED", { allowed });
    this.name = "MethodNotAllowedError";
    this.allowed = allowed;
  }

  override applyTo(
    response: ServerResponse,
    development = false,
  ): ServerResponse {
    const rendered = super.applyTo(response, development);
    return this.allowed.length > 0
      ? rendered.withHeader("Allow", this.allowed.join(", "))
      : rendered;
  }
}

/**
 * Invalid configuration: a malformed route target, an unknown middleware
 * identifier or options that fail validation.
 *
 * Raised while the application is being wired, never for a request the
 * client got wrong.
 */
export class ConfigurationError extends JunctionError {
  readonly issues: ValidationIssue[];

  constructor(message = "Invalid configuration", issues: ValidationIssue[] = []) {
    super(
      message,
      500,
      "CONFIGURATION_ERROR",
      issues.length > 0 ? issues : undefined,
      false,
    );
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * 500 Internal Server Error.
 */
export class InternalError extends JunctionError {
  constructor(message = "Internal Server Error", details?: unknown) {
    super(message, 500, "INTERNAL_ERROR", details, false);
    this.name = "InternalError";
  }
}
