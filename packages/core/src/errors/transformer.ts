import { JunctionError } from "./base.ts";
import { InternalError } from "./http.ts";
import type { ErrorTransformer } from "./types.ts";

/**
 * Map anything thrown by middleware to a JunctionError.
 *
 * Plain errors become a non-operational InternalError that keeps the
 * original name and stack in its details.
 */
export const defaultErrorTransformer: ErrorTransformer = (error) => {
  if (error instanceof JunctionError) return error;

  if (error instanceof Error) {
    return new InternalError(error.message, {
      name: error.name,
      stack: error.stack,
    });
  }

  return new InternalError("An unexpected error occurred", {
    value: String(error),
  });
};

export interface ErrorToResponseOptions {
  development?: boolean;
  transformer?: ErrorTransformer;
}

/**
 * Render any thrown value as a JSON error Response.
 */
export function errorToResponse(
  error: unknown,
  options: ErrorToResponseOptions = {},
): Response {
  const transform = options.transformer ?? defaultErrorTransformer;
  return transform(error).toResponse(options.development ?? false);
}

export function isOperationalError(error: unknown): boolean {
  return error instanceof JunctionError && error.isOperational;
}
