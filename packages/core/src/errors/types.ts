import type { JunctionError } from "./base.ts";

/**
 * One problem found while validating configuration.
 */
export interface ValidationIssue {
  /** Dotted path of the offending setting, e.g. `port` */
  field: string;
  message: string;
  /** TypeBox `ValueErrorType`, as a string */
  code?: string;
}

/**
 * JSON body of every error response.
 */
export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    status: number;
    details?: unknown;
    stack?: string[];
  };
}

export type ErrorTransformer = (error: unknown) => JunctionError;
