/**
 * Type infrastructure for the error system.
 */

import type { CodesForBase, ErrorCode } from "./catalog.js";

/**
 * Structured validation issue (field-level detail)
 */
export interface ValidationIssue {
  field: string;
  message: string;
  code: string;
  value?: unknown;
}

/**
 * Options for constructing a base error type.
 * The code determines domain and isExpected via catalog lookup.
 */
export interface PostponableErrorOptions<C extends ErrorCode> {
  code: C;
  message: string;
  metadata?: Record<string, string> | undefined;
  cause?: Error | undefined;
}

export type ValidationCodes = CodesForBase<"ValidationError">;
export type ConflictCodes = CodesForBase<"ConflictError">;
