import { PostponableError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain } from "../catalog.js";
import type { ConflictCodes, PostponableErrorOptions } from "../types.js";

/**
 * Errors when an operation conflicts with the current state.
 * The `.code` field discriminates the specific error.
 */
export class ConflictError<C extends ConflictCodes = ConflictCodes> extends PostponableError {
  readonly _tag = "ConflictError" as const;
  override readonly code: C;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: PostponableErrorOptions<C>) {
    super(options.message, options.metadata, options.cause ? { cause: options.cause } : undefined);
    const entry = ERROR_CATALOG[options.code];
    this.code = options.code;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
