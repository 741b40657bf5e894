/**
 * Abstract base for every error raised by the postponable packages.
 *
 * Concrete classes declare `_tag` and `code`; `domain` and `isExpected` are
 * looked up in the catalog by the subclass constructor.
 */

import type { ErrorCode, ErrorDomain } from "./catalog.js";

/**
 * Plain-object form produced by {@link PostponableError.toJSON}
 */
export interface ErrorJSON {
  _tag: string;
  name: string;
  code: ErrorCode;
  message: string;
  domain: ErrorDomain;
  isExpected: boolean;
  metadata?: Record<string, string> | undefined;
  timestamp: string;
  cause?: string | undefined;
}

export abstract class PostponableError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ErrorCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly metadata: Record<string, string> | undefined;
  readonly timestamp: Date;

  constructor(message: string, metadata?: Record<string, string>, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
    this.timestamp = new Date();
    Error.captureStackTrace(this, new.target);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      isExpected: this.isExpected,
      metadata: this.metadata,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

/** Check if a value is a PostponableError */
export function isPostponableError(error: unknown): error is PostponableError {
  return error instanceof PostponableError;
}
