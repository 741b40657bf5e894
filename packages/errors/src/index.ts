/**
 * @postponable/errors
 *
 * Shared error taxonomy for the postponable packages.
 *
 * Every error carries a `.code` from the catalog that discriminates the
 * specific condition. Use `error.code === "XXX"` for fine-grained matching,
 * or `instanceof BaseType` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isPostponableError, PostponableError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export { getErrorMessage } from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { ConflictError } from "./bases/conflict-error.js";
export { ValidationError } from "./bases/validation-error.js";

// ============================================================================
// TYPE INFRASTRUCTURE
// ============================================================================

export type {
  ConflictCodes,
  PostponableErrorOptions,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export {
  type DelayError,
  DelayConfigurationError,
  DelayPostponeRejectedError,
  isDelayError,
} from "./delay.js";

export const PACKAGE_NAME = "@postponable/errors";
