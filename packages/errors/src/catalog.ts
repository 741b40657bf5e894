/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised by the postponable packages, with the behavioural
 * base type it maps to.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 */

/**
 * The behavioural base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "ConflictError";

export const ERROR_CATALOG = {
  // ============================================================================
  // DELAY ERRORS - Postponable delay primitive
  // ============================================================================
  DELAY_CONFIGURATION_INVALID: {
    domain: "delay",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid delay configuration",
    description: "The delay configuration failed schema validation",
  },
  DELAY_POSTPONE_REJECTED: {
    domain: "delay",
    baseType: "ConflictError" as const,
    isExpected: true,
    title: "Postpone rejected",
    description: "A postpone request was asserted to succeed but was refused",
  },
} as const;

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
