/**
 * Access Control Error Classes
 *
 * Every error raised by ClaimShield packages extends AccessControlError so that
 * a hosting service can map it to a response with a single instanceof check.
 *
 * Note: evaluation never throws. These errors are only raised by administrative
 * operations (rule management, policy reloads).
 */

/**
 * Machine-readable error codes.
 */
export const ERROR_CODES = {
  POLICY_NOT_FOUND: 'policy_not_found',
  INVALID_POLICY: 'invalid_policy',
  POLICY_STORE_ERROR: 'policy_store_error',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export interface ErrorResponseBody {
  error: ErrorCode;
  error_description: string;
  details?: string[];
}

/**
 * Base error for the access control packages.
 */
export class AccessControlError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;

  constructor(code: ErrorCode, message: string, statusCode: number = 500) {
    super(message);
    this.name = 'AccessControlError';
    this.code = code;
    this.statusCode = statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): ErrorResponseBody {
    return {
      error: this.code,
      error_description: this.message,
    };
  }
}

/**
 * Raised when a rule management call names a policy id that is not loaded.
 */
export class PolicyNotFoundError extends AccessControlError {
  public readonly policyId: string;

  constructor(policyId: string) {
    super(ERROR_CODES.POLICY_NOT_FOUND, `Policy '${policyId}' not found`, 404);
    this.name = 'PolicyNotFoundError';
    this.policyId = policyId;
  }
}

/**
 * Raised when a policy rule or policy document fails schema validation.
 */
export class PolicyValidationError extends AccessControlError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(ERROR_CODES.INVALID_POLICY, message, 400);
    this.name = 'PolicyValidationError';
    this.issues = issues;
  }

  override toJSON(): ErrorResponseBody {
    return {
      ...super.toJSON(),
      ...(this.issues.length > 0 ? { details: this.issues } : {}),
    };
  }
}

/**
 * Raised when the external policy store cannot provide a policy document.
 */
export class PolicyStoreError extends AccessControlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.POLICY_STORE_ERROR, message, 503);
    this.name = 'PolicyStoreError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Type guard for AccessControlError
 */
export function isAccessControlError(error: unknown): error is AccessControlError {
  return error instanceof AccessControlError;
}

/**
 * Normalize an unknown thrown value into an Error for logging.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(String(value));
}
