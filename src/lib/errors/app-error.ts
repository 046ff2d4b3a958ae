/**
 * Application Error Types
 *
 * Centralized error handling with typed error codes and safe messages.
 * Safe messages are caller-facing and never include raw patient records.
 */

export type AppErrorCode =
  | 'VALIDATION_ERROR'
  | 'DATA_COMPLETENESS'
  | 'CATALOG_INTEGRITY';

/**
 * Application Error
 *
 * Extends Error with a typed error code and safe message.
 */
export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly safeMessage: string;
  /** Optional structured payload for reports and logs */
  public readonly details?: Record<string, unknown>;

  constructor(
    code: AppErrorCode,
    safeMessage: string,
    causeOrDetails?: unknown,
  ) {
    super(safeMessage);
    this.name = 'AppError';
    this.code = code;
    this.safeMessage = safeMessage;

    if (causeOrDetails instanceof Error) {
      // Preserve original error as cause (for debugging)
      this.cause = causeOrDetails;
    } else if (
      causeOrDetails &&
      typeof causeOrDetails === 'object' &&
      !Array.isArray(causeOrDetails)
    ) {
      this.details = { ...causeOrDetails };
    } else if (causeOrDetails) {
      this.cause = new Error(String(causeOrDetails));
    }
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): {
    code: AppErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      code: this.code,
      message: this.safeMessage,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Input that cannot be evaluated (malformed profile, missing mandatory data).
 */
export class ValidationError extends AppError {
  public readonly issues: string[];

  constructor(
    safeMessage: string,
    issues: string[],
    code: AppErrorCode = 'VALIDATION_ERROR',
  ) {
    super(code, safeMessage, { issues });
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * A mandatory lab value, weight or condition-specific rule is missing for one patient.
 * Aborts evaluation for that patient only.
 */
export class DataCompletenessError extends ValidationError {
  public readonly missingFields: string[];

  constructor(patientId: string, missingFields: string[]) {
    super(
      `Patient ${patientId}: missing mandatory data (${missingFields.join(', ')})`,
      missingFields,
      'DATA_COMPLETENESS',
    );
    this.name = 'DataCompletenessError';
    this.missingFields = missingFields;
  }
}

/**
 * The rule catalog itself is malformed. Fatal at startup, never per patient.
 */
export class CatalogIntegrityError extends AppError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(
      'CATALOG_INTEGRITY',
      `Rule catalog failed integrity checks (${issues.length} issue(s))`,
      { issues },
    );
    this.name = 'CatalogIntegrityError';
    this.issues = issues;
  }
}
