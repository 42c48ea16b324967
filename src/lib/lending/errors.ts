/**
 * Lending Error Taxonomy
 *
 * Every rejected action throws one of these. Callers switch on `code` to decide
 * whether a retry can help (`retryable` is only set for oracle failures).
 */

export type LendingErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'NOT_APPROVED'
  | 'ORACLE_ERROR'
  | 'INSOLVENT'
  | 'ARITHMETIC_OVERFLOW'
  | 'LIQUIDATION_NOT_ELIGIBLE'
  | 'INVALID_INPUT';

export abstract class LendingError extends Error {
  abstract readonly code: LendingErrorCode;
  readonly retryable: boolean = false;

  toJSON(): { code: LendingErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }
}

export class ConfigurationError extends LendingError {
  readonly code: LendingErrorCode = 'CONFIGURATION_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Identity missing from a configured borrower or lender allow-list. */
export class AccessDeniedError extends ConfigurationError {
  readonly code: LendingErrorCode = 'NOT_APPROVED';

  constructor(identity: string, role: 'borrower' | 'lender') {
    super(`${identity} is not an approved ${role}`);
    this.name = 'AccessDeniedError';
    Object.setPrototypeOf(this, AccessDeniedError.prototype);
  }
}

export class OracleError extends LendingError {
  readonly code: LendingErrorCode = 'ORACLE_ERROR';
  readonly retryable = true;

  constructor(message: string) {
    super(message);
    this.name = 'OracleError';
    Object.setPrototypeOf(this, OracleError.prototype);
  }
}

export class InsolvencyError extends LendingError {
  readonly code: LendingErrorCode = 'INSOLVENT';

  constructor(message: string) {
    super(message);
    this.name = 'InsolvencyError';
    Object.setPrototypeOf(this, InsolvencyError.prototype);
  }
}

export class ArithmeticOverflowError extends LendingError {
  readonly code: LendingErrorCode = 'ARITHMETIC_OVERFLOW';

  constructor(message: string) {
    super(message);
    this.name = 'ArithmeticOverflowError';
    Object.setPrototypeOf(this, ArithmeticOverflowError.prototype);
  }
}

export class LiquidationNotEligibleError extends LendingError {
  readonly code: LendingErrorCode = 'LIQUIDATION_NOT_ELIGIBLE';

  constructor(borrower: string) {
    super(`Position of ${borrower} is solvent and not past maturity`);
    this.name = 'LiquidationNotEligibleError';
    Object.setPrototypeOf(this, LiquidationNotEligibleError.prototype);
  }
}

export class InvalidInputError extends LendingError {
  readonly code: LendingErrorCode = 'INVALID_INPUT';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }
}

export function isLendingError(error: unknown): error is LendingError {
  return error instanceof LendingError;
}
