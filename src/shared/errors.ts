/**
 * Collateral Loan Quotes - Error Taxonomy
 *
 * AppError subclasses carry the HTTP status the API layer answers with.
 * Anything that is not an AppError is a programming fault and maps to 500.
 */

export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 400) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/**
 * Caller input is malformed. Raised before any pricing happens.
 */
export class BadRequestError extends AppError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message, 400);
    this.details = details;
  }
}

export class UnknownTierError extends BadRequestError {
  readonly tier: string;

  constructor(tier: string) {
    super(`Unknown risk tier: ${tier}`);
    this.tier = tier;
  }
}

/**
 * Per-asset schedules handed to the summation step differ in length.
 * Indicates a caller bug, never user input.
 */
export class ScheduleLengthMismatchError extends Error {
  constructor(symbol: string, expected: number, actual: number) {
    super(`Schedule for ${symbol} has ${actual} rows, expected ${expected}`);
    this.name = 'ScheduleLengthMismatchError';
  }
}
