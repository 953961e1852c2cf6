export type HoldingsErrorCode =
  | 'INVALID_PERIOD'
  | 'SOURCE_NOT_FOUND'
  | 'STRUCTURE'
  | 'NO_DATA'
  | 'PERIOD_NOT_FOUND'
  | 'PERSISTENCE_WRITE'
  | 'PERSISTENCE_READ';

export class HoldingsError extends Error {
  readonly code: HoldingsErrorCode;

  constructor(code: HoldingsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidPeriodError extends HoldingsError {
  constructor(readonly label: string) {
    super('INVALID_PERIOD', `Invalid period "${label}". Use 'Month YYYY' format (e.g., 'January 2024')`);
  }
}

export class SourceNotFoundError extends HoldingsError {
  constructor(readonly sourcePath: string) {
    super('SOURCE_NOT_FOUND', `Source file not found: ${sourcePath}`);
  }
}

export class StructureError extends HoldingsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STRUCTURE', message, options);
  }
}

export class NoDataError extends HoldingsError {
  constructor(message = 'No valid holdings found in source') {
    super('NO_DATA', message);
  }
}

export class PeriodNotFoundError extends HoldingsError {
  constructor(readonly periods: string[]) {
    super('PERIOD_NOT_FOUND', `Period not found in stored data: ${periods.join(', ')}`);
  }
}

export class PersistenceWriteError extends HoldingsError {
  constructor(readonly location: string, cause: unknown) {
    super('PERSISTENCE_WRITE', `Could not save holdings to ${location}: ${describeError(cause)}`, { cause });
  }
}

export class PersistenceReadError extends HoldingsError {
  constructor(readonly location: string, cause: unknown) {
    super('PERSISTENCE_READ', `Could not read holdings from ${location}: ${describeError(cause)}`, { cause });
  }
}

export function isHoldingsError(value: unknown): value is HoldingsError {
  return value instanceof HoldingsError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
