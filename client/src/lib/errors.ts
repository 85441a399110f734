/**
 * Raised when a linear fit has nothing to work with: no points, mismatched
 * series, or an independent variable with zero variance.
 */
export class DegenerateInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DegenerateInputError';
  }
}

export class UnknownCountyError extends Error {
  readonly county: string;

  constructor(county: string) {
    super(`No map coordinates for county "${county}"`);
    this.name = 'UnknownCountyError';
    this.county = county;
  }
}

/**
 * Thrown by base-class operations that every concrete variant must override.
 * Seeing one of these is a bug, not a runtime condition to recover from.
 */
export class UnimplementedOperationFault extends Error {
  readonly operation: string;

  constructor(operation: string) {
    super(`${operation} is not implemented on the base class`);
    this.name = 'UnimplementedOperationFault';
    this.operation = operation;
  }
}

export class FireDataParseError extends Error {
  readonly line: number;

  constructor(line: number, message: string) {
    super(`Line ${line}: ${message}`);
    this.name = 'FireDataParseError';
    this.line = line;
  }
}
