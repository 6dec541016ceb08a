// lib/errors.ts
// Typed failures raised by the data model, the processing pipeline and the importers.

export type ErrorCode =
  | 'OUT_OF_RANGE'
  | 'VALUE_NOT_AVAILABLE'
  | 'UNSUPPORTED_UNIT'
  | 'MISSING_INPUT'
  | 'INVALID_OPTIONS'
  | 'INVALID_SYMBOL'
  | 'DUPLICATE_SYMBOL'
  | 'INVALID_METADATA'
  | 'UNSUPPORTED_FORMAT'
  | 'MALFORMED_DATA'
  | 'FILE_NOT_FOUND';

export class OpticalConstantsError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Interpolation target lies outside the stored axis; extrapolation is never done. */
export class OutOfRange extends OpticalConstantsError {
  readonly min: number;
  readonly max: number;
  readonly values: number[];

  constructor(values: number[], min: number, max: number) {
    super(
      'OUT_OF_RANGE',
      `Requested range not within data range. Available range: ${min} to ${max}, requested: ${values.join(', ')}`,
    );
    this.values = values;
    this.min = min;
    this.max = max;
  }
}

export class ValueNotAvailable extends OpticalConstantsError {
  readonly values: number[];

  constructor(values: number[], reason = 'no exact match on axis') {
    super('VALUE_NOT_AVAILABLE', `Values not available (${reason}): ${values.join(', ')}`);
    this.values = values;
  }
}

export class UnsupportedUnit extends OpticalConstantsError {
  readonly unit: string;

  constructor(unit: string) {
    super('UNSUPPORTED_UNIT', `Unit '${unit}' not supported, expected one of: nm, eV`);
    this.unit = unit;
  }
}

export class MissingInput extends OpticalConstantsError {
  constructor(message: string) {
    super('MISSING_INPUT', message);
  }
}

export class InvalidOptions extends OpticalConstantsError {
  constructor(message: string) {
    super('INVALID_OPTIONS', message);
  }
}

export class InvalidSymbol extends OpticalConstantsError {
  readonly symbol: string;

  constructor(symbol: string) {
    super('INVALID_SYMBOL', `Invalid material symbol '${symbol}'`);
    this.symbol = symbol;
  }
}

export class DuplicateSymbol extends OpticalConstantsError {
  readonly symbol: string;

  constructor(symbol: string) {
    super('DUPLICATE_SYMBOL', `Material with symbol '${symbol}' already in collection`);
    this.symbol = symbol;
  }
}

export class InvalidMetadata extends OpticalConstantsError {
  constructor(message: string) {
    super('INVALID_METADATA', message);
  }
}

export class UnsupportedFormat extends OpticalConstantsError {
  readonly format: string;

  constructor(format: string) {
    super('UNSUPPORTED_FORMAT', `Importer for format '${format}' not implemented`);
    this.format = format;
  }
}

export class MalformedData extends OpticalConstantsError {
  constructor(message: string) {
    super('MALFORMED_DATA', message);
  }
}

export class FileNotFound extends OpticalConstantsError {
  readonly path: string;

  constructor(path: string) {
    super('FILE_NOT_FOUND', `Could not find ${path}`);
    this.path = path;
  }
}
