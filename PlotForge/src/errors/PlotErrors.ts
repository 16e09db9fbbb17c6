export type PlotErrorCode =
  | 'MALFORMED_INPUT'
  | 'INVALID_OPTIONS'
  | 'UNSUPPORTED_PLOT_KIND'
  | 'COLUMN_NOT_FOUND'
  | 'MISSING_COORDINATE_COLUMNS'
  | 'AMBIGUOUS_SHAPE'
  | 'INVALID_VALUE';

/**
 * Base class for every failure raised while turning CSV text into a chart.
 * `details` carries identifiers only (column names, option names, kinds, row numbers),
 * never cell contents.
 */
export abstract class PlotError extends Error {
  public readonly code: PlotErrorCode;
  public readonly details: Readonly<Record<string, unknown>>;

  protected constructor(code: PlotErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = Object.freeze({ ...details });
  }
}

export class MalformedInputError extends PlotError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('MALFORMED_INPUT', message, details);
  }
}

export class InvalidOptionsError extends PlotError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('INVALID_OPTIONS', message, details);
  }
}

export class UnsupportedPlotKindError extends PlotError {
  public readonly kind: string;

  constructor(kind: string, supported: readonly string[]) {
    super(
      'UNSUPPORTED_PLOT_KIND',
      `Unsupported plot type '${kind}'. Supported types: ${supported.join(', ')}`,
      { kind }
    );
    this.kind = kind;
  }
}

export class ColumnNotFoundError extends PlotError {
  public readonly column: string;

  constructor(column: string, option: string, available: readonly string[]) {
    super(
      'COLUMN_NOT_FOUND',
      `Column '${column}' (option '${option}') not found. Available columns: ${available.join(', ')}`,
      { column, option }
    );
    this.column = column;
  }
}

export class MissingCoordinateColumnsError extends PlotError {
  constructor(missing: Array<'latitude' | 'longitude'>, latitudeAliases: readonly string[], longitudeAliases: readonly string[]) {
    super(
      'MISSING_COORDINATE_COLUMNS',
      `No ${missing.join(' or ')} column found. Expected latitude column named one of [${latitudeAliases.join(', ')}] ` +
        `and longitude column named one of [${longitudeAliases.join(', ')}]`,
      { missing }
    );
  }
}

export class AmbiguousShapeError extends PlotError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('AMBIGUOUS_SHAPE', message, details);
  }
}

export class InvalidValueError extends PlotError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('INVALID_VALUE', message, details);
  }
}
