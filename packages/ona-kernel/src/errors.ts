// packages/ona-kernel/src/errors.ts
//
// Error taxonomy of the ONA core.
//
// - ConfigurationError: channel or required column absent, invalid options. Fatal, raised
//   before any data row is processed.
// - ParsingError: one malformed row. Recovered by skipping; never thrown out of a source.
// - DataQualityError: no valid reading left for the channel. Fatal.
// - ComputationError: statistics impossible for a structural reason. Fatal for one covariate only.

export type OnaErrorCode = "CONFIGURATION" | "PARSING" | "DATA_QUALITY" | "COMPUTATION";

export class OnaError extends Error {
  readonly code: OnaErrorCode;

  constructor(code: OnaErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = new.target.name;
  }
}

export class ConfigurationError extends OnaError {
  constructor(message: string) {
    super("CONFIGURATION", message);
  }
}

export type ParsingField = "timestamp" | "atn" | "rawBC";

export class ParsingError extends OnaError {
  readonly field: ParsingField;
  readonly rowNumber: number;

  constructor(field: ParsingField, rowNumber: number, message: string) {
    super("PARSING", message);
    this.field = field;
    this.rowNumber = rowNumber;
  }
}

export class DataQualityError extends OnaError {
  constructor(message: string) {
    super("DATA_QUALITY", message);
  }
}

export class ComputationError extends OnaError {
  constructor(message: string) {
    super("COMPUTATION", message);
  }
}

export function isOnaError(e: unknown): e is OnaError {
  return e instanceof OnaError;
}
