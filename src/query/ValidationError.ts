/**
 * Findings of a RowMapper validation pass. These are values, never thrown.
 */

export enum ValidationErrorCode {
  Undefined = 0,
  ColumnNotSpecified = 1,
  ValueCannotBeNull = 2,
  ValueIsNotSet = 3,
  ValueRangeTooHigh = 4,
  ValueRangeTooLow = 5,
  ValueLengthTooShort = 6,
  ValueLengthTooLong = 7,
  CustomError = 666,
}

const DEFAULT_MESSAGES: Record<ValidationErrorCode, string> = {
  [ValidationErrorCode.Undefined]: "Undefined validation error.",
  [ValidationErrorCode.ColumnNotSpecified]:
    "The specified column has not been defined.",
  [ValidationErrorCode.ValueCannotBeNull]: "Value must be set.",
  [ValidationErrorCode.ValueIsNotSet]: "Value has not been specified.",
  [ValidationErrorCode.ValueRangeTooHigh]: "Value is above the allowed range.",
  [ValidationErrorCode.ValueRangeTooLow]: "Value is below the allowed range.",
  [ValidationErrorCode.ValueLengthTooShort]: "Value is too short.",
  [ValidationErrorCode.ValueLengthTooLong]: "Value has too many characters.",
  [ValidationErrorCode.CustomError]: "Undefined validation error.",
};

export class ValidationError {
  readonly columnKey: string;
  readonly code: ValidationErrorCode;
  private readonly customMessage: string | null;

  constructor(
    columnKey: string,
    code: ValidationErrorCode,
    message: string | null = null
  ) {
    this.columnKey = columnKey;
    this.code = code;
    this.customMessage = message;
  }

  /**
   * Human-readable explanation: the custom message, or the code's default
   */
  get message(): string {
    return this.customMessage ?? DEFAULT_MESSAGES[this.code];
  }
}
