export type StfErrorKind =
  | "UnexpectedTag"
  | "InvalidLinkSyntax"
  | "DateParseFailure"
  | "InvalidDateFormatSelector"
  | "LookaheadMismatch";

/**
 * Base class for every fatal conversion error. Malformed tags are not
 * errors; they are reported as warnings and lexing continues.
 */
export class StfError extends Error {
  constructor(
    public readonly kind: StfErrorKind,
    message: string
  ) {
    super(message);
    this.name = "StfError";
  }
}

export class UnexpectedTagError extends StfError {
  constructor(
    public readonly state: string,
    public readonly tag: string
  ) {
    super("UnexpectedTag", `[${state}] unexpected tag {${tag}} here`);
    this.name = "UnexpectedTagError";
  }
}

export class InvalidLinkSyntaxError extends StfError {
  constructor(
    message: string,
    public readonly link: string
  ) {
    super("InvalidLinkSyntax", message);
    this.name = "InvalidLinkSyntaxError";
  }
}

export class DateParseError extends StfError {
  constructor(
    public readonly input: string,
    public readonly pattern: string
  ) {
    super("DateParseFailure", `failed to parse date '${input}' as ${pattern}`);
    this.name = "DateParseError";
  }
}

export class InvalidDateFormatError extends StfError {
  constructor(public readonly input: string | null) {
    super("InvalidDateFormatSelector", `invalid date format requested: '${input ?? ""}'`);
    this.name = "InvalidDateFormatError";
  }
}

export class LookaheadMismatchError extends StfError {
  constructor(message: string) {
    super("LookaheadMismatch", message);
    this.name = "LookaheadMismatchError";
  }
}
