/**
 * Error taxonomy shared by every stage of the loader.
 */

export type ErrorKind =
  // lexical
  | "InvalidToken"
  | "ParseFloat"
  | "ParseInt"
  | "ParseBool"
  // syntactic
  | "EndOfFile"
  | "NoToken"
  | "UnknownDirective"
  | "InvalidString"
  | "UnexpectedToken"
  // semantic
  | "InvalidParamType"
  | "InvalidParamName"
  | "DuplicatedParamName"
  | "UnknownCoordinateSystem"
  | "UnbalancedAttributes"
  | "MissingWorldBegin"
  | "DuplicateWorldBegin"
  | "UnknownObject"
  | "UnknownOption"
  | "UnknownAttributeTarget"
  | "InvalidObjectType"
  | "MissingParameter"
  | "InvalidParameter"
  | "InvalidTransform"
  | "Unsupported"
  // io
  | "Io";

export type ErrorCategory = "lexical" | "syntactic" | "semantic" | "io";

const CATEGORIES: Record<ErrorKind, ErrorCategory> = {
  InvalidToken: "lexical",
  ParseFloat: "lexical",
  ParseInt: "lexical",
  ParseBool: "lexical",
  EndOfFile: "syntactic",
  NoToken: "syntactic",
  UnknownDirective: "syntactic",
  InvalidString: "syntactic",
  UnexpectedToken: "syntactic",
  InvalidParamType: "semantic",
  InvalidParamName: "semantic",
  DuplicatedParamName: "semantic",
  UnknownCoordinateSystem: "semantic",
  UnbalancedAttributes: "semantic",
  MissingWorldBegin: "semantic",
  DuplicateWorldBegin: "semantic",
  UnknownObject: "semantic",
  UnknownOption: "semantic",
  UnknownAttributeTarget: "semantic",
  InvalidObjectType: "semantic",
  MissingParameter: "semantic",
  InvalidParameter: "semantic",
  InvalidTransform: "semantic",
  Unsupported: "semantic",
  Io: "io",
};

export interface ErrorLocation {
  file?: string;
  line: number;
  column: number;
}

export interface ParseErrorOptions {
  /** Character offset of the offending token in its source buffer. */
  offset?: number;
  cause?: unknown;
}

/** Error thrown when loading a scene fails. */
export class ParseError extends Error {
  readonly kind: ErrorKind;
  readonly category: ErrorCategory;
  readonly detail: string;
  offset?: number;
  location?: ErrorLocation;

  constructor(kind: ErrorKind, detail: string, options: ParseErrorOptions = {}) {
    super(detail, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ParseError";
    this.kind = kind;
    this.category = CATEGORIES[kind];
    this.detail = detail;
    this.offset = options.offset;
  }

  /**
   * Resolve `offset` against the buffer it came from and prefix the message
   * with `file:line:column`. Only the first call has an effect.
   */
  locate(source: string, file?: string): this {
    if (this.location) return this;

    const offset = Math.min(this.offset ?? source.length, source.length);
    let line = 1;
    let lineStart = 0;
    for (let i = 0; i < offset; i++) {
      if (source[i] === "\n") {
        line++;
        lineStart = i + 1;
      }
    }

    this.location = { file, line, column: offset - lineStart + 1 };
    const where = file ? `${file}:${line}:${this.location.column}` : `${line}:${this.location.column}`;
    this.message = `${where}: ${this.detail}`;
    return this;
  }
}

export function isParseError(err: unknown, kind?: ErrorKind): err is ParseError {
  return err instanceof ParseError && (kind === undefined || err.kind === kind);
}
