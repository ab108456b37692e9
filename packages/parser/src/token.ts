import { ParseError } from "./errors.js";

export type TokenKind = "open" | "close" | "quoted" | "bare" | "comment";

/** One lexical token and where it starts in its source buffer. */
export interface Token {
  kind: TokenKind;
  text: string;
  offset: number;
}

const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INT_RE = /^[+-]?\d+$/;
const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

export function classify(text: string): TokenKind {
  switch (text[0]) {
    case "[":
      return "open";
    case "]":
      return "close";
    case '"':
      return "quoted";
    case "#":
      return "comment";
    default:
      return "bare";
  }
}

export function makeToken(text: string, offset = 0): Token {
  return { kind: classify(text), text, offset };
}

/**
 * A token is valid when it is non-empty, a quoted token is closed on both
 * ends, and only quoted tokens contain spaces.
 */
export function isValid(token: Token): boolean {
  const { text } = token;
  if (text.length === 0) return false;

  const startsWithQuote = text.startsWith('"');
  const endsWithQuote = text.endsWith('"');
  if (startsWithQuote || endsWithQuote) {
    if (startsWithQuote !== endsWithQuote) return false;
    if (text.length < 2) return false;
  }

  if (!startsWithQuote && text.includes(" ")) return false;

  return true;
}

/** Strip the surrounding quotes, or `undefined` when the token is not quoted. */
export function unquote(token: Token): string | undefined {
  const { text } = token;
  if (text.length < 2 || !text.startsWith('"') || !text.endsWith('"')) {
    return undefined;
  }
  return text.slice(1, -1);
}

export function tokenToFloat(token: Token): number {
  if (!FLOAT_RE.test(token.text)) {
    throw new ParseError("ParseFloat", `Unable to parse float from '${token.text}'`, {
      offset: token.offset,
    });
  }
  return Number(token.text);
}

export function tokenToInt(token: Token): number {
  const value = INT_RE.test(token.text) ? Number(token.text) : NaN;
  if (!Number.isSafeInteger(value) || value < INT32_MIN || value > INT32_MAX) {
    throw new ParseError("ParseInt", `Unable to parse integer from '${token.text}'`, {
      offset: token.offset,
    });
  }
  return value;
}

/** Accepts `true`/`false`, bare or quoted. */
export function tokenToBool(token: Token): boolean {
  const text = unquote(token) ?? token.text;
  if (text === "true") return true;
  if (text === "false") return false;
  throw new ParseError("ParseBool", `Unable to parse bool from '${token.text}'`, {
    offset: token.offset,
  });
}
