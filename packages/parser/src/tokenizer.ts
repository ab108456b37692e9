import { makeToken, type Token } from "./token.js";

const WHITESPACE = new Set([" ", "\t", "\r", "\n"]);
const BARE_TERMINATORS = new Set([" ", "\t", "\r", "\n", '"', "[", "]"]);

export interface TokenizerOptions {
  /** Drop `#` comment tokens instead of emitting them. */
  skipComments?: boolean;
}

/**
 * Splits a buffer into tokens on demand.
 *
 * - `[` and `]` are single-character tokens
 * - a `"` token runs to the next `"` inclusive, or to end of input
 * - a `#` token runs to the end of the line
 * - anything else runs until whitespace, a quote or a bracket
 *
 * The sequence is finite and cannot be restarted.
 */
export class Tokenizer implements Iterable<Token> {
  private readonly source: string;
  private pos = 0;
  private lookahead: Token | undefined;
  private hasLookahead = false;
  private skipCommentTokens: boolean;

  constructor(source: string, options: TokenizerOptions = {}) {
    this.source = source;
    this.skipCommentTokens = options.skipComments ?? false;
  }

  /** Skip comment tokens from now on. */
  skipComments(): this {
    this.skipCommentTokens = true;
    if (this.hasLookahead && this.lookahead?.kind === "comment") {
      this.hasLookahead = false;
      this.lookahead = undefined;
    }
    return this;
  }

  /** Offset of the first character not yet consumed. */
  get offset(): number {
    return this.hasLookahead && this.lookahead ? this.lookahead.offset : this.pos;
  }

  next(): Token | undefined {
    if (this.hasLookahead) {
      this.hasLookahead = false;
      const token = this.lookahead;
      this.lookahead = undefined;
      return token;
    }
    return this.scan();
  }

  peek(): Token | undefined {
    if (!this.hasLookahead) {
      this.lookahead = this.scan();
      this.hasLookahead = true;
    }
    return this.lookahead;
  }

  *[Symbol.iterator](): Iterator<Token> {
    for (let token = this.next(); token; token = this.next()) {
      yield token;
    }
  }

  private scan(): Token | undefined {
    const src = this.source;
    const len = src.length;

    while (this.pos < len) {
      const start = this.pos;
      const ch = src[start];

      if (WHITESPACE.has(ch)) {
        this.pos++;
        continue;
      }

      if (ch === "[" || ch === "]") {
        this.pos++;
        return makeToken(ch, start);
      }

      if (ch === '"') {
        const close = src.indexOf('"', start + 1);
        this.pos = close === -1 ? len : close + 1;
        return makeToken(src.slice(start, this.pos), start);
      }

      if (ch === "#") {
        let end = start + 1;
        while (end < len && src[end] !== "\n" && src[end] !== "\r") end++;
        this.pos = end;
        if (this.skipCommentTokens) continue;
        return makeToken(src.slice(start, end), start);
      }

      let end = start + 1;
      while (end < len && !BARE_TERMINATORS.has(src[end])) end++;
      this.pos = end;
      return makeToken(src.slice(start, end), start);
    }

    return undefined;
  }
}

/** Tokenize a whole buffer eagerly. */
export function tokenize(source: string, options: TokenizerOptions = {}): Token[] {
  return [...new Tokenizer(source, options)];
}
