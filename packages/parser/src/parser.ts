import type { Matrix4Elements, Vec3Tuple } from "@pbrtkit/ir";
import { isDirectiveKeyword, type Directive } from "./directive.js";
import { isParseError, ParseError } from "./errors.js";
import { Param, ParamList } from "./param.js";
import { isValid, tokenToFloat, unquote, type Token, type TokenKind } from "./token.js";
import { Tokenizer } from "./tokenizer.js";

export interface ParserOptions {
  /** Path reported in error locations. */
  file?: string;
}

/**
 * Pulls directives out of one buffer, one at a time. Comments are skipped.
 *
 * Every error thrown by `parseNext` is a `ParseError` located against this
 * buffer. Running out of input between directives throws `EndOfFile`.
 */
export class Parser {
  readonly source: string;
  readonly file: string | undefined;
  private readonly tokenizer: Tokenizer;

  constructor(source: string, options: ParserOptions = {}) {
    this.source = source;
    this.file = options.file;
    this.tokenizer = new Tokenizer(source, { skipComments: true });
  }

  parseNext(): Directive {
    try {
      return this.readDirective();
    } catch (err) {
      if (err instanceof ParseError) {
        err.locate(this.source, this.file);
      }
      throw err;
    }
  }

  /** Parse every remaining directive. */
  parseAll(): Directive[] {
    const directives: Directive[] = [];
    for (;;) {
      try {
        directives.push(this.parseNext());
      } catch (err) {
        if (isParseError(err, "EndOfFile")) return directives;
        throw err;
      }
    }
  }

  private readDirective(): Directive {
    const token = this.tokenizer.next();
    if (!token) {
      throw new ParseError("EndOfFile", "End of file", { offset: this.source.length });
    }
    const { text: keyword, offset } = token;
    if (!isDirectiveKeyword(keyword)) {
      throw new ParseError("UnknownDirective", `Unknown directive '${keyword}'`, { offset });
    }

    switch (keyword) {
      case "Include":
      case "Import":
        return { type: keyword, path: this.readString(), offset };

      case "Option":
        return { type: keyword, param: this.readParam(), offset };

      case "Film":
      case "Camera":
      case "Sampler":
      case "Integrator":
      case "Accelerator":
      case "PixelFilter":
      case "LightSource":
      case "AreaLightSource":
      case "Material":
      case "Shape": {
        const name = this.readString();
        return { type: keyword, name, params: this.readParamList(), offset };
      }

      case "MakeNamedMaterial":
      case "MakeNamedMedium": {
        const name = this.readString();
        return { type: keyword, name, params: this.readParamList(), offset };
      }

      case "Attribute": {
        const target = this.readString();
        return { type: keyword, target, params: this.readParamList(), offset };
      }

      case "Texture": {
        const name = this.readString();
        const valueType = this.readString();
        const textureClass = this.readString();
        return {
          type: keyword,
          name,
          valueType,
          textureClass,
          params: this.readParamList(),
          offset,
        };
      }

      case "ColorSpace":
      case "CoordinateSystem":
      case "CoordSysTransform":
      case "NamedMaterial":
      case "ObjectBegin":
      case "ObjectInstance":
        return { type: keyword, name: this.readString(), offset };

      case "MediumInterface": {
        // A single name sets both sides.
        const interior = this.readString();
        const exterior = this.tokenizer.peek()?.kind === "quoted" ? this.readString() : interior;
        return { type: keyword, interior, exterior, offset };
      }

      case "Identity":
      case "ReverseOrientation":
      case "WorldBegin":
      case "AttributeBegin":
      case "AttributeEnd":
      case "ObjectEnd":
        return { type: keyword, offset };

      case "Translate":
        return { type: keyword, delta: this.readVec3(), offset };

      case "Scale":
        return { type: keyword, scale: this.readVec3(), offset };

      case "Rotate": {
        const angle = this.readFloat();
        return { type: keyword, angle, axis: this.readVec3(), offset };
      }

      case "LookAt": {
        const eye = this.readVec3();
        const look = this.readVec3();
        return { type: keyword, eye, look, up: this.readVec3(), offset };
      }

      case "Transform":
      case "ConcatTransform":
        return { type: keyword, matrix: this.readMatrix(), offset };

      case "TransformTimes": {
        const start = this.readFloat();
        return { type: keyword, start, end: this.readFloat(), offset };
      }

      case "ActiveTransform": {
        const which = this.readToken();
        if (which.kind !== "bare") {
          throw new ParseError("UnexpectedToken", `Expected a bare word, got '${which.text}'`, {
            offset: which.offset,
          });
        }
        return { type: keyword, which: which.text, offset };
      }
    }
  }

  // --- Token readers ---

  private readToken(): Token {
    const token = this.tokenizer.next();
    if (!token) {
      throw new ParseError("NoToken", "Unexpected end of input", { offset: this.source.length });
    }
    if (!isValid(token)) {
      throw new ParseError("InvalidToken", `Invalid token '${token.text}'`, {
        offset: token.offset,
      });
    }
    return token;
  }

  private expect(kind: TokenKind): Token {
    const token = this.readToken();
    if (token.kind !== kind) {
      const bracket = kind === "open" ? "[" : "]";
      throw new ParseError("UnexpectedToken", `Expected '${bracket}', got '${token.text}'`, {
        offset: token.offset,
      });
    }
    return token;
  }

  private readString(): string {
    const token = this.readToken();
    const value = unquote(token);
    if (value === undefined) {
      throw new ParseError("InvalidString", `Expected quoted string, got '${token.text}'`, {
        offset: token.offset,
      });
    }
    return value;
  }

  private readFloat(): number {
    return tokenToFloat(this.readToken());
  }

  private readVec3(): Vec3Tuple {
    const x = this.readFloat();
    const y = this.readFloat();
    return [x, y, this.readFloat()];
  }

  private readMatrix(): Matrix4Elements {
    this.expect("open");
    const m: Matrix4Elements = [];
    for (let i = 0; i < 16; i++) {
      m.push(this.readFloat());
    }
    this.expect("close");
    return m;
  }

  // --- Parameters ---

  /**
   * `"type name"` followed by a single value or a bracketed list:
   *
   * - `"integer indices" [ 0 1 2 0 2 3 ]`
   * - `"float iso" 150`
   * - `"string filename" "foo.exr"`
   */
  private readParam(): Param {
    const header = this.readToken();
    const declaration = unquote(header);
    if (declaration === undefined) {
      throw new ParseError("InvalidString", `Expected parameter declaration, got '${header.text}'`, {
        offset: header.offset,
      });
    }
    const param = Param.fromDeclaration(declaration, header.offset);

    const value = this.readToken();
    if (value.kind === "close") {
      throw new ParseError("UnexpectedToken", `Unexpected ']'`, { offset: value.offset });
    }
    if (value.kind !== "open") {
      param.addToken(value);
      return param;
    }

    for (;;) {
      const item = this.readToken();
      if (item.kind === "close") break;
      if (item.kind === "open" || isDirectiveKeyword(item.text)) {
        throw new ParseError("UnexpectedToken", `Expected ']' before '${item.text}'`, {
          offset: item.offset,
        });
      }
      param.addToken(item);
    }
    return param;
  }

  /** Greedy: keeps reading while the next token is quoted. */
  private readParamList(): ParamList {
    const list = new ParamList();
    let next = this.tokenizer.peek();
    while (next && next.kind === "quoted") {
      const { offset } = next;
      list.add(this.readParam(), offset);
      next = this.tokenizer.peek();
    }
    return list;
  }
}

/** Parse a whole buffer into directives. */
export function parseDirectives(source: string, options: ParserOptions = {}): Directive[] {
  return new Parser(source, options).parseAll();
}
