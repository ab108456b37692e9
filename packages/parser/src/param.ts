/**
 * Typed parameters (`"float radius" [ 2 ]`) and name-keyed parameter lists.
 */

import type { Spectrum, Vec3Tuple } from "@pbrtkit/ir";
import { ParseError } from "./errors.js";
import { tokenToBool, tokenToFloat, tokenToInt, unquote, type Token } from "./token.js";

export const PARAM_TYPES = [
  "bool",
  "integer",
  "float",
  "point2",
  "vector2",
  "point3",
  "vector3",
  "normal3",
  "spectrum",
  "rgb",
  "blackbody",
  "string",
  "texture",
] as const;

export type ParamType = (typeof PARAM_TYPES)[number];

export function isParamType(keyword: string): keyword is ParamType {
  return (PARAM_TYPES as readonly string[]).includes(keyword);
}

/** Values of one parameter; the variant follows from the declared type. */
export type ParamValues =
  | { kind: "floats"; values: number[] }
  | { kind: "integers"; values: number[] }
  | { kind: "strings"; values: string[] }
  | { kind: "booleans"; values: boolean[] };

function emptyValues(type: ParamType): ParamValues {
  switch (type) {
    case "bool":
      return { kind: "booleans", values: [] };
    case "integer":
    case "blackbody":
      return { kind: "integers", values: [] };
    case "string":
    case "texture":
      return { kind: "strings", values: [] };
    case "float":
    case "point2":
    case "vector2":
    case "point3":
    case "vector3":
    case "normal3":
    case "spectrum":
    case "rgb":
      return { kind: "floats", values: [] };
  }
}

/** A single named, typed parameter. */
export class Param {
  readonly name: string;
  readonly type: ParamType;
  private readonly values: ParamValues;

  constructor(name: string, type: ParamType) {
    this.name = name;
    this.type = type;
    this.values = emptyValues(type);
  }

  /**
   * Build an empty parameter from its `"type name"` header (already
   * unquoted).
   */
  static fromDeclaration(declaration: string, offset?: number): Param {
    const [keyword, name] = declaration.trim().split(/\s+/);
    if (!keyword) {
      throw new ParseError("InvalidParamName", `Empty parameter declaration`, { offset });
    }
    if (!isParamType(keyword)) {
      throw new ParseError("InvalidParamType", `Unknown parameter type '${keyword}'`, { offset });
    }
    if (!name) {
      throw new ParseError("InvalidParamName", `Parameter '${declaration}' has no name`, { offset });
    }
    return new Param(name, keyword);
  }

  /** Coerce one value token into this parameter's container. */
  addToken(token: Token): void {
    const container = this.values;
    switch (container.kind) {
      case "floats":
        container.values.push(tokenToFloat(token));
        break;
      case "integers":
        container.values.push(tokenToInt(token));
        break;
      case "booleans":
        container.values.push(tokenToBool(token));
        break;
      case "strings": {
        const value = unquote(token);
        if (value === undefined) {
          throw new ParseError("InvalidToken", `Expected quoted string, got '${token.text}'`, {
            offset: token.offset,
          });
        }
        container.values.push(value);
        break;
      }
    }
  }

  get valueKind(): ParamValues["kind"] {
    return this.values.kind;
  }

  get length(): number {
    return this.values.values.length;
  }

  asFloats(): readonly number[] | undefined {
    return this.values.kind === "floats" ? this.values.values : undefined;
  }

  asIntegers(): readonly number[] | undefined {
    return this.values.kind === "integers" ? this.values.values : undefined;
  }

  asStrings(): readonly string[] | undefined {
    return this.values.kind === "strings" ? this.values.values : undefined;
  }

  asBooleans(): readonly boolean[] | undefined {
    return this.values.kind === "booleans" ? this.values.values : undefined;
  }

  /**
   * `rgb` → three floats, `blackbody` → temperature, `spectrum` →
   * (wavelength, value) pairs. Anything else, or a malformed value count,
   * gives `undefined`.
   */
  asSpectrum(): Spectrum | undefined {
    switch (this.type) {
      case "rgb": {
        const floats = this.asFloats();
        if (!floats || floats.length !== 3) return undefined;
        return { type: "rgb", rgb: [floats[0], floats[1], floats[2]] };
      }
      case "blackbody": {
        const temperature = this.asIntegers()?.[0];
        return temperature === undefined ? undefined : { type: "blackbody", temperature };
      }
      case "spectrum": {
        const floats = this.asFloats();
        if (!floats || floats.length < 2 || floats.length % 2 !== 0) return undefined;
        const lambda: number[] = [];
        const values: number[] = [];
        for (let i = 0; i < floats.length; i += 2) {
          lambda.push(floats[i]);
          values.push(floats[i + 1]);
        }
        return { type: "sampled", lambda, values };
      }
      default:
        return undefined;
    }
  }
}

/** Parameters of one directive, keyed by name. */
export class ParamList implements Iterable<Param> {
  private readonly params = new Map<string, Param>();

  /** Add a parameter; a name already present is an error. */
  add(param: Param, offset?: number): void {
    if (this.params.has(param.name)) {
      throw new ParseError("DuplicatedParamName", `Duplicated parameter '${param.name}'`, {
        offset,
      });
    }
    this.params.set(param.name, param);
  }

  /** Insert every entry of `other`, replacing entries with the same name. */
  merge(other: ParamList): this {
    for (const param of other) {
      this.params.set(param.name, param);
    }
    return this;
  }

  clone(): ParamList {
    return new ParamList().merge(this);
  }

  get(name: string): Param | undefined {
    return this.params.get(name);
  }

  has(name: string): boolean {
    return this.params.has(name);
  }

  get size(): number {
    return this.params.size;
  }

  names(): string[] {
    return [...this.params.keys()];
  }

  [Symbol.iterator](): Iterator<Param> {
    return this.params.values();
  }

  floats(name: string): readonly number[] | undefined {
    return this.get(name)?.asFloats();
  }

  integers(name: string): readonly number[] | undefined {
    return this.get(name)?.asIntegers();
  }

  strings(name: string): readonly string[] | undefined {
    return this.get(name)?.asStrings();
  }

  booleans(name: string): readonly boolean[] | undefined {
    return this.get(name)?.asBooleans();
  }

  float(name: string, fallback: number): number {
    return this.floats(name)?.[0] ?? fallback;
  }

  integer(name: string, fallback: number): number {
    return this.integers(name)?.[0] ?? fallback;
  }

  boolean(name: string, fallback: boolean): boolean {
    return this.booleans(name)?.[0] ?? fallback;
  }

  string(name: string): string | undefined;
  string(name: string, fallback: string): string;
  string(name: string, fallback?: string): string | undefined {
    return this.strings(name)?.[0] ?? fallback;
  }

  spectrum(name: string): Spectrum | undefined {
    return this.get(name)?.asSpectrum();
  }

  /** First three floats of `name`, or `fallback` when fewer are present. */
  point3(name: string, fallback: Vec3Tuple): Vec3Tuple {
    const floats = this.floats(name);
    if (!floats || floats.length < 3) return fallback;
    return [floats[0], floats[1], floats[2]];
  }
}
