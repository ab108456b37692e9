/**
 * Shared readers for the conversion functions. Each turns a parameter (or
 * its absence) into a typed value, throwing `ParseError` on bad input.
 */

import {
  rgb,
  type FloatValue,
  type Spectrum,
  type SpectrumValue,
} from "@pbrtkit/ir";
import { ParseError, type ParamList } from "@pbrtkit/parser";

/** Texture name → index into `scene.textures`. */
export type TextureLookup = ReadonlyMap<string, number>;

export function unknownType(category: string, name: string): ParseError {
  return new ParseError("InvalidObjectType", `Unknown ${category} type '${name}'`);
}

export function missingParameter(category: string, param: string): ParseError {
  return new ParseError("MissingParameter", `${category}: missing required parameter '${param}'`);
}

export function invalidParameter(category: string, param: string, reason: string): ParseError {
  return new ParseError("InvalidParameter", `${category}: parameter '${param}' ${reason}`);
}

export function optionalFloat(params: ParamList, name: string): number | undefined {
  return params.floats(name)?.[0];
}

export function requiredString(params: ParamList, category: string, name: string): string {
  const value = params.string(name);
  if (value === undefined) throw missingParameter(category, name);
  return value;
}

export function requiredFloats(params: ParamList, category: string, name: string): number[] {
  const values = params.floats(name);
  if (!values) throw missingParameter(category, name);
  return [...values];
}

export function optionalFloats(params: ParamList, name: string): number[] | undefined {
  const values = params.floats(name);
  return values ? [...values] : undefined;
}

export function optionalIntegers(params: ParamList, name: string): number[] | undefined {
  const values = params.integers(name);
  return values ? [...values] : undefined;
}

/** A string parameter restricted to `allowed`. */
export function oneOf<T extends string>(
  params: ParamList,
  category: string,
  name: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const value = params.string(name);
  if (value === undefined) return fallback;
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw invalidParameter(category, name, `must be one of ${allowed.join(", ")}, got '${value}'`);
  }
  return match;
}

/** Exactly four floats, e.g. a crop or screen window. */
export function quad(
  params: ParamList,
  category: string,
  name: string,
): [number, number, number, number] | undefined {
  const values = params.floats(name);
  if (!values) return undefined;
  if (values.length !== 4) {
    throw invalidParameter(category, name, `expects 4 values, got ${values.length}`);
  }
  return [values[0], values[1], values[2], values[3]];
}

/** Flat xyz data whose length must be a multiple of three. */
export function points(params: ParamList, category: string, name: string): number[] | undefined {
  const values = optionalFloats(params, name);
  if (values && values.length % 3 !== 0) {
    throw invalidParameter(category, name, `length ${values.length} is not a multiple of 3`);
  }
  return values;
}

export function spectrum(params: ParamList, category: string, name: string): Spectrum | undefined {
  if (!params.has(name)) return undefined;
  const value = params.spectrum(name);
  if (!value) {
    throw invalidParameter(category, name, "is not a valid rgb, blackbody or spectrum value");
  }
  return value;
}

function textureRef(
  textures: TextureLookup,
  category: string,
  param: string,
  name: string,
): { type: "texture"; index: number } {
  const index = textures.get(name);
  if (index === undefined) {
    throw invalidParameter(category, param, `references unknown texture '${name}'`);
  }
  return { type: "texture", index };
}

/** A float, or a `texture`-typed reference to a float texture. */
export function floatValue(
  params: ParamList,
  category: string,
  name: string,
  fallback: number,
  textures: TextureLookup,
): FloatValue {
  const param = params.get(name);
  if (param?.type === "texture") {
    return textureRef(textures, category, name, params.string(name, ""));
  }
  return { type: "constant", value: params.float(name, fallback) };
}

/** A spectrum, or a `texture`-typed reference to a spectrum texture. */
export function spectrumValue(
  params: ParamList,
  category: string,
  name: string,
  textures: TextureLookup,
): SpectrumValue | undefined {
  const param = params.get(name);
  if (!param) return undefined;
  if (param.type === "texture") {
    return textureRef(textures, category, name, params.string(name, ""));
  }
  const value = spectrum(params, category, name);
  return value ? { type: "constant", spectrum: value } : undefined;
}

export function spectrumValueOr(
  params: ParamList,
  category: string,
  name: string,
  fallback: number,
  textures: TextureLookup,
): SpectrumValue {
  return (
    spectrumValue(params, category, name, textures) ?? {
      type: "constant",
      spectrum: rgb(fallback, fallback, fallback),
    }
  );
}
