import { expect } from "vitest";
import type { Scene } from "@pbrtkit/ir";
import { isParseError, parseDirectives, type ParamList, type ParseError } from "@pbrtkit/parser";
import { loadScene, type LoadOptions } from "../loader.js";
import { createLogger } from "../logger.js";

export const quiet = createLogger({ level: "SILENT" });

export function load(source: string, options: LoadOptions = {}): Scene {
  return loadScene(source, { logger: quiet, ...options });
}

/** The `ParseError` thrown by `fn`. */
export function parseErrorOf(fn: () => unknown): ParseError {
  try {
    fn();
  } catch (err) {
    if (isParseError(err)) return err;
    throw err;
  }
  throw new Error("expected a ParseError");
}

export function loadError(source: string, options: LoadOptions = {}): ParseError {
  return parseErrorOf(() => load(source, options));
}

/** Parameter list parsed from `"type name" value ...` text. */
export function params(text = ""): ParamList {
  const [directive] = parseDirectives(`Shape "x" ${text}`);
  if (directive.type !== "Shape") throw new Error("expected a Shape directive");
  return directive.params;
}

export function expectMatrixClose(actual: readonly number[], expected: readonly number[]): void {
  expect(actual).toHaveLength(16);
  expected.forEach((value, i) => {
    expect(actual[i]).toBeCloseTo(value, 10);
  });
}

export const IDENTITY = [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1];
