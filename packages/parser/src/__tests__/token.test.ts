import { describe, expect, it } from "vitest";
import { isParseError } from "../errors.js";
import {
  classify,
  isValid,
  makeToken,
  tokenToBool,
  tokenToFloat,
  tokenToInt,
  unquote,
} from "../token.js";

function errorOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected an error");
}

describe("classify", () => {
  it("uses the first character", () => {
    expect(classify("[")).toBe("open");
    expect(classify("]")).toBe("close");
    expect(classify('"x"')).toBe("quoted");
    expect(classify("# x")).toBe("comment");
    expect(classify("Shape")).toBe("bare");
  });
});

describe("isValid", () => {
  it("accepts bare words and closed quotes", () => {
    expect(isValid(makeToken("Shape"))).toBe(true);
    expect(isValid(makeToken('"a b"'))).toBe(true);
    expect(isValid(makeToken('""'))).toBe(true);
  });

  it("rejects empty and half-quoted tokens", () => {
    expect(isValid(makeToken(""))).toBe(false);
    expect(isValid(makeToken('"'))).toBe(false);
    expect(isValid(makeToken('"abc'))).toBe(false);
    expect(isValid(makeToken('abc"'))).toBe(false);
  });

  it("rejects spaces outside quotes", () => {
    expect(isValid(makeToken("a b"))).toBe(false);
  });
});

describe("unquote", () => {
  it("strips exactly one quote on each side", () => {
    expect(unquote(makeToken('"sphere"'))).toBe("sphere");
    expect(unquote(makeToken('""'))).toBe("");
  });

  it("fails on unquoted tokens", () => {
    expect(unquote(makeToken("sphere"))).toBeUndefined();
    expect(unquote(makeToken('"'))).toBeUndefined();
  });
});

describe("scalar coercion", () => {
  it("parses floats", () => {
    expect(tokenToFloat(makeToken("1.5"))).toBe(1.5);
    expect(tokenToFloat(makeToken("-2"))).toBe(-2);
    expect(tokenToFloat(makeToken(".5"))).toBe(0.5);
    expect(tokenToFloat(makeToken("3."))).toBe(3);
    expect(tokenToFloat(makeToken("1e3"))).toBe(1000);
    expect(tokenToFloat(makeToken("+2.5E-1"))).toBe(0.25);
  });

  it("rejects malformed floats with the token offset", () => {
    const err = errorOf(() => tokenToFloat(makeToken("abc", 7)));
    expect(isParseError(err, "ParseFloat")).toBe(true);
    if (isParseError(err)) expect(err.offset).toBe(7);

    for (const text of ["", "1.2.3", "inf", "nan", "0x10", "1e"]) {
      expect(isParseError(errorOf(() => tokenToFloat(makeToken(text))), "ParseFloat")).toBe(true);
    }
  });

  it("parses integers", () => {
    expect(tokenToInt(makeToken("42"))).toBe(42);
    expect(tokenToInt(makeToken("-7"))).toBe(-7);
    expect(tokenToInt(makeToken("2147483647"))).toBe(2147483647);
  });

  it("rejects non-integers and out-of-range values", () => {
    for (const text of ["1.5", "x", "3000000000", ""]) {
      expect(isParseError(errorOf(() => tokenToInt(makeToken(text))), "ParseInt")).toBe(true);
    }
  });

  it("parses booleans bare or quoted", () => {
    expect(tokenToBool(makeToken("true"))).toBe(true);
    expect(tokenToBool(makeToken('"false"'))).toBe(false);
    expect(isParseError(errorOf(() => tokenToBool(makeToken("yes"))), "ParseBool")).toBe(true);
  });
});
