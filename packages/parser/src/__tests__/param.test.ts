import { describe, expect, it } from "vitest";
import { isParseError } from "../errors.js";
import { Param, ParamList } from "../param.js";
import { makeToken } from "../token.js";

function param(declaration: string, ...values: string[]): Param {
  const p = Param.fromDeclaration(declaration);
  for (const value of values) p.addToken(makeToken(value));
  return p;
}

function errorOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected an error");
}

describe("Param", () => {
  it("splits the declaration into type and name", () => {
    const p = Param.fromDeclaration("  point3   P ");
    expect(p.type).toBe("point3");
    expect(p.name).toBe("P");
    expect(p.length).toBe(0);
  });

  it("rejects unknown types and missing names", () => {
    expect(isParseError(errorOf(() => Param.fromDeclaration("floaty x")), "InvalidParamType")).toBe(
      true,
    );
    expect(isParseError(errorOf(() => Param.fromDeclaration("float")), "InvalidParamName")).toBe(
      true,
    );
    expect(isParseError(errorOf(() => Param.fromDeclaration("")), "InvalidParamName")).toBe(true);
  });

  it("picks the value container from the type", () => {
    expect(param("bool on").valueKind).toBe("booleans");
    expect(param("integer n").valueKind).toBe("integers");
    expect(param("blackbody L").valueKind).toBe("integers");
    expect(param("string s").valueKind).toBe("strings");
    expect(param("texture t").valueKind).toBe("strings");
    for (const type of ["float", "point2", "vector2", "point3", "vector3", "normal3", "spectrum", "rgb"]) {
      expect(param(`${type} v`).valueKind).toBe("floats");
    }
  });

  it("coerces tokens into the container", () => {
    expect(param("float radius", "2").asFloats()).toEqual([2]);
    expect(param("integer indices", "0", "1", "2").asIntegers()).toEqual([0, 1, 2]);
    expect(param("string filename", '"a.exr"').asStrings()).toEqual(["a.exr"]);
    expect(param("bool on", "true", '"false"').asBooleans()).toEqual([true, false]);
    expect(param("float radius", "2").asIntegers()).toBeUndefined();
  });

  it("leaves element counts unchecked", () => {
    expect(param("point3 P", "1", "2").asFloats()).toEqual([1, 2]);
  });

  it("requires quoted string values", () => {
    const err = errorOf(() => param("string filename", "a.exr"));
    expect(isParseError(err, "InvalidToken")).toBe(true);
  });

  it("reports scalar errors for the container type", () => {
    expect(isParseError(errorOf(() => param("integer n", "1.5")), "ParseInt")).toBe(true);
    expect(isParseError(errorOf(() => param("float x", "one")), "ParseFloat")).toBe(true);
    expect(isParseError(errorOf(() => param("bool b", "1")), "ParseBool")).toBe(true);
  });

  describe("asSpectrum", () => {
    it("reads rgb triples", () => {
      expect(param("rgb L", "0.5", "0.25", "1").asSpectrum()).toEqual({
        type: "rgb",
        rgb: [0.5, 0.25, 1],
      });
      expect(param("rgb L", "0.5", "0.25").asSpectrum()).toBeUndefined();
    });

    it("reads blackbody temperatures", () => {
      expect(param("blackbody L", "6500").asSpectrum()).toEqual({
        type: "blackbody",
        temperature: 6500,
      });
      expect(param("blackbody L").asSpectrum()).toBeUndefined();
    });

    it("reads sampled wavelength pairs", () => {
      expect(param("spectrum eta", "400", "1.5", "700", "1.4").asSpectrum()).toEqual({
        type: "sampled",
        lambda: [400, 700],
        values: [1.5, 1.4],
      });
      expect(param("spectrum eta", "400", "1.5", "700").asSpectrum()).toBeUndefined();
    });

    it("is undefined for other types", () => {
      expect(param("float x", "1", "2", "3").asSpectrum()).toBeUndefined();
    });
  });
});

describe("ParamList", () => {
  it("rejects duplicated names", () => {
    const list = new ParamList();
    list.add(param("float radius", "1"));
    const err = errorOf(() => list.add(param("integer radius", "2"), 12));
    expect(isParseError(err, "DuplicatedParamName")).toBe(true);
    if (isParseError(err)) expect(err.offset).toBe(12);
    expect(list.float("radius", 0)).toBe(1);
  });

  it("merges with overwrite", () => {
    const local = new ParamList();
    local.add(param("float radius", "1"));
    local.add(param("float zmin", "-1"));

    const inherited = new ParamList();
    inherited.add(param("float radius", "2"));

    local.merge(inherited);
    expect(local.size).toBe(2);
    expect(local.float("radius", 0)).toBe(2);
    expect(local.float("zmin", 0)).toBe(-1);
    expect(local.names().sort()).toEqual(["radius", "zmin"]);
  });

  it("clones independently", () => {
    const list = new ParamList();
    list.add(param("float a", "1"));
    const copy = list.clone();
    copy.add(param("float b", "2"));
    expect(list.has("b")).toBe(false);
    expect(copy.size).toBe(2);
  });

  it("answers typed lookups with defaults", () => {
    const list = new ParamList();
    list.add(param("float fov", "45"));
    list.add(param("integer maxdepth", "8"));
    list.add(param("bool jitter", "false"));
    list.add(param("string mapping", '"equirect"'));
    list.add(param("point3 from", "1", "2", "3"));
    list.add(param("rgb L", "1", "1", "1"));

    expect(list.float("fov", 90)).toBe(45);
    expect(list.float("missing", 90)).toBe(90);
    expect(list.float("maxdepth", 5)).toBe(5);
    expect(list.integer("maxdepth", 5)).toBe(8);
    expect(list.boolean("jitter", true)).toBe(false);
    expect(list.string("mapping")).toBe("equirect");
    expect(list.string("missing")).toBeUndefined();
    expect(list.string("missing", "fallback")).toBe("fallback");
    expect(list.point3("from", [0, 0, 0])).toEqual([1, 2, 3]);
    expect(list.point3("to", [0, 0, 1])).toEqual([0, 0, 1]);
    expect(list.spectrum("L")).toEqual({ type: "rgb", rgb: [1, 1, 1] });
    expect(list.spectrum("fov")).toBeUndefined();
    expect([...list].map((p) => p.name)).toEqual(["fov", "maxdepth", "jitter", "mapping", "from", "L"]);
  });
});
