import { describe, expect, it } from "vitest";
import { isParseError, type ErrorKind } from "../errors.js";
import { Parser, parseDirectives } from "../parser.js";

function parseError(source: string, file?: string): unknown {
  try {
    parseDirectives(source, { file });
  } catch (err) {
    return err;
  }
  throw new Error("expected an error");
}

function expectKind(source: string, kind: ErrorKind): void {
  const err = parseError(source);
  expect(isParseError(err) ? err.kind : err).toBe(kind);
}

describe("Parser", () => {
  it("parses includes", () => {
    const directives = parseDirectives('Include "geometry/car.pbrt"\nImport "car.pbrt.gz"\n');
    expect(directives).toEqual([
      { type: "Include", path: "geometry/car.pbrt", offset: 0 },
      { type: "Import", path: "car.pbrt.gz", offset: 28 },
    ]);
  });

  it("parses transforms", () => {
    const [translate, scale, rotate, lookAt] = parseDirectives(
      "Translate 1 0 0\nScale -1 1 1\nRotate 90 0 0 1\nLookAt 0 0 5  0 0 0  0 1 0",
    );
    expect(translate).toEqual({ type: "Translate", delta: [1, 0, 0], offset: 0 });
    expect(scale).toEqual({ type: "Scale", scale: [-1, 1, 1], offset: 16 });
    expect(rotate).toEqual({ type: "Rotate", angle: 90, axis: [0, 0, 1], offset: 29 });
    expect(lookAt).toEqual({
      type: "LookAt",
      eye: [0, 0, 5],
      look: [0, 0, 0],
      up: [0, 1, 0],
      offset: 45,
    });
  });

  it("parses bracketed matrices", () => {
    const matrix = [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 2, 3, 4, 1];
    const [transform, concat] = parseDirectives(
      `Transform [ ${matrix.join(" ")} ]\nConcatTransform [${matrix.join(" ")}]`,
    );
    expect(transform).toMatchObject({ type: "Transform", matrix });
    expect(concat).toMatchObject({ type: "ConcatTransform", matrix });
  });

  it("requires brackets around matrices", () => {
    expectKind("Transform 1 0 0 0 0 1 0 0 0 0 1 0 0 0 0 1", "UnexpectedToken");
    expectKind("Transform [ 1 0 0 0 0 1 0 0 0 0 1 0 0 0 0 1 2 ]", "UnexpectedToken");
  });

  it("parses resource directives with parameter lists", () => {
    const [shape] = parseDirectives('Shape "sphere" "float radius" [ 2 ] "string name" "ball"');
    expect(shape.type).toBe("Shape");
    if (shape.type !== "Shape") return;
    expect(shape.name).toBe("sphere");
    expect(shape.params.size).toBe(2);
    expect(shape.params.float("radius", 1)).toBe(2);
    expect(shape.params.string("name")).toBe("ball");
  });

  it("stops parameter lists at the next bare word", () => {
    const directives = parseDirectives(
      'Material "diffuse" "rgb reflectance" [0.5 0.5 0.5]\nShape "sphere"\nWorldBegin',
    );
    expect(directives.map((d) => d.type)).toEqual(["Material", "Shape", "WorldBegin"]);
    const [material, shape] = directives;
    if (material.type !== "Material" || shape.type !== "Shape") return;
    expect(material.params.spectrum("reflectance")).toEqual({ type: "rgb", rgb: [0.5, 0.5, 0.5] });
    expect(shape.params.size).toBe(0);
  });

  it("parses options with scalar or bracketed values", () => {
    const [a, b] = parseDirectives(
      'Option "string filename" ["foo.exr"]\nOption "string filename" "foo.exr"',
    );
    if (a.type !== "Option" || b.type !== "Option") throw new Error("expected options");
    expect(a.param.name).toBe("filename");
    expect(a.param.asStrings()).toEqual(["foo.exr"]);
    expect(b.param.asStrings()).toEqual(["foo.exr"]);
  });

  it("parses textures and attributes", () => {
    const [texture, attribute] = parseDirectives(
      'Texture "checks" "spectrum" "checkerboard" "float uscale" 8\n' +
        'Attribute "shape" "float radius" 2',
    );
    expect(texture).toMatchObject({
      type: "Texture",
      name: "checks",
      valueType: "spectrum",
      textureClass: "checkerboard",
    });
    expect(attribute).toMatchObject({ type: "Attribute", target: "shape" });
  });

  it("parses medium interfaces with one or two names", () => {
    const directives = parseDirectives(
      'MediumInterface "fog" ""\nMediumInterface "water"\nWorldBegin',
    );
    expect(directives).toEqual([
      { type: "MediumInterface", interior: "fog", exterior: "", offset: 0 },
      { type: "MediumInterface", interior: "water", exterior: "water", offset: 25 },
      { type: "WorldBegin", offset: 49 },
    ]);
  });

  it("parses name and bare directives", () => {
    const directives = parseDirectives(
      'AttributeBegin\nCoordinateSystem "a"\nCoordSysTransform "a"\nNamedMaterial "m"\n' +
        'ObjectBegin "o"\nObjectEnd\nObjectInstance "o"\nReverseOrientation\nAttributeEnd\n' +
        'ColorSpace "aces2065-1"\nIdentity\nTransformTimes 0 1\nActiveTransform StartTime',
    );
    expect(directives.map((d) => d.type)).toEqual([
      "AttributeBegin",
      "CoordinateSystem",
      "CoordSysTransform",
      "NamedMaterial",
      "ObjectBegin",
      "ObjectEnd",
      "ObjectInstance",
      "ReverseOrientation",
      "AttributeEnd",
      "ColorSpace",
      "Identity",
      "TransformTimes",
      "ActiveTransform",
    ]);
    expect(directives[9]).toMatchObject({ name: "aces2065-1" });
    expect(directives[11]).toMatchObject({ start: 0, end: 1 });
    expect(directives[12]).toMatchObject({ which: "StartTime" });
  });

  it("skips comments", () => {
    const directives = parseDirectives(
      '# header\nShape "sphere" # the ball\n  "float radius" [ 1 # one\n ]\n',
    );
    expect(directives).toHaveLength(1);
    const [shape] = directives;
    if (shape.type !== "Shape") throw new Error("expected a shape");
    expect(shape.params.floats("radius")).toEqual([1]);
  });

  it("signals end of file between directives", () => {
    const parser = new Parser("WorldBegin");
    expect(parser.parseNext().type).toBe("WorldBegin");
    let err: unknown;
    try {
      parser.parseNext();
    } catch (e) {
      err = e;
    }
    expect(isParseError(err, "EndOfFile")).toBe(true);
  });

  it("reports syntactic errors", () => {
    expectKind("Bogus 1 2 3", "UnknownDirective");
    expectKind("Translate 1 2", "NoToken");
    expectKind("Shape", "NoToken");
    expectKind("Shape sphere", "InvalidString");
    expectKind('Shape "sphere" "float radius" [ 1 WorldBegin', "UnexpectedToken");
    expectKind('Shape "sphere" "float radius" [ 1 2', "NoToken");
    expectKind('Shape "sphere" "float radius" ]', "UnexpectedToken");
    expectKind("ActiveTransform [", "UnexpectedToken");
  });

  it("reports lexical and semantic errors", () => {
    expectKind("Translate 1 x 3", "ParseFloat");
    expectKind('Shape "sphere" "integer n" [ 1.5 ]', "ParseInt");
    expectKind('Shape "sphere" "float radius" 1 "float radius" 2', "DuplicatedParamName");
    expectKind('Shape "sphere" "real radius" 1', "InvalidParamType");
    expectKind('Shape "sphere" "float" 1', "InvalidParamName");
    expectKind('Include "unterminated', "InvalidToken");
  });

  it("locates errors by line and column", () => {
    const err = parseError("WorldBegin\n  Bogus", "scene.pbrt");
    expect(isParseError(err, "UnknownDirective")).toBe(true);
    if (!isParseError(err)) return;
    expect(err.category).toBe("syntactic");
    expect(err.location).toEqual({ file: "scene.pbrt", line: 2, column: 3 });
    expect(err.message).toBe("scene.pbrt:2:3: Unknown directive 'Bogus'");
  });

  it("locates errors inside parameter values", () => {
    const err = parseError('Shape "sphere"\n"float radius" [ 1 oops ]');
    if (!isParseError(err)) throw new Error("expected a parse error");
    expect(err.kind).toBe("ParseFloat");
    expect(err.location).toEqual({ file: undefined, line: 2, column: 20 });
    expect(err.message).toBe("2:20: Unable to parse float from 'oops'");
  });
});
