import type { Shape } from "@pbrtkit/ir";
import type { ParamList } from "@pbrtkit/parser";
import {
  invalidParameter,
  missingParameter,
  oneOf,
  optionalFloats,
  optionalIntegers,
  points,
  unknownType,
} from "./params.js";

/** Mesh positions, required. */
function positions(params: ParamList): number[] {
  const p = points(params, "shape", "P");
  if (!p) throw missingParameter("shape", "P");
  return p;
}

/**
 * Vertex indices in groups of `arity`. With no `indices` parameter a mesh of
 * exactly `arity` vertices gets `0..arity-1`.
 */
function meshIndices(params: ParamList, arity: number, vertexCount: number): number[] {
  const indices = optionalIntegers(params, "indices");
  if (!indices) {
    if (vertexCount === arity) return Array.from({ length: arity }, (_, i) => i);
    throw missingParameter("shape", "indices");
  }
  if (indices.length % arity !== 0) {
    throw invalidParameter("shape", "indices", `length ${indices.length} is not a multiple of ${arity}`);
  }
  const bad = indices.find((i) => i < 0 || i >= vertexCount);
  if (bad !== undefined) {
    throw invalidParameter("shape", "indices", `index ${bad} is out of range for ${vertexCount} vertices`);
  }
  return indices;
}

/** Optional per-vertex data with `stride` values per vertex. */
function perVertex(
  params: ParamList,
  name: string,
  stride: number,
  vertexCount: number,
): number[] | undefined {
  const values = optionalFloats(params, name);
  if (values && values.length !== vertexCount * stride) {
    throw invalidParameter(
      "shape",
      name,
      `has ${values.length} values, expected ${vertexCount * stride}`,
    );
  }
  return values;
}

export function createShape(name: string, params: ParamList): Shape {
  switch (name) {
    case "sphere": {
      const radius = params.float("radius", 1);
      return {
        type: "sphere",
        radius,
        zMin: params.float("zmin", -radius),
        zMax: params.float("zmax", radius),
        phiMax: params.float("phimax", 360),
        alpha: params.float("alpha", 1),
      };
    }

    case "cylinder":
      return {
        type: "cylinder",
        radius: params.float("radius", 1),
        zMin: params.float("zmin", -1),
        zMax: params.float("zmax", 1),
        phiMax: params.float("phimax", 360),
      };

    case "disk":
      return {
        type: "disk",
        height: params.float("height", 0),
        radius: params.float("radius", 1),
        innerRadius: params.float("innerradius", 0),
        phiMax: params.float("phimax", 360),
      };

    case "trianglemesh": {
      const p = positions(params);
      const vertexCount = p.length / 3;
      const indices = meshIndices(params, 3, vertexCount);
      const faceIndices = optionalIntegers(params, "faceIndices");
      if (faceIndices && faceIndices.length !== indices.length / 3) {
        throw invalidParameter(
          "shape",
          "faceIndices",
          `has ${faceIndices.length} values, expected ${indices.length / 3}`,
        );
      }
      return {
        type: "trianglemesh",
        indices,
        p,
        n: perVertex(params, "N", 3, vertexCount),
        s: perVertex(params, "S", 3, vertexCount),
        uv: perVertex(params, "uv", 2, vertexCount),
        faceIndices,
      };
    }

    case "bilinearmesh": {
      const p = positions(params);
      const vertexCount = p.length / 3;
      return {
        type: "bilinearmesh",
        indices: meshIndices(params, 4, vertexCount),
        p,
        n: perVertex(params, "N", 3, vertexCount),
        uv: perVertex(params, "uv", 2, vertexCount),
      };
    }

    case "loopsubdiv": {
      const p = positions(params);
      const indices = optionalIntegers(params, "indices");
      if (!indices) throw missingParameter("shape", "indices");
      return { type: "loopsubdiv", levels: params.integer("levels", 3), indices, p };
    }

    case "plymesh": {
      const filename = params.string("filename");
      if (filename === undefined) throw missingParameter("shape", "filename");
      return {
        type: "plymesh",
        filename,
        displacement: params.string("displacement"),
        edgeLength: params.float("edgelength", 1),
      };
    }

    case "curve": {
      const p = positions(params);
      const width = params.float("width", 1);
      const degree = params.integer("degree", 3);
      if (degree !== 2 && degree !== 3) {
        throw invalidParameter("shape", "degree", `must be 2 or 3, got ${degree}`);
      }
      return {
        type: "curve",
        p,
        basis: oneOf(params, "shape", "basis", ["bezier", "bspline"], "bezier"),
        degree,
        curveType: oneOf(params, "shape", "type", ["flat", "cylinder", "ribbon"], "flat"),
        width0: params.float("width0", width),
        width1: params.float("width1", width),
        splitDepth: params.integer("splitdepth", 3),
        n: optionalFloats(params, "N"),
      };
    }

    default:
      throw unknownType("shape", name);
  }
}
