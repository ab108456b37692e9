import { rgb, type Medium } from "@pbrtkit/ir";
import type { ParamList } from "@pbrtkit/parser";
import { invalidParameter, requiredFloats, requiredString, spectrum, unknownType } from "./params.js";

export function createMedium(name: string, params: ParamList): Medium {
  const scattering = {
    sigmaA: spectrum(params, "medium", "sigma_a") ?? rgb(1, 1, 1),
    sigmaS: spectrum(params, "medium", "sigma_s") ?? rgb(1, 1, 1),
    scale: params.float("scale", 1),
    g: params.float("g", 0),
  };

  switch (name) {
    case "homogeneous":
      return {
        type: "homogeneous",
        ...scattering,
        le: spectrum(params, "medium", "Le"),
        leScale: params.float("Lescale", 1),
        preset: params.string("preset"),
      };

    case "cloud":
      return {
        type: "cloud",
        ...scattering,
        density: params.float("density", 1),
        wispiness: params.float("wispiness", 1),
        frequency: params.float("frequency", 5),
        p0: params.point3("p0", [0, 0, 0]),
        p1: params.point3("p1", [1, 1, 1]),
      };

    case "uniformgrid": {
      const nx = params.integer("nx", 1);
      const ny = params.integer("ny", 1);
      const nz = params.integer("nz", 1);
      const density = requiredFloats(params, "medium", "density");
      if (density.length !== nx * ny * nz) {
        throw invalidParameter(
          "medium",
          "density",
          `has ${density.length} values, expected ${nx}*${ny}*${nz}`,
        );
      }
      return {
        type: "uniformgrid",
        ...scattering,
        nx,
        ny,
        nz,
        density,
        p0: params.point3("p0", [0, 0, 0]),
        p1: params.point3("p1", [1, 1, 1]),
        le: spectrum(params, "medium", "Le"),
        leScale: params.float("Lescale", 1),
      };
    }

    case "nanovdb":
      return {
        type: "nanovdb",
        ...scattering,
        filename: requiredString(params, "medium", "filename"),
        leScale: params.float("Lescale", 1),
      };

    default:
      throw unknownType("medium", name);
  }
}
