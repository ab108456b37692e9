import type { AreaLight, Light } from "@pbrtkit/ir";
import type { ParamList } from "@pbrtkit/parser";
import { optionalFloat, optionalFloats, spectrum, unknownType } from "./params.js";

export function createLight(name: string, params: ParamList): Light {
  const scale = params.float("scale", 1);
  const power = optionalFloat(params, "power");

  switch (name) {
    case "point":
      return {
        type: "point",
        i: spectrum(params, "light", "I"),
        scale,
        power,
        from: params.point3("from", [0, 0, 0]),
      };
    case "spot":
      return {
        type: "spot",
        i: spectrum(params, "light", "I"),
        scale,
        power,
        from: params.point3("from", [0, 0, 0]),
        to: params.point3("to", [0, 0, 1]),
        coneAngle: params.float("coneangle", 30),
        coneDeltaAngle: params.float("conedeltaangle", 5),
      };
    case "distant":
      return {
        type: "distant",
        l: spectrum(params, "light", "L"),
        scale,
        from: params.point3("from", [0, 0, 0]),
        to: params.point3("to", [0, 0, 1]),
        illuminance: optionalFloat(params, "illuminance"),
      };
    case "infinite":
      return {
        type: "infinite",
        l: spectrum(params, "light", "L"),
        scale,
        filename: params.string("filename"),
        illuminance: optionalFloat(params, "illuminance"),
        portal: optionalFloats(params, "portal"),
      };
    case "goniometric":
      return {
        type: "goniometric",
        i: spectrum(params, "light", "I"),
        scale,
        filename: params.string("filename"),
        power,
      };
    case "projection":
      return {
        type: "projection",
        scale,
        fov: params.float("fov", 90),
        filename: params.string("filename"),
        power,
      };
    default:
      throw unknownType("light", name);
  }
}

export function createAreaLight(name: string, params: ParamList): AreaLight {
  if (name !== "diffuse") throw unknownType("area light", name);
  return {
    type: "diffuse",
    l: spectrum(params, "area light", "L"),
    scale: params.float("scale", 1),
    twoSided: params.boolean("twosided", false),
    filename: params.string("filename"),
    power: optionalFloat(params, "power"),
  };
}
