import type { Camera, Film, FilmType } from "@pbrtkit/ir";
import type { ParamList } from "@pbrtkit/parser";
import { oneOf, optionalFloat, optionalIntegers, quad, unknownType, invalidParameter } from "./params.js";

export function createCamera(name: string, params: ParamList): Camera {
  const shutter = {
    shutterOpen: params.float("shutteropen", 0),
    shutterClose: params.float("shutterclose", 1),
  };
  const projective = () => ({
    ...shutter,
    lensRadius: params.float("lensradius", 0),
    focalDistance: params.float("focaldistance", 1e6),
    frameAspectRatio: optionalFloat(params, "frameaspectratio"),
    screenWindow: quad(params, "camera", "screenwindow"),
  });

  switch (name) {
    case "perspective":
      return { type: "perspective", ...projective(), fov: params.float("fov", 90) };
    case "orthographic":
      return { type: "orthographic", ...projective() };
    case "spherical":
      return {
        type: "spherical",
        ...shutter,
        mapping: oneOf(params, "camera", "mapping", ["equalarea", "equirectangular"], "equalarea"),
      };
    case "realistic":
      return {
        type: "realistic",
        ...shutter,
        lensFile: params.string("lensfile", ""),
        apertureDiameter: params.float("aperturediameter", 1),
        focusDistance: params.float("focusdistance", 10),
        aperture: params.string("aperture"),
      };
    default:
      throw unknownType("camera", name);
  }
}

const FILM_TYPES: readonly FilmType[] = ["rgb", "gbuffer", "spectral"];

export function createFilm(name: string, params: ParamList): Film {
  const type = FILM_TYPES.find((t) => t === name);
  if (!type) throw unknownType("film", name);

  const bounds = optionalIntegers(params, "pixelbounds");
  if (bounds && bounds.length !== 4) {
    throw invalidParameter("film", "pixelbounds", `expects 4 values, got ${bounds.length}`);
  }

  return {
    type,
    xResolution: params.integer("xresolution", 1280),
    yResolution: params.integer("yresolution", 720),
    cropWindow: quad(params, "film", "cropwindow") ?? [0, 1, 0, 1],
    pixelBounds: bounds ? [bounds[0], bounds[1], bounds[2], bounds[3]] : undefined,
    diagonal: params.float("diagonal", 35),
    filename: params.string("filename", "pbrt.exr"),
    iso: params.float("iso", 100),
    whiteBalance: params.float("whitebalance", 0),
    sensor: params.string("sensor", "cie1931"),
    saveFp16: params.boolean("savefp16", true),
    maxComponentValue: params.float("maxcomponentvalue", Infinity),
  };
}
