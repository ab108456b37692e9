import type { Options } from "@pbrtkit/ir";
import { ParseError, type Param } from "@pbrtkit/parser";
import { invalidParameter } from "./params.js";

function first<T>(values: readonly T[] | undefined, param: Param): T {
  const value = values?.[0];
  if (value === undefined) {
    throw invalidParameter("option", param.name, `expects a single ${param.type} value`);
  }
  return value;
}

/** Apply one `Option` directive to `options`. */
export function applyOption(options: Options, param: Param): void {
  const bool = () => first(param.asBooleans(), param);
  const float = () => first(param.asFloats(), param);
  const integer = () => first(param.asIntegers(), param);
  const string = () => first(param.asStrings(), param);

  switch (param.name) {
    case "disablepixeljitter":
      options.disablePixelJitter = bool();
      return;
    case "disabletexturefiltering":
      options.disableTextureFiltering = bool();
      return;
    case "disablewavelengthjitter":
      options.disableWavelengthJitter = bool();
      return;
    case "displacementedgescale":
      options.displacementEdgeScale = float();
      return;
    case "msereferenceimage":
      options.mseReferenceImage = string();
      return;
    case "msereferenceout":
      options.mseReferenceOut = string();
      return;
    case "rendercoordsys": {
      const value = string();
      if (value !== "cameraworld" && value !== "camera" && value !== "world") {
        throw invalidParameter("option", param.name, `must be cameraworld, camera or world, got '${value}'`);
      }
      options.renderCoordSys = value;
      return;
    }
    case "seed":
      options.seed = integer();
      return;
    case "forcediffuse":
      options.forceDiffuse = bool();
      return;
    case "pixelstats":
      options.pixelStats = bool();
      return;
    case "wavefront":
      options.wavefront = bool();
      return;
    default:
      throw new ParseError("UnknownOption", `Unknown option '${param.name}'`);
  }
}
