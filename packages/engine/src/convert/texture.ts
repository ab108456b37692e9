import type { Texture, TextureMapping, TextureValue, TextureValueType } from "@pbrtkit/ir";
import type { ParamList } from "@pbrtkit/parser";
import {
  floatValue,
  invalidParameter,
  oneOf,
  requiredString,
  spectrumValueOr,
  unknownType,
  type TextureLookup,
} from "./params.js";

export function parseTextureValueType(valueType: string): TextureValueType {
  if (valueType === "float" || valueType === "spectrum") return valueType;
  throw invalidParameter("texture", "type", `must be float or spectrum, got '${valueType}'`);
}

function mapping(params: ParamList): TextureMapping {
  return {
    type: oneOf(params, "texture", "mapping", ["uv", "spherical", "cylindrical", "planar"], "uv"),
    uScale: params.float("uscale", 1),
    vScale: params.float("vscale", 1),
    uDelta: params.float("udelta", 0),
    vDelta: params.float("vdelta", 0),
  };
}

export function createTexture(
  valueType: TextureValueType,
  textureClass: string,
  params: ParamList,
  textures: TextureLookup,
): Texture {
  const value = (name: string, fallback: number): TextureValue =>
    valueType === "float"
      ? floatValue(params, "texture", name, fallback, textures)
      : spectrumValueOr(params, "texture", name, fallback, textures);

  switch (textureClass) {
    case "constant":
      return { type: "constant", value: value("value", 1) };

    case "imagemap":
      return {
        type: "imagemap",
        filename: requiredString(params, "texture", "filename"),
        filter: oneOf(
          params,
          "texture",
          "filter",
          ["point", "bilinear", "trilinear", "ewa"],
          "bilinear",
        ),
        maxAnisotropy: params.float("maxanisotropy", 8),
        wrap: oneOf(params, "texture", "wrap", ["repeat", "black", "clamp", "octahedralsphere"], "repeat"),
        scale: params.float("scale", 1),
        invert: params.boolean("invert", false),
        encoding: params.string("encoding"),
        mapping: mapping(params),
      };

    case "checkerboard": {
      const dimension = params.integer("dimension", 2);
      if (dimension !== 2 && dimension !== 3) {
        throw invalidParameter("texture", "dimension", `must be 2 or 3, got ${dimension}`);
      }
      return {
        type: "checkerboard",
        dimension,
        tex1: value("tex1", 1),
        tex2: value("tex2", 0),
        mapping: mapping(params),
      };
    }

    case "scale":
      return {
        type: "scale",
        tex: value("tex", 1),
        scale: floatValue(params, "texture", "scale", 1, textures),
      };

    case "mix":
      return {
        type: "mix",
        tex1: value("tex1", 0),
        tex2: value("tex2", 1),
        amount: floatValue(params, "texture", "amount", 0.5, textures),
      };

    default:
      throw unknownType("texture", textureClass);
  }
}
