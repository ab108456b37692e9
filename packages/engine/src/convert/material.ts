import type { Material, MaterialEntity, Roughness } from "@pbrtkit/ir";
import type { ParamList } from "@pbrtkit/parser";
import {
  floatValue,
  invalidParameter,
  missingParameter,
  requiredString,
  spectrum,
  spectrumValue,
  spectrumValueOr,
  unknownType,
  type TextureLookup,
} from "./params.js";

function roughness(params: ParamList, prefix: string, textures: TextureLookup): Roughness {
  const read = (name: string, fallback: number) =>
    floatValue(params, "material", `${prefix}${name}`, fallback, textures);
  const base = read("roughness", 0);
  return {
    u: params.has(`${prefix}uroughness`) ? read("uroughness", 0) : base,
    v: params.has(`${prefix}vroughness`) ? read("vroughness", 0) : base,
  };
}

export function createMaterial(name: string, params: ParamList, textures: TextureLookup): Material {
  const float = (param: string, fallback: number) =>
    floatValue(params, "material", param, fallback, textures);
  const spectrumOr = (param: string, fallback: number) =>
    spectrumValueOr(params, "material", param, fallback, textures);
  const optionalSpectrum = (param: string) => spectrumValue(params, "material", param, textures);
  const remapRoughness = params.boolean("remaproughness", true);

  switch (name) {
    case "diffuse":
      return { type: "diffuse", reflectance: spectrumOr("reflectance", 0.5) };

    case "coateddiffuse":
      return {
        type: "coateddiffuse",
        reflectance: spectrumOr("reflectance", 0.5),
        roughness: roughness(params, "", textures),
        thickness: float("thickness", 0.01),
        albedo: spectrumOr("albedo", 0),
        g: float("g", 0),
        eta: params.float("eta", 1.5),
        maxDepth: params.integer("maxdepth", 10),
        nSamples: params.integer("nsamples", 1),
        remapRoughness,
      };

    case "coatedconductor":
      return {
        type: "coatedconductor",
        interfaceRoughness: roughness(params, "interface.", textures),
        interfaceEta: params.float("interface.eta", 1.5),
        thickness: float("thickness", 0.01),
        conductorEta: optionalSpectrum("conductor.eta"),
        conductorK: optionalSpectrum("conductor.k"),
        reflectance: optionalSpectrum("reflectance"),
        conductorRoughness: roughness(params, "conductor.", textures),
        albedo: spectrumOr("albedo", 0),
        g: float("g", 0),
        maxDepth: params.integer("maxdepth", 10),
        nSamples: params.integer("nsamples", 1),
        remapRoughness,
      };

    case "conductor":
      return {
        type: "conductor",
        eta: optionalSpectrum("eta"),
        k: optionalSpectrum("k"),
        reflectance: optionalSpectrum("reflectance"),
        roughness: roughness(params, "", textures),
        remapRoughness,
      };

    case "dielectric": {
      // `eta` is either a plain float or a sampled spectrum.
      const spectral = params.get("eta")?.type === "spectrum";
      return {
        type: "dielectric",
        eta: spectral ? 1.5 : params.float("eta", 1.5),
        etaSpectrum: spectral ? spectrum(params, "material", "eta") : undefined,
        roughness: roughness(params, "", textures),
        remapRoughness,
      };
    }

    case "thindielectric":
      return { type: "thindielectric", eta: params.float("eta", 1.5) };

    case "diffusetransmission":
      return {
        type: "diffusetransmission",
        reflectance: spectrumOr("reflectance", 0.25),
        transmittance: spectrumOr("transmittance", 0.25),
        scale: params.float("scale", 1),
      };

    case "mix": {
      const materials = params.strings("materials");
      if (!materials) throw missingParameter("material", "materials");
      if (materials.length !== 2) {
        throw invalidParameter("material", "materials", `expects 2 names, got ${materials.length}`);
      }
      return {
        type: "mix",
        materials: [materials[0], materials[1]],
        amount: float("amount", 0.5),
      };
    }

    case "interface":
      return { type: "interface" };

    case "measured":
      return { type: "measured", filename: requiredString(params, "material", "filename") };

    default:
      throw unknownType("material", name);
  }
}

/** Material plus the displacement and normal map every material type accepts. */
export function createMaterialEntity(
  type: string,
  params: ParamList,
  textures: TextureLookup,
  name?: string,
): MaterialEntity {
  return {
    name,
    params: createMaterial(type, params, textures),
    displacement: params.has("displacement")
      ? floatValue(params, "material", "displacement", 0, textures)
      : undefined,
    normalMap: params.string("normalmap"),
  };
}
