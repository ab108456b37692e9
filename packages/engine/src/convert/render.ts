import type {
  Accelerator,
  Filter,
  Integrator,
  IntegratorType,
  PixelSamplerType,
  Sampler,
} from "@pbrtkit/ir";
import type { ParamList } from "@pbrtkit/parser";
import { oneOf, unknownType } from "./params.js";

// --- Sampler ---

const PIXEL_SAMPLERS: readonly PixelSamplerType[] = [
  "halton",
  "independent",
  "paddedsobol",
  "pmj02bn",
  "sobol",
  "zsobol",
];

export function createSampler(name: string, params: ParamList): Sampler {
  const seed = params.integer("seed", 0);
  if (name === "stratified") {
    return {
      type: "stratified",
      jitter: params.boolean("jitter", true),
      xSamples: params.integer("xsamples", 4),
      ySamples: params.integer("ysamples", 4),
      seed,
    };
  }

  const type = PIXEL_SAMPLERS.find((t) => t === name);
  if (!type) throw unknownType("sampler", name);
  return {
    type,
    pixelSamples: params.integer("pixelsamples", 16),
    seed,
    randomization: params.string("randomization"),
  };
}

// --- Integrator ---

const INTEGRATORS: readonly IntegratorType[] = [
  "ambientocclusion",
  "bdpt",
  "lightpath",
  "mlt",
  "path",
  "randomwalk",
  "simplepath",
  "simplevolpath",
  "sppm",
  "volpath",
];

export function createIntegrator(name: string, params: ParamList): Integrator {
  const type = INTEGRATORS.find((t) => t === name);
  if (!type) throw unknownType("integrator", name);
  return {
    type,
    maxDepth: params.integer("maxdepth", 5),
    regularize: params.boolean("regularize", false),
    lightSampler: oneOf(params, "integrator", "lightsampler", ["bvh", "uniform", "power"], "bvh"),
  };
}

// --- Accelerator ---

export function createAccelerator(name: string, params: ParamList): Accelerator {
  switch (name) {
    case "bvh":
      return {
        type: "bvh",
        maxNodePrims: params.integer("maxnodeprims", 4),
        splitMethod: oneOf(
          params,
          "accelerator",
          "splitmethod",
          ["sah", "middle", "equalcounts", "hlbvh"],
          "sah",
        ),
      };
    case "kdtree":
      return {
        type: "kdtree",
        intersectCost: params.integer("intersectcost", 5),
        traversalCost: params.integer("traversalcost", 1),
        emptyBonus: params.float("emptybonus", 0.5),
        maxPrims: params.integer("maxprims", 1),
        maxDepth: params.integer("maxdepth", -1),
      };
    default:
      throw unknownType("accelerator", name);
  }
}

// --- Pixel filter ---

export function createFilter(name: string, params: ParamList): Filter {
  const radius = (fallback: number) => ({
    xRadius: params.float("xradius", fallback),
    yRadius: params.float("yradius", fallback),
  });

  switch (name) {
    case "box":
      return { type: "box", ...radius(0.5) };
    case "gaussian":
      return { type: "gaussian", ...radius(1.5), sigma: params.float("sigma", 0.5) };
    case "mitchell":
      return {
        type: "mitchell",
        ...radius(2),
        b: params.float("B", 1 / 3),
        c: params.float("C", 1 / 3),
      };
    case "sinc":
      return { type: "sinc", ...radius(4), tau: params.float("tau", 3) };
    case "triangle":
      return { type: "triangle", ...radius(2) };
    default:
      throw unknownType("filter", name);
  }
}
