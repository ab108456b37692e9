import type { Matrix4Elements, Vec3Tuple } from "@pbrtkit/ir";
import type { Param, ParamList } from "./param.js";

export const DIRECTIVE_KEYWORDS = [
  "Include",
  "Import",
  "Option",
  "Film",
  "ColorSpace",
  "Camera",
  "Sampler",
  "Integrator",
  "Accelerator",
  "CoordinateSystem",
  "CoordSysTransform",
  "PixelFilter",
  "Identity",
  "Translate",
  "Scale",
  "Rotate",
  "LookAt",
  "Transform",
  "ConcatTransform",
  "TransformTimes",
  "ActiveTransform",
  "ReverseOrientation",
  "WorldBegin",
  "AttributeBegin",
  "AttributeEnd",
  "Attribute",
  "LightSource",
  "AreaLightSource",
  "Material",
  "MakeNamedMaterial",
  "NamedMaterial",
  "Texture",
  "Shape",
  "ObjectBegin",
  "ObjectEnd",
  "ObjectInstance",
  "MakeNamedMedium",
  "MediumInterface",
] as const;

export type DirectiveKeyword = (typeof DIRECTIVE_KEYWORDS)[number];

const KEYWORD_SET: ReadonlySet<string> = new Set(DIRECTIVE_KEYWORDS);

export function isDirectiveKeyword(text: string): text is DirectiveKeyword {
  return KEYWORD_SET.has(text);
}

// ============================================================================
// Directive records
// ============================================================================

/** Directives taking a type name followed by a parameter list. */
export type TypedResourceKeyword =
  | "Film"
  | "Camera"
  | "Sampler"
  | "Integrator"
  | "Accelerator"
  | "PixelFilter"
  | "LightSource"
  | "AreaLightSource"
  | "Material"
  | "Shape";

/** Directives taking a single quoted string. */
export type NameKeyword =
  | "ColorSpace"
  | "CoordinateSystem"
  | "CoordSysTransform"
  | "NamedMaterial"
  | "ObjectBegin"
  | "ObjectInstance";

export type BareKeyword =
  | "Identity"
  | "ReverseOrientation"
  | "WorldBegin"
  | "AttributeBegin"
  | "AttributeEnd"
  | "ObjectEnd";

// --- Files ---

export interface IncludeDirective {
  type: "Include" | "Import";
  path: string;
}

export interface OptionDirective {
  type: "Option";
  param: Param;
}

// --- Resources ---

export interface TypedResourceDirective {
  type: TypedResourceKeyword;
  /** Implementation name, e.g. `"sphere"` or `"perspective"`. */
  name: string;
  params: ParamList;
}

export interface NamedResourceDirective {
  type: "MakeNamedMaterial" | "MakeNamedMedium";
  name: string;
  params: ParamList;
}

export interface AttributeDirective {
  type: "Attribute";
  target: string;
  params: ParamList;
}

export interface TextureDirective {
  type: "Texture";
  name: string;
  valueType: string;
  textureClass: string;
  params: ParamList;
}

export interface NameDirective {
  type: NameKeyword;
  name: string;
}

export interface MediumInterfaceDirective {
  type: "MediumInterface";
  interior: string;
  exterior: string;
}

export interface BareDirective {
  type: BareKeyword;
}

// --- Transforms ---

export interface TranslateDirective {
  type: "Translate";
  delta: Vec3Tuple;
}

export interface ScaleDirective {
  type: "Scale";
  scale: Vec3Tuple;
}

export interface RotateDirective {
  type: "Rotate";
  /** Degrees. */
  angle: number;
  axis: Vec3Tuple;
}

export interface LookAtDirective {
  type: "LookAt";
  eye: Vec3Tuple;
  look: Vec3Tuple;
  up: Vec3Tuple;
}

export interface MatrixDirective {
  type: "Transform" | "ConcatTransform";
  /** 16 values, column-major. */
  matrix: Matrix4Elements;
}

export interface TransformTimesDirective {
  type: "TransformTimes";
  start: number;
  end: number;
}

export interface ActiveTransformDirective {
  type: "ActiveTransform";
  which: string;
}

type DirectiveBody =
  | IncludeDirective
  | OptionDirective
  | TypedResourceDirective
  | NamedResourceDirective
  | AttributeDirective
  | TextureDirective
  | NameDirective
  | MediumInterfaceDirective
  | BareDirective
  | TranslateDirective
  | ScaleDirective
  | RotateDirective
  | LookAtDirective
  | MatrixDirective
  | TransformTimesDirective
  | ActiveTransformDirective;

/** One parsed directive and the offset of its keyword. */
export type Directive = DirectiveBody & { offset: number };
