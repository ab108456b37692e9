/**
 * @pbrtkit/ir: in-memory scene model produced by the pbrt scene loader.
 *
 * Everything here is plain data: cross-references between entities are
 * indices into the scene's lists, never object references, and matrices are
 * 16-element column-major arrays.
 */

/** 4x4 matrix as 16 numbers in column-major order. */
export type Matrix4Elements = number[];

export type Vec2Tuple = [number, number];
export type Vec3Tuple = [number, number, number];

/** Identity matrix elements. */
export function identityMatrix(): Matrix4Elements {
  return [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1];
}

// --- Spectrum ---

export interface RgbSpectrum {
  type: "rgb";
  rgb: Vec3Tuple;
}

export interface BlackbodySpectrum {
  type: "blackbody";
  /** Temperature in Kelvin. */
  temperature: number;
}

/** Piecewise-linear spectrum given as (wavelength, value) pairs. */
export interface SampledSpectrum {
  type: "sampled";
  lambda: number[];
  values: number[];
}

export type Spectrum = RgbSpectrum | BlackbodySpectrum | SampledSpectrum;

export function rgb(r: number, g: number, b: number): RgbSpectrum {
  return { type: "rgb", rgb: [r, g, b] };
}

// --- Texturable values ---

export interface ConstantFloat {
  type: "constant";
  value: number;
}

export interface ConstantSpectrum {
  type: "constant";
  spectrum: Spectrum;
}

/** Reference to an entry of `Scene.textures`. */
export interface TextureRef {
  type: "texture";
  index: number;
}

export type FloatValue = ConstantFloat | TextureRef;
export type SpectrumValue = ConstantSpectrum | TextureRef;

// ============================================================================
// Scene-wide options
// ============================================================================

export type RenderCoordinateSystem = "cameraworld" | "camera" | "world";

/** Values set by `Option` directives. */
export interface Options {
  disablePixelJitter: boolean;
  disableTextureFiltering: boolean;
  disableWavelengthJitter: boolean;
  displacementEdgeScale: number;
  mseReferenceImage?: string;
  mseReferenceOut?: string;
  renderCoordSys: RenderCoordinateSystem;
  seed: number;
  forceDiffuse: boolean;
  pixelStats: boolean;
  wavefront: boolean;
}

export function defaultOptions(): Options {
  return {
    disablePixelJitter: false,
    disableTextureFiltering: false,
    disableWavelengthJitter: false,
    displacementEdgeScale: 1,
    renderCoordSys: "cameraworld",
    seed: 0,
    forceDiffuse: false,
    pixelStats: false,
    wavefront: false,
  };
}

// ============================================================================
// Camera, film, sampler, integrator, accelerator, filter
// ============================================================================

interface CameraShutter {
  shutterOpen: number;
  shutterClose: number;
}

interface ProjectiveCameraBase extends CameraShutter {
  lensRadius: number;
  focalDistance: number;
  frameAspectRatio?: number;
  /** [xmin, xmax, ymin, ymax] */
  screenWindow?: [number, number, number, number];
}

export interface PerspectiveCamera extends ProjectiveCameraBase {
  type: "perspective";
  /** Field of view in degrees along the shorter image axis. */
  fov: number;
}

export interface OrthographicCamera extends ProjectiveCameraBase {
  type: "orthographic";
}

export interface SphericalCamera extends CameraShutter {
  type: "spherical";
  mapping: "equalarea" | "equirectangular";
}

export interface RealisticCamera extends CameraShutter {
  type: "realistic";
  lensFile: string;
  apertureDiameter: number;
  focusDistance: number;
  aperture?: string;
}

export type Camera =
  | PerspectiveCamera
  | OrthographicCamera
  | SphericalCamera
  | RealisticCamera;

export interface CameraEntity {
  params: Camera;
  /** World-from-camera: inverse of the CTM when the camera was declared. */
  transform: Matrix4Elements;
  medium?: number;
}

export type FilmType = "rgb" | "gbuffer" | "spectral";

export interface Film {
  type: FilmType;
  xResolution: number;
  yResolution: number;
  /** [xmin, xmax, ymin, ymax] in NDC. */
  cropWindow: [number, number, number, number];
  pixelBounds?: [number, number, number, number];
  /** Sensor diagonal in millimeters. */
  diagonal: number;
  filename: string;
  iso: number;
  whiteBalance: number;
  sensor: string;
  saveFp16: boolean;
  /** Infinity when unset; serializes to null in JSON. */
  maxComponentValue: number;
}

export type PixelSamplerType =
  | "halton"
  | "independent"
  | "paddedsobol"
  | "pmj02bn"
  | "sobol"
  | "zsobol";

export interface PixelSampler {
  type: PixelSamplerType;
  pixelSamples: number;
  seed: number;
  randomization?: string;
}

export interface StratifiedSampler {
  type: "stratified";
  jitter: boolean;
  xSamples: number;
  ySamples: number;
  seed: number;
}

export type Sampler = PixelSampler | StratifiedSampler;

export type IntegratorType =
  | "ambientocclusion"
  | "bdpt"
  | "lightpath"
  | "mlt"
  | "path"
  | "randomwalk"
  | "simplepath"
  | "simplevolpath"
  | "sppm"
  | "volpath";

export interface Integrator {
  type: IntegratorType;
  maxDepth: number;
  regularize: boolean;
  lightSampler: string;
}

export interface BvhAccelerator {
  type: "bvh";
  maxNodePrims: number;
  splitMethod: string;
}

export interface KdTreeAccelerator {
  type: "kdtree";
  intersectCost: number;
  traversalCost: number;
  emptyBonus: number;
  maxPrims: number;
  maxDepth: number;
}

export type Accelerator = BvhAccelerator | KdTreeAccelerator;

interface FilterRadius {
  xRadius: number;
  yRadius: number;
}

export interface BoxFilter extends FilterRadius {
  type: "box";
}

export interface GaussianFilter extends FilterRadius {
  type: "gaussian";
  sigma: number;
}

export interface MitchellFilter extends FilterRadius {
  type: "mitchell";
  b: number;
  c: number;
}

export interface SincFilter extends FilterRadius {
  type: "sinc";
  tau: number;
}

export interface TriangleFilter extends FilterRadius {
  type: "triangle";
}

export type Filter =
  | BoxFilter
  | GaussianFilter
  | MitchellFilter
  | SincFilter
  | TriangleFilter;

// ============================================================================
// Shapes
// ============================================================================

export interface SphereShape {
  type: "sphere";
  radius: number;
  zMin: number;
  zMax: number;
  /** Degrees. */
  phiMax: number;
  alpha: number;
}

export interface CylinderShape {
  type: "cylinder";
  radius: number;
  zMin: number;
  zMax: number;
  phiMax: number;
}

export interface DiskShape {
  type: "disk";
  height: number;
  radius: number;
  innerRadius: number;
  phiMax: number;
}

export interface TriangleMeshShape {
  type: "trianglemesh";
  indices: number[];
  /** Flat xyz positions. */
  p: number[];
  n?: number[];
  s?: number[];
  uv?: number[];
  faceIndices?: number[];
}

export interface BilinearMeshShape {
  type: "bilinearmesh";
  indices: number[];
  p: number[];
  n?: number[];
  uv?: number[];
}

export interface LoopSubdivShape {
  type: "loopsubdiv";
  levels: number;
  indices: number[];
  p: number[];
}

export interface PlyMeshShape {
  type: "plymesh";
  filename: string;
  displacement?: string;
  edgeLength: number;
}

export interface CurveShape {
  type: "curve";
  p: number[];
  basis: "bezier" | "bspline";
  degree: number;
  curveType: "flat" | "cylinder" | "ribbon";
  width0: number;
  width1: number;
  splitDepth: number;
  n?: number[];
}

export type Shape =
  | SphereShape
  | CylinderShape
  | DiskShape
  | TriangleMeshShape
  | BilinearMeshShape
  | LoopSubdivShape
  | PlyMeshShape
  | CurveShape;

export interface ShapeEntity {
  params: Shape;
  /** Object-to-world. */
  transform: Matrix4Elements;
  reverseOrientation: boolean;
  materialIndex?: number;
  areaLightIndex?: number;
  interiorMedium?: number;
  exteriorMedium?: number;
}

// ============================================================================
// Materials and textures
// ============================================================================

/** Anisotropic roughness; `u` and `v` are equal unless set separately. */
export interface Roughness {
  u: FloatValue;
  v: FloatValue;
}

export interface DiffuseMaterial {
  type: "diffuse";
  reflectance: SpectrumValue;
}

export interface CoatedDiffuseMaterial {
  type: "coateddiffuse";
  reflectance: SpectrumValue;
  roughness: Roughness;
  thickness: FloatValue;
  albedo: SpectrumValue;
  g: FloatValue;
  eta: number;
  maxDepth: number;
  nSamples: number;
  remapRoughness: boolean;
}

export interface CoatedConductorMaterial {
  type: "coatedconductor";
  interfaceRoughness: Roughness;
  interfaceEta: number;
  thickness: FloatValue;
  conductorEta?: SpectrumValue;
  conductorK?: SpectrumValue;
  reflectance?: SpectrumValue;
  conductorRoughness: Roughness;
  albedo: SpectrumValue;
  g: FloatValue;
  maxDepth: number;
  nSamples: number;
  remapRoughness: boolean;
}

export interface ConductorMaterial {
  type: "conductor";
  eta?: SpectrumValue;
  k?: SpectrumValue;
  reflectance?: SpectrumValue;
  roughness: Roughness;
  remapRoughness: boolean;
}

export interface DielectricMaterial {
  type: "dielectric";
  eta: number;
  etaSpectrum?: Spectrum;
  roughness: Roughness;
  remapRoughness: boolean;
}

export interface ThinDielectricMaterial {
  type: "thindielectric";
  eta: number;
}

export interface DiffuseTransmissionMaterial {
  type: "diffusetransmission";
  reflectance: SpectrumValue;
  transmittance: SpectrumValue;
  scale: number;
}

export interface MixMaterial {
  type: "mix";
  /** Names of the two blended materials. */
  materials: [string, string];
  amount: FloatValue;
}

export interface InterfaceMaterial {
  type: "interface";
}

export interface MeasuredMaterial {
  type: "measured";
  filename: string;
}

export type Material =
  | DiffuseMaterial
  | CoatedDiffuseMaterial
  | CoatedConductorMaterial
  | ConductorMaterial
  | DielectricMaterial
  | ThinDielectricMaterial
  | DiffuseTransmissionMaterial
  | MixMaterial
  | InterfaceMaterial
  | MeasuredMaterial;

export interface MaterialEntity {
  /** Set for `MakeNamedMaterial`. */
  name?: string;
  params: Material;
  displacement?: FloatValue;
  normalMap?: string;
}

export type TextureValueType = "float" | "spectrum";
export type TextureValue = FloatValue | SpectrumValue;

export interface TextureMapping {
  type: "uv" | "spherical" | "cylindrical" | "planar";
  uScale: number;
  vScale: number;
  uDelta: number;
  vDelta: number;
}

export interface ConstantTexture {
  type: "constant";
  value: TextureValue;
}

export interface ImageMapTexture {
  type: "imagemap";
  filename: string;
  filter: string;
  maxAnisotropy: number;
  wrap: string;
  scale: number;
  invert: boolean;
  encoding?: string;
  mapping: TextureMapping;
}

export interface CheckerboardTexture {
  type: "checkerboard";
  dimension: number;
  tex1: TextureValue;
  tex2: TextureValue;
  mapping: TextureMapping;
}

export interface ScaleTexture {
  type: "scale";
  tex: TextureValue;
  scale: FloatValue;
}

export interface MixTexture {
  type: "mix";
  tex1: TextureValue;
  tex2: TextureValue;
  amount: FloatValue;
}

export type Texture =
  | ConstantTexture
  | ImageMapTexture
  | CheckerboardTexture
  | ScaleTexture
  | MixTexture;

export interface TextureEntity {
  name: string;
  valueType: TextureValueType;
  params: Texture;
  transform: Matrix4Elements;
}

// ============================================================================
// Lights and media
// ============================================================================

export interface PointLight {
  type: "point";
  i?: Spectrum;
  scale: number;
  power?: number;
  from: Vec3Tuple;
}

export interface SpotLight {
  type: "spot";
  i?: Spectrum;
  scale: number;
  power?: number;
  from: Vec3Tuple;
  to: Vec3Tuple;
  coneAngle: number;
  coneDeltaAngle: number;
}

export interface DistantLight {
  type: "distant";
  l?: Spectrum;
  scale: number;
  from: Vec3Tuple;
  to: Vec3Tuple;
  illuminance?: number;
}

export interface InfiniteLight {
  type: "infinite";
  l?: Spectrum;
  scale: number;
  filename?: string;
  illuminance?: number;
  portal?: number[];
}

export interface GoniometricLight {
  type: "goniometric";
  i?: Spectrum;
  scale: number;
  filename?: string;
  power?: number;
}

export interface ProjectionLight {
  type: "projection";
  scale: number;
  fov: number;
  filename?: string;
  power?: number;
}

export type Light =
  | PointLight
  | SpotLight
  | DistantLight
  | InfiniteLight
  | GoniometricLight
  | ProjectionLight;

export interface LightEntity {
  params: Light;
  transform: Matrix4Elements;
  medium?: number;
}

export interface DiffuseAreaLight {
  type: "diffuse";
  l?: Spectrum;
  scale: number;
  twoSided: boolean;
  filename?: string;
  power?: number;
}

export type AreaLight = DiffuseAreaLight;

interface ScatteringMediumBase {
  sigmaA: Spectrum;
  sigmaS: Spectrum;
  scale: number;
  /** Henyey-Greenstein asymmetry. */
  g: number;
}

export interface HomogeneousMedium extends ScatteringMediumBase {
  type: "homogeneous";
  le?: Spectrum;
  leScale: number;
  preset?: string;
}

export interface CloudMedium extends ScatteringMediumBase {
  type: "cloud";
  density: number;
  wispiness: number;
  frequency: number;
  p0: Vec3Tuple;
  p1: Vec3Tuple;
}

export interface UniformGridMedium extends ScatteringMediumBase {
  type: "uniformgrid";
  nx: number;
  ny: number;
  nz: number;
  density: number[];
  p0: Vec3Tuple;
  p1: Vec3Tuple;
  le?: Spectrum;
  leScale: number;
}

export interface NanoVdbMedium extends ScatteringMediumBase {
  type: "nanovdb";
  filename: string;
  leScale: number;
}

export type Medium =
  | HomogeneousMedium
  | CloudMedium
  | UniformGridMedium
  | NanoVdbMedium;

export interface MediumEntity {
  name: string;
  params: Medium;
  transform: Matrix4Elements;
}

// ============================================================================
// Object definitions (recorded, never expanded)
// ============================================================================

export interface ObjectDefinition {
  name: string;
  shapes: ShapeEntity[];
}

export interface ObjectInstanceEntity {
  objectIndex: number;
  transform: Matrix4Elements;
}

// ============================================================================
// Scene
// ============================================================================

/** A fully loaded pbrt scene. */
export interface Scene {
  options: Options;
  camera?: CameraEntity;
  film?: Film;
  sampler?: Sampler;
  integrator?: Integrator;
  accelerator?: Accelerator;
  filter?: Filter;
  colorSpace?: string;
  textures: TextureEntity[];
  materials: MaterialEntity[];
  lights: LightEntity[];
  areaLights: AreaLight[];
  mediums: MediumEntity[];
  shapes: ShapeEntity[];
  objects: ObjectDefinition[];
  instances: ObjectInstanceEntity[];
}

/** Create a new empty scene with default options. */
export function createScene(): Scene {
  return {
    options: defaultOptions(),
    textures: [],
    materials: [],
    lights: [],
    areaLights: [],
    mediums: [],
    shapes: [],
    objects: [],
    instances: [],
  };
}

/** Serialize a scene to a JSON string. */
export function toJson(scene: Scene): string {
  return JSON.stringify(scene, null, 2);
}
