import { Matrix4 } from "three";
import { createScene, type ObjectDefinition, type Scene, type ShapeEntity } from "@pbrtkit/ir";
import { ParseError, type Directive, type ParamList } from "@pbrtkit/parser";
import {
  applyOption,
  createAccelerator,
  createAreaLight,
  createCamera,
  createFilm,
  createFilter,
  createIntegrator,
  createLight,
  createMaterialEntity,
  createMedium,
  createSampler,
  createShape,
  createTexture,
  parseTextureValueType,
} from "./convert/index.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import { GraphicsState, isAttributeTarget, type AttributeTarget } from "./state.js";
import {
  fromElements,
  inverseOf,
  lookAt,
  rotation,
  scaling,
  toElements,
  translation,
} from "./transform.js";

export interface SceneBuilderOptions {
  logger?: Logger;
}

/** Why a graphics state was pushed; `AttributeEnd` and `ObjectEnd` must match. */
type ScopeKind = "attribute" | "object";

interface SavedState {
  kind: ScopeKind;
  state: GraphicsState;
}

/**
 * Graphics-state machine that turns a directive stream into a `Scene`.
 *
 * Directives are accepted in any phase. `Include` is the loader's job and is
 * rejected here.
 */
export class SceneBuilder {
  readonly scene: Scene = createScene();
  private state = new GraphicsState();
  private readonly stack: SavedState[] = [];
  private readonly coordinateSystems = new Map<string, Matrix4>();
  private readonly textureNames = new Map<string, number>();
  private readonly materialNames = new Map<string, number>();
  private readonly mediumNames = new Map<string, number>();
  private readonly objectNames = new Map<string, number>();
  private currentObject: ObjectDefinition | undefined;
  private worldBegun = false;
  private readonly logger: Logger;

  constructor(options: SceneBuilderOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  /** Current transformation matrix, column-major. */
  get ctm(): number[] {
    return toElements(this.state.ctm);
  }

  get depth(): number {
    return this.stack.length;
  }

  /**
   * Apply one directive. Errors raised without a position are attributed to
   * the directive's keyword.
   */
  apply(directive: Directive): void {
    try {
      this.dispatch(directive);
    } catch (err) {
      if (err instanceof ParseError && err.offset === undefined) {
        err.offset = directive.offset;
      }
      throw err;
    }
  }

  /** Check end-of-input consistency and return the scene. */
  finish(): Scene {
    if (this.stack.length > 0) {
      const open = this.stack[this.stack.length - 1].kind === "object" ? "ObjectBegin" : "AttributeBegin";
      throw new ParseError(
        "UnbalancedAttributes",
        `${this.stack.length} scope(s) still open at end of input (last opened by ${open})`,
      );
    }
    if (!this.worldBegun) {
      throw new ParseError("MissingWorldBegin", "Scene has no WorldBegin");
    }
    return this.scene;
  }

  private dispatch(directive: Directive): void {
    const { state, scene } = this;

    switch (directive.type) {
      // --- Files and options ---
      case "Include":
        throw new ParseError("Unsupported", "Include must be resolved by the loader");
      case "Import":
        throw new ParseError("Unsupported", `Import of '${directive.path}' is not supported`);
      case "Option":
        applyOption(scene.options, directive.param);
        return;
      case "ColorSpace":
        state.colorSpace = directive.name;
        scene.colorSpace = directive.name;
        return;

      // --- Transforms ---
      case "Identity":
        state.ctm.identity();
        return;
      case "Translate":
        state.ctm.multiply(translation(directive.delta));
        return;
      case "Scale":
        state.ctm.multiply(scaling(directive.scale));
        return;
      case "Rotate":
        state.ctm.multiply(rotation(directive.angle, directive.axis));
        return;
      case "LookAt":
        state.ctm.multiply(lookAt(directive.eye, directive.look, directive.up));
        return;
      case "Transform":
        state.ctm = fromElements(directive.matrix);
        return;
      case "ConcatTransform":
        state.ctm.multiply(fromElements(directive.matrix));
        return;
      case "CoordinateSystem":
        this.coordinateSystems.set(directive.name, state.ctm.clone());
        return;
      case "CoordSysTransform": {
        const saved = this.coordinateSystems.get(directive.name);
        if (!saved) {
          throw new ParseError(
            "UnknownCoordinateSystem",
            `Unknown coordinate system '${directive.name}'`,
          );
        }
        state.ctm = saved.clone();
        return;
      }
      case "TransformTimes":
      case "ActiveTransform":
        throw new ParseError("Unsupported", `${directive.type} (animated transforms) is not supported`);
      case "ReverseOrientation":
        state.reverseOrientation = !state.reverseOrientation;
        return;

      // --- Scoping ---
      case "WorldBegin":
        if (this.worldBegun) {
          throw new ParseError("DuplicateWorldBegin", "WorldBegin appears more than once");
        }
        this.worldBegun = true;
        state.ctm.identity();
        this.coordinateSystems.set("world", new Matrix4());
        return;
      case "AttributeBegin":
        this.push("attribute");
        return;
      case "AttributeEnd":
        this.pop("attribute");
        return;
      case "Attribute": {
        const target = directive.target;
        if (!isAttributeTarget(target)) {
          throw new ParseError(
            "UnknownAttributeTarget",
            `Unknown attribute target '${target}'`,
          );
        }
        state.attributes[target].merge(directive.params);
        return;
      }

      // --- Header resources ---
      case "Camera": {
        const worldFromCamera = inverseOf(state.ctm);
        scene.camera = {
          params: createCamera(directive.name, directive.params),
          transform: toElements(worldFromCamera),
          medium: this.resolveMedium(state.exteriorMedium),
        };
        this.coordinateSystems.set("camera", worldFromCamera);
        return;
      }
      case "Film":
        scene.film = createFilm(directive.name, directive.params);
        return;
      case "Sampler":
        scene.sampler = createSampler(directive.name, directive.params);
        return;
      case "Integrator":
        scene.integrator = createIntegrator(directive.name, directive.params);
        return;
      case "Accelerator":
        scene.accelerator = createAccelerator(directive.name, directive.params);
        return;
      case "PixelFilter":
        scene.filter = createFilter(directive.name, directive.params);
        return;

      // --- World resources ---
      case "Texture": {
        const valueType = parseTextureValueType(directive.valueType);
        const params = this.inherit("texture", directive.params);
        scene.textures.push({
          name: directive.name,
          valueType,
          params: createTexture(valueType, directive.textureClass, params, this.textureNames),
          transform: toElements(state.ctm),
        });
        this.textureNames.set(directive.name, scene.textures.length - 1);
        return;
      }
      case "Material": {
        const params = this.inherit("material", directive.params);
        scene.materials.push(createMaterialEntity(directive.name, params, this.textureNames));
        state.materialIndex = scene.materials.length - 1;
        return;
      }
      case "MakeNamedMaterial": {
        const params = this.inherit("material", directive.params);
        const type = params.string("type");
        if (type === undefined) {
          throw new ParseError(
            "MissingParameter",
            `MakeNamedMaterial '${directive.name}' has no "string type" parameter`,
          );
        }
        scene.materials.push(
          createMaterialEntity(type, params, this.textureNames, directive.name),
        );
        this.materialNames.set(directive.name, scene.materials.length - 1);
        return;
      }
      case "NamedMaterial": {
        const index = this.materialNames.get(directive.name);
        if (index === undefined) {
          this.logger.debug("builder", `NamedMaterial '${directive.name}' is not defined`);
        }
        state.materialIndex = index;
        return;
      }
      case "MakeNamedMedium": {
        const params = this.inherit("medium", directive.params);
        const type = params.string("type");
        if (type === undefined) {
          throw new ParseError(
            "MissingParameter",
            `MakeNamedMedium '${directive.name}' has no "string type" parameter`,
          );
        }
        scene.mediums.push({
          name: directive.name,
          params: createMedium(type, params),
          transform: toElements(state.ctm),
        });
        this.mediumNames.set(directive.name, scene.mediums.length - 1);
        return;
      }
      case "MediumInterface":
        state.interiorMedium = directive.interior;
        state.exteriorMedium = directive.exterior;
        return;
      case "LightSource": {
        const params = this.inherit("light", directive.params);
        scene.lights.push({
          params: createLight(directive.name, params),
          transform: toElements(state.ctm),
          medium: this.resolveMedium(state.exteriorMedium),
        });
        return;
      }
      case "AreaLightSource": {
        const params = this.inherit("light", directive.params);
        scene.areaLights.push(createAreaLight(directive.name, params));
        state.areaLightIndex = scene.areaLights.length - 1;
        return;
      }
      case "Shape": {
        const params = this.inherit("shape", directive.params);
        const shape: ShapeEntity = {
          params: createShape(directive.name, params),
          transform: toElements(state.ctm),
          reverseOrientation: state.reverseOrientation,
          materialIndex: state.materialIndex,
          areaLightIndex: state.areaLightIndex,
          interiorMedium: this.resolveMedium(state.interiorMedium),
          exteriorMedium: this.resolveMedium(state.exteriorMedium),
        };
        (this.currentObject?.shapes ?? scene.shapes).push(shape);
        return;
      }

      // --- Object definitions ---
      case "ObjectBegin": {
        if (this.currentObject) {
          throw new ParseError(
            "UnbalancedAttributes",
            `ObjectBegin '${directive.name}' inside object '${this.currentObject.name}'`,
          );
        }
        this.push("object");
        this.currentObject = { name: directive.name, shapes: [] };
        scene.objects.push(this.currentObject);
        this.objectNames.set(directive.name, scene.objects.length - 1);
        return;
      }
      case "ObjectEnd":
        this.pop("object");
        this.currentObject = undefined;
        return;
      case "ObjectInstance": {
        const index = this.objectNames.get(directive.name);
        if (index === undefined) {
          throw new ParseError("UnknownObject", `Unknown object '${directive.name}'`);
        }
        scene.instances.push({ objectIndex: index, transform: toElements(state.ctm) });
        return;
      }
    }
  }

  /** Directive parameters with the inherited table merged over them. */
  private inherit(target: AttributeTarget, params: ParamList): ParamList {
    return params.clone().merge(this.state.attributes[target]);
  }

  private resolveMedium(name: string): number | undefined {
    if (name === "") return undefined;
    const index = this.mediumNames.get(name);
    if (index === undefined) {
      this.logger.debug("builder", `Medium '${name}' is not defined`);
    }
    return index;
  }

  private push(kind: ScopeKind): void {
    this.stack.push({ kind, state: this.state.clone() });
  }

  private pop(kind: ScopeKind): void {
    const saved = this.stack.pop();
    const keyword = kind === "object" ? "ObjectEnd" : "AttributeEnd";
    if (!saved) {
      throw new ParseError("UnbalancedAttributes", `Unmatched ${keyword}`);
    }
    if (saved.kind !== kind) {
      this.stack.push(saved);
      throw new ParseError(
        "UnbalancedAttributes",
        `${keyword} does not match ${saved.kind === "object" ? "ObjectBegin" : "AttributeBegin"}`,
      );
    }
    this.state = saved.state;
  }
}
