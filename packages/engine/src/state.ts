import { Matrix4 } from "three";
import { ParamList } from "@pbrtkit/parser";

export const ATTRIBUTE_TARGETS = ["shape", "light", "material", "medium", "texture"] as const;

export type AttributeTarget = (typeof ATTRIBUTE_TARGETS)[number];

export function isAttributeTarget(name: string): name is AttributeTarget {
  return (ATTRIBUTE_TARGETS as readonly string[]).includes(name);
}

export type AttributeTables = Record<AttributeTarget, ParamList>;

function emptyAttributes(): AttributeTables {
  return {
    shape: new ParamList(),
    light: new ParamList(),
    material: new ParamList(),
    medium: new ParamList(),
    texture: new ParamList(),
  };
}

/**
 * Everything `AttributeBegin` saves and `AttributeEnd` restores.
 * Medium names are `""` when unset.
 */
export class GraphicsState {
  reverseOrientation = false;
  ctm = new Matrix4();
  interiorMedium = "";
  exteriorMedium = "";
  materialIndex: number | undefined;
  areaLightIndex: number | undefined;
  colorSpace: string | undefined;
  attributes: AttributeTables = emptyAttributes();

  clone(): GraphicsState {
    const copy = new GraphicsState();
    copy.reverseOrientation = this.reverseOrientation;
    copy.ctm = this.ctm.clone();
    copy.interiorMedium = this.interiorMedium;
    copy.exteriorMedium = this.exteriorMedium;
    copy.materialIndex = this.materialIndex;
    copy.areaLightIndex = this.areaLightIndex;
    copy.colorSpace = this.colorSpace;
    copy.attributes = {
      shape: this.attributes.shape.clone(),
      light: this.attributes.light.clone(),
      material: this.attributes.material.clone(),
      medium: this.attributes.medium.clone(),
      texture: this.attributes.texture.clone(),
    };
    return copy;
  }
}
