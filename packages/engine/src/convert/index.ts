export { createCamera, createFilm } from "./camera.js";
export { createSampler, createIntegrator, createAccelerator, createFilter } from "./render.js";
export { createShape } from "./shape.js";
export { createMaterial, createMaterialEntity } from "./material.js";
export { createTexture, parseTextureValueType } from "./texture.js";
export { createLight, createAreaLight } from "./light.js";
export { createMedium } from "./medium.js";
export { applyOption } from "./options.js";
export type { TextureLookup } from "./params.js";
