/**
 * 场景统一导出
 */

export { Scene } from './Scene';
export type { SceneDescriptor } from './Scene';
export { createMaterial, toMaterialData, IVORY, GLASS, RED_RUBBER, MIRROR } from './materials';
export { createLight, toLightData } from './lights';
export { createShowcaseScene, createShowcaseSurfaces, createShowcaseLights } from './presets';
