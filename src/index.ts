/**
 * SDF 光线步进渲染器
 * 库入口文件 - 导出所有公共 API
 */

// ============================================
// 统一类型定义
// ============================================
export type {
  Vec3Tuple,
  Vec4Tuple,
  Albedo,
  Material,
  MaterialData,
  Light,
  LightData,
} from './types';

export { DEFAULT_MATERIAL } from './types';

// ============================================
// 错误类型
// ============================================
export { InvalidSceneError, ImageWriteError } from './utils';

// ============================================
// Core
// ============================================
export { Vec3 } from './core/math/Vec3';
export { Ray } from './core/math/Ray';
export { Camera } from './core/Camera';
export * from './core/constants';
export { queryScene } from './core/SceneQuery';
export type { SceneSample } from './core/SceneQuery';
export { march, checkerboardColor } from './core/RayMarcher';
export type { HitRecord } from './core/RayMarcher';
export { fresnel, fresnelComponents, reflect, refract } from './core/optics';
export type { FresnelComponents } from './core/optics';
export { castRay } from './core/Shader';
export { createRenderStats, mergeRenderStats } from './core/RenderStats';
export type { RenderStats } from './core/RenderStats';

// ============================================
// Surfaces
// ============================================
export { Sphere, surfaceFromDescriptor } from './surfaces';
export type { Surface, SurfaceKind, SurfaceDescriptor, SphereDescriptor } from './surfaces';

// ============================================
// Scene
// ============================================
export {
  Scene,
  createMaterial,
  toMaterialData,
  createLight,
  toLightData,
  IVORY,
  GLASS,
  RED_RUBBER,
  MIRROR,
  createShowcaseScene,
  createShowcaseSurfaces,
  createShowcaseLights,
} from './scene';
export type { SceneDescriptor } from './scene';

// ============================================
// Rendering
// ============================================
export { Framebuffer } from './render/Framebuffer';
export { renderFrame, resolveWorkerScript, DEFAULT_RENDER_OPTIONS } from './render/FrameRenderer';
export type { RenderOptions, FrameResult } from './render/FrameRenderer';
export { renderRows, splitRows } from './render/renderRows';
export { render, OUTPUT_PATH, OUTPUT_WIDTH, OUTPUT_HEIGHT, OUTPUT_FOV } from './render/render';
export type { RenderDispatchOptions } from './render/render';

// ============================================
// Output
// ============================================
export { encodePPM, writePPM, normalizeColor } from './io/PPMWriter';
