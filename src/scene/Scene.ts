/**
 * Scene - 渲染期间只读的场景
 * 持有表面数组和光源数组，构造后不再修改
 */

import type { Surface, SurfaceDescriptor } from '../surfaces';
import { surfaceFromDescriptor } from '../surfaces';
import type { Light, LightData } from '../types';
import { InvalidSceneError } from '../utils/errors';
import { createLight, toLightData } from './lights';

/**
 * 场景的纯数据形式，可经 postMessage 传给 worker
 */
export interface SceneDescriptor {
  surfaces: SurfaceDescriptor[];
  lights: LightData[];
}

export class Scene {
  readonly surfaces: readonly Surface[];
  readonly lights: readonly Light[];

  /**
   * 表面和光源都经描述符重建，主线程与 worker 渲染的是同一份场景
   * 无法由描述符还原的表面类型会被拒绝
   * @param surfaces 表面顺序只影响距离相等时的取舍（先扫描者优先）
   */
  constructor(surfaces: readonly Surface[] = [], lights: readonly Light[] = []) {
    this.surfaces = Object.freeze(surfaces.map(rebuildSurface));
    this.lights = Object.freeze(lights.map((light) => createLight(toLightData(light))));
  }

  static fromDescriptor(descriptor: SceneDescriptor): Scene {
    return new Scene(
      descriptor.surfaces.map(surfaceFromDescriptor),
      descriptor.lights.map(createLight),
    );
  }

  toDescriptor(): SceneDescriptor {
    return {
      surfaces: this.surfaces.map((surface) => surface.toDescriptor()),
      lights: this.lights.map(toLightData),
    };
  }
}

function rebuildSurface(surface: Surface): Surface {
  const rebuilt = surfaceFromDescriptor(surface.toDescriptor());
  if (Object.getPrototypeOf(rebuilt) !== Object.getPrototypeOf(surface)) {
    throw new InvalidSceneError(
      `表面无法由描述符还原: ${surface.constructor.name} 被重建为 ${rebuilt.constructor.name}`,
    );
  }
  return rebuilt;
}
