/**
 * RayMarcher - 沿射线在 SDF 场景中步进，未命中时退回棋盘格地面
 */

import {
  CHECKER_DARK,
  CHECKER_LIGHT,
  EPSILON,
  GROUND_CUTOFF,
  GROUND_HALF_WIDTH,
  GROUND_PLANE_Y,
  GROUND_Z_FAR,
  GROUND_Z_NEAR,
  MAX_MARCHING_STEPS,
} from './constants';
import { Vec3 } from './math/Vec3';
import type { Ray } from './math/Ray';
import type { RenderStats } from './RenderStats';
import { queryScene } from './SceneQuery';
import type { Surface } from '../surfaces';
import { DEFAULT_MATERIAL } from '../types';
import type { Material } from '../types';

/**
 * 射线命中信息
 */
export interface HitRecord {
  point: Vec3;
  /** 单位法线；表面无法给出法线时为零向量 */
  normal: Vec3;
  material: Material;
  /** 沿射线走过的距离 */
  distance: number;
}

const GROUND_ORIGIN = new Vec3(0, GROUND_PLANE_Y, 0);
const GROUND_NORMAL = new Vec3(0, 1, 0);

/**
 * 地面 (x, z) 处的棋盘格颜色
 */
export function checkerboardColor(x: number, z: number): Vec3 {
  const cell = Math.floor(0.5 * x + 1000) + Math.floor(0.5 * z);
  return ((cell % 2) + 2) % 2 === 0 ? CHECKER_LIGHT : CHECKER_DARK;
}

/**
 * 球面步进
 *
 * 只要步进收敛到表面就采用该命中，即使地面更近。
 */
export function march(ray: Ray, surfaces: readonly Surface[], stats?: RenderStats): HitRecord | null {
  let depth = EPSILON;

  for (let step = 0; step < MAX_MARCHING_STEPS; step++) {
    const { distance, surface } = queryScene(ray.at(depth), surfaces);

    // 前方已没有表面
    if (surface === null) {
      break;
    }

    depth += distance;
    if (distance < EPSILON) {
      const point = ray.at(depth);
      let normal = surface.normalAt(point);
      if (normal === null) {
        if (stats) {
          stats.degenerateNormals++;
        }
        normal = Vec3.zero();
      }
      return { point, normal, material: surface.material, distance: depth };
    }
  }

  return marchGroundPlane(ray);
}

function marchGroundPlane(ray: Ray): HitRecord | null {
  const d = ray.intersectPlane(GROUND_ORIGIN, GROUND_NORMAL, EPSILON);
  if (d === null || d >= GROUND_CUTOFF) {
    return null;
  }

  const point = ray.at(d);
  if (Math.abs(point.x) >= GROUND_HALF_WIDTH || point.z >= GROUND_Z_NEAR || point.z <= GROUND_Z_FAR) {
    return null;
  }

  return {
    point,
    normal: GROUND_NORMAL,
    material: { ...DEFAULT_MATERIAL, diffuseColor: checkerboardColor(point.x, point.z) },
    distance: d,
  };
}
