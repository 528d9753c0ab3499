/**
 * Surface - 隐式表面（SDF）能力接口
 */

import type { Vec3 } from '../core/math/Vec3';
import type { Material, MaterialData, Vec3Tuple } from '../types';

/**
 * 表面种类
 */
export type SurfaceKind = SurfaceDescriptor['kind'];

/**
 * 球体的纯数据描述
 */
export interface SphereDescriptor {
  kind: 'sphere';
  center: Vec3Tuple;
  radius: number;
  material: MaterialData;
}

/**
 * 表面描述（按 kind 区分的联合类型）
 * 新的表面种类在这里追加
 */
export type SurfaceDescriptor = SphereDescriptor;

export interface Surface {
  readonly kind: SurfaceKind;
  readonly material: Material;

  /**
   * 有符号距离，表面内部为负
   */
  distance(point: Vec3): number;

  /**
   * 表面法线
   * @returns 单位法线；点落在奇异位置（如球心）附近时返回 null
   */
  normalAt(point: Vec3): Vec3 | null;

  toDescriptor(): SurfaceDescriptor;
}
