/**
 * 菲涅尔、反射与折射
 * 输入均为单位向量，外部介质折射率为 1
 */

import { Vec3 } from './math/Vec3';

/** 不存在折射光线时 refract() 的返回值 */
const TIR_PLACEHOLDER = new Vec3(1, 0, 0);

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export interface FresnelComponents {
  /** s 偏振振幅比 */
  rs: number;
  /** p 偏振振幅比 */
  rp: number;
}

/**
 * 介质边界上的菲涅尔振幅比
 * @returns 全反射时返回 null
 */
export function fresnelComponents(incident: Vec3, normal: Vec3, ior: number): FresnelComponents | null {
  let cosi = clamp(incident.dot(normal), -1, 1);
  let etai = 1;
  let etat = ior;
  // 从介质内部射出
  if (cosi > 0) {
    [etai, etat] = [etat, etai];
  }

  // 斯涅尔定律
  const sint = (etai / etat) * Math.sqrt(Math.max(0, 1 - cosi * cosi));
  if (sint >= 1) {
    return null;
  }

  const cost = Math.sqrt(Math.max(0, 1 - sint * sint));
  cosi = Math.abs(cosi);
  return {
    rs: (etat * cosi - etai * cost) / (etat * cosi + etai * cost),
    rp: (etai * cosi - etat * cost) / (etai * cosi + etat * cost),
  };
}

/**
 * 边界处的反射比例，全反射时为 1
 */
export function fresnel(incident: Vec3, normal: Vec3, ior: number): number {
  const components = fresnelComponents(incident, normal, ior);
  if (components === null) {
    return 1;
  }
  const { rs, rp } = components;
  return (rs * rs + rp * rp) / 2;
}

/**
 * 镜面反射: I - 2(I·N)N
 */
export function reflect(incident: Vec3, normal: Vec3): Vec3 {
  return incident.subtract(normal.multiply(2 * incident.dot(normal)));
}

/**
 * 按斯涅尔定律折射
 *
 * 从内部射出时翻转法线并交换两侧折射率（只交换一次）。
 * 不存在折射光线时返回无物理意义的 (1, 0, 0)，调用方应先用 fresnel() 判断。
 */
export function refract(incident: Vec3, normal: Vec3, etaT: number, etaI: number = 1): Vec3 {
  const cosi = -clamp(incident.dot(normal), -1, 1);
  if (cosi < 0) {
    return refract(incident, normal.negate(), etaI, etaT);
  }

  const eta = etaI / etaT;
  const k = 1 - eta * eta * (1 - cosi * cosi);
  if (k < 0) {
    return TIR_PLACEHOLDER;
  }
  return incident.multiply(eta).add(normal.multiply(eta * cosi - Math.sqrt(k)));
}
