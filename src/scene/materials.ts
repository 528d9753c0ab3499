/**
 * 材质构造与预设
 */

import { Vec3 } from '../core/math/Vec3';
import type { Material, MaterialData } from '../types';
import { InvalidSceneError } from '../utils/errors';

/**
 * 校验并冻结材质
 * 折射率 >= 1，反照率各分量非负，高光指数 >= 0
 */
export function createMaterial(data: MaterialData): Material {
  const { refractiveIndex, albedo, diffuseColor, specularExponent } = data;

  if (!Number.isFinite(refractiveIndex) || refractiveIndex < 1) {
    throw new InvalidSceneError(`折射率必须 >= 1: ${refractiveIndex}`);
  }
  albedo.forEach((weight, i) => {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new InvalidSceneError(`反照率第 ${i} 个分量必须非负: ${weight}`);
    }
  });
  if (diffuseColor.some((channel) => !Number.isFinite(channel))) {
    throw new InvalidSceneError(`漫反射颜色包含非法数值: [${diffuseColor.join(', ')}]`);
  }
  if (!Number.isFinite(specularExponent) || specularExponent < 0) {
    throw new InvalidSceneError(`高光指数必须 >= 0: ${specularExponent}`);
  }

  return Object.freeze({
    refractiveIndex,
    albedo: Object.freeze([albedo[0], albedo[1], albedo[2], albedo[3]] as const),
    diffuseColor: Vec3.fromArray(diffuseColor),
    specularExponent,
  });
}

export function toMaterialData(material: Material): MaterialData {
  const [diffuse, specular, reflection, refraction] = material.albedo;
  return {
    refractiveIndex: material.refractiveIndex,
    albedo: [diffuse, specular, reflection, refraction],
    diffuseColor: material.diffuseColor.toArray(),
    specularExponent: material.specularExponent,
  };
}

// 预设材质。不透明材质的折射率取 1：折射仍会追踪，但反照率的折射分量为 0

export const IVORY = createMaterial({
  refractiveIndex: 1.0,
  albedo: [0.6, 0.3, 0.1, 0.0],
  diffuseColor: [0.4, 0.4, 0.3],
  specularExponent: 50,
});

export const GLASS = createMaterial({
  refractiveIndex: 1.5,
  albedo: [0.0, 0.5, 0.1, 0.8],
  diffuseColor: [0.6, 0.7, 0.8],
  specularExponent: 125,
});

export const RED_RUBBER = createMaterial({
  refractiveIndex: 1.0,
  albedo: [0.9, 0.1, 0.0, 0.0],
  diffuseColor: [0.3, 0.1, 0.1],
  specularExponent: 10,
});

export const MIRROR = createMaterial({
  refractiveIndex: 1.0,
  albedo: [0.0, 10.0, 0.8, 0.0],
  diffuseColor: [1.0, 1.0, 1.0],
  specularExponent: 1425,
});
