/**
 * Shader - 递归着色
 */

import { BACKGROUND_COLOR, BLACK, EPSILON, MAX_RECURSION_DEPTH, WHITE } from './constants';
import { Ray } from './math/Ray';
import type { Vec3 } from './math/Vec3';
import { fresnel, reflect, refract } from './optics';
import { march } from './RayMarcher';
import type { RenderStats } from './RenderStats';
import type { Scene } from '../scene/Scene';

/**
 * 次级射线起点：沿法线偏移 EPSILON，偏向射线前进的一侧
 */
function offsetOrigin(point: Vec3, normal: Vec3, direction: Vec3): Vec3 {
  const offset = normal.multiply(EPSILON);
  return direction.dot(normal) < 0 ? point.subtract(offset) : point.add(offset);
}

/**
 * 计算一条射线带回的颜色
 *
 * Phong 局部光照加硬阴影，再递归追踪反射和折射。
 * 反射、折射项只按反照率加权，kr 仅用来判断是否存在折射光线，能量并不守恒。
 */
export function castRay(ray: Ray, scene: Scene, depth: number = 0, stats?: RenderStats): Vec3 {
  if (depth > MAX_RECURSION_DEPTH) {
    return BACKGROUND_COLOR;
  }
  if (stats) {
    stats.tracedRays++;
  }

  const hit = march(ray, scene.surfaces, stats);
  if (hit === null) {
    return BACKGROUND_COLOR;
  }

  const { point, normal, material } = hit;
  const dir = ray.direction;

  let refractColor = BLACK;
  const kr = fresnel(dir, normal, material.refractiveIndex);
  // 全反射时没有折射光线
  if (kr < 1) {
    const refractDir = refract(dir, normal, material.refractiveIndex).normalize();
    const refractRay = new Ray(offsetOrigin(point, normal, refractDir), refractDir);
    refractColor = castRay(refractRay, scene, depth + 1, stats);
  }

  const reflectDir = reflect(dir, normal).normalize();
  const reflectRay = new Ray(offsetOrigin(point, normal, reflectDir), reflectDir);
  const reflectColor = castRay(reflectRay, scene, depth + 1, stats);

  let diffuseIntensity = 0;
  let specularIntensity = 0;
  for (const light of scene.lights) {
    const toLight = light.position.subtract(point);
    const lightDistance = toLight.length();
    const lightDir = toLight.normalize();

    const shadowOrigin = offsetOrigin(point, normal, lightDir);
    const occluder = march(new Ray(shadowOrigin, lightDir), scene.surfaces, stats);
    if (occluder !== null && occluder.point.distance(shadowOrigin) < lightDistance) {
      continue;
    }

    diffuseIntensity += light.intensity * Math.max(0, lightDir.dot(normal));
    const highlight = Math.max(0, reflect(lightDir.negate(), normal).negate().dot(dir));
    specularIntensity += Math.pow(highlight, material.specularExponent) * light.intensity;
  }

  const [kd, ks, kReflect, kRefract] = material.albedo;
  return material.diffuseColor
    .multiply(diffuseIntensity * kd)
    .add(WHITE.multiply(specularIntensity * ks))
    .add(reflectColor.multiply(kReflect))
    .add(refractColor.multiply(kRefract));
}
