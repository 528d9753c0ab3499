import { EPSILON } from '../core/constants';
import { Vec3 } from '../core/math/Vec3';
import { createMaterial, toMaterialData } from '../scene/materials';
import type { Material } from '../types';
import { InvalidSceneError } from '../utils/errors';
import type { SphereDescriptor, Surface } from './Surface';

/**
 * Sphere - 球体的有符号距离场
 * 材质在构造时校验并复制，与经描述符重建的球体一致
 */
export class Sphere implements Surface {
  readonly kind = 'sphere';
  readonly center: Vec3;
  readonly radius: number;
  readonly material: Material;

  constructor(center: Vec3, radius: number, material: Material) {
    if (!Number.isFinite(radius) || radius <= 0) {
      throw new InvalidSceneError(`球体半径必须为正数: ${radius}`);
    }
    if (![center.x, center.y, center.z].every(Number.isFinite)) {
      throw new InvalidSceneError(`球心包含非法数值: [${center.toArray().join(', ')}]`);
    }
    this.center = center;
    this.radius = radius;
    this.material = createMaterial(toMaterialData(material));
  }

  static fromDescriptor(descriptor: SphereDescriptor): Sphere {
    return new Sphere(
      Vec3.fromArray(descriptor.center),
      descriptor.radius,
      createMaterial(descriptor.material),
    );
  }

  distance(point: Vec3): number {
    return point.subtract(this.center).length() - this.radius;
  }

  normalAt(point: Vec3): Vec3 | null {
    const fromCenter = point.subtract(this.center);
    // 球心处法线无定义
    if (fromCenter.length() < EPSILON) {
      return null;
    }
    return fromCenter.normalize();
  }

  toDescriptor(): SphereDescriptor {
    return {
      kind: 'sphere',
      center: this.center.toArray(),
      radius: this.radius,
      material: toMaterialData(this.material),
    };
  }
}
