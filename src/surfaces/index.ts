/**
 * 表面统一导出
 */

import { Sphere } from './Sphere';
import type { Surface, SurfaceDescriptor } from './Surface';

export { Sphere } from './Sphere';
export type { Surface, SurfaceKind, SurfaceDescriptor, SphereDescriptor } from './Surface';

/**
 * 由纯数据描述重建表面实例
 */
export function surfaceFromDescriptor(descriptor: SurfaceDescriptor): Surface {
  switch (descriptor.kind) {
    case 'sphere':
      return Sphere.fromDescriptor(descriptor);
  }
}
