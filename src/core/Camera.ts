/**
 * Camera - 针孔相机
 * 位于原点，朝 -z 方向观察，只负责生成主射线
 */

import { Ray } from './math/Ray';
import { Vec3 } from './math/Vec3';

export class Camera {
  readonly width: number;
  readonly height: number;
  /** 垂直视场角（弧度） */
  readonly fov: number;

  private readonly origin = Vec3.zero();
  // 像平面到相机的距离（以像素为单位）
  private readonly focalDepth: number;

  constructor(width: number, height: number, fov: number = Math.PI / 3) {
    this.width = width;
    this.height = height;
    this.fov = fov;
    this.focalDepth = -height / (2 * Math.tan(fov / 2));
  }

  /**
   * 穿过像素 (i, j) 中心的主射线
   * j = 0 为最上面一行
   */
  primaryRay(i: number, j: number): Ray {
    const dirX = i + 0.5 - this.width / 2;
    const dirY = -(j + 0.5) + this.height / 2;
    return new Ray(this.origin, new Vec3(dirX, dirY, this.focalDepth).normalize());
  }
}
