import { Vec3 } from '../core/math/Vec3';

/**
 * Framebuffer - 浮点 RGB 像素缓冲
 * 行主序，第 0 行为图像最上方
 */
export class Framebuffer {
  readonly width: number;
  readonly height: number;
  readonly data: Float32Array;

  constructor(width: number, height: number, data?: Float32Array) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new RangeError(`非法的图像尺寸: ${width}x${height}`);
    }
    if (data && data.length !== width * height * 3) {
      throw new RangeError(`像素数据长度 ${data.length} 与尺寸 ${width}x${height} 不符`);
    }
    this.width = width;
    this.height = height;
    this.data = data ?? new Float32Array(width * height * 3);
  }

  get(i: number, j: number): Vec3 {
    return Vec3.fromArray(this.data, (j * this.width + i) * 3);
  }

  /**
   * 写入从 rowStart 开始的若干整行
   */
  setRows(rowStart: number, rows: Float32Array): void {
    this.data.set(rows, rowStart * this.width * 3);
  }
}
