/**
 * 按行带渲染，主线程和 worker 共用
 */

import { Camera } from '../core/Camera';
import type { RenderStats } from '../core/RenderStats';
import { castRay } from '../core/Shader';
import type { Scene, SceneDescriptor } from '../scene/Scene';

/**
 * worker 启动参数（workerData）
 */
export interface RenderWorkerInit {
  scene: SceneDescriptor;
  width: number;
  height: number;
  fov: number;
}

/**
 * 主线程 -> worker：渲染 [rowStart, rowEnd) 行
 */
export interface RowTask {
  rowStart: number;
  rowEnd: number;
}

/**
 * worker -> 主线程
 */
export interface RowResult {
  rowStart: number;
  pixels: Float32Array;
  stats: RenderStats;
}

/**
 * 渲染 [rowStart, rowEnd) 行，返回这些行的 RGB 数据
 */
export function renderRows(
  scene: Scene,
  camera: Camera,
  rowStart: number,
  rowEnd: number,
  stats?: RenderStats,
): Float32Array {
  const pixels = new Float32Array((rowEnd - rowStart) * camera.width * 3);

  let offset = 0;
  for (let j = rowStart; j < rowEnd; j++) {
    for (let i = 0; i < camera.width; i++) {
      const color = castRay(camera.primaryRay(i, j), scene, 0, stats);
      pixels[offset++] = color.x;
      pixels[offset++] = color.y;
      pixels[offset++] = color.z;
    }
  }

  return pixels;
}

/**
 * 把图像切成行带任务
 */
export function splitRows(height: number, rowsPerTask: number): RowTask[] {
  const tasks: RowTask[] = [];
  const step = Math.max(1, Math.floor(rowsPerTask));
  for (let rowStart = 0; rowStart < height; rowStart += step) {
    tasks.push({ rowStart, rowEnd: Math.min(height, rowStart + step) });
  }
  return tasks;
}
