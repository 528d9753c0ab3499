/**
 * 渲染入口：固定 1024x768、视场角 π/3，输出到 ./out.ppm
 */

import { writePPM } from '../io/PPMWriter';
import { Scene } from '../scene/Scene';
import type { Surface } from '../surfaces';
import type { Light } from '../types';
import { renderFrame } from './FrameRenderer';

export const OUTPUT_PATH = './out.ppm';
export const OUTPUT_WIDTH = 1024;
export const OUTPUT_HEIGHT = 768;
export const OUTPUT_FOV = Math.PI / 3;

/**
 * 只允许调整分发方式，分辨率、视场角和输出路径固定
 */
export interface RenderDispatchOptions {
  workers?: number;
  rowsPerTask?: number;
  workerScript?: string | null;
}

/**
 * 渲染场景并写出 PPM
 * @throws ImageWriteError 输出文件写入失败时
 */
export async function render(
  surfaces: readonly Surface[],
  lights: readonly Light[],
  options: RenderDispatchOptions = {},
): Promise<void> {
  const { framebuffer } = await renderFrame(new Scene(surfaces, lights), {
    ...options,
    width: OUTPUT_WIDTH,
    height: OUTPUT_HEIGHT,
    fov: OUTPUT_FOV,
  });
  await writePPM(OUTPUT_PATH, framebuffer);
}
