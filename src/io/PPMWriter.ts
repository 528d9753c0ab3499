/**
 * PPMWriter - 将浮点帧缓冲编码为二进制 PPM (P6)
 *
 * 格式：
 * - 文件头 "P6\n<width> <height>\n255\n"
 * - 每像素 3 字节 RGB，行主序，从最上面一行开始
 */

import { writeFile } from 'fs/promises';
import { Vec3 } from '../core/math/Vec3';
import type { Framebuffer } from '../render/Framebuffer';
import { ImageWriteError } from '../utils/errors';

/**
 * 若某通道超过 1，则整体按最大通道缩放，保持色相
 */
export function normalizeColor(color: Vec3): Vec3 {
  const max = color.maxComponent();
  return max > 1 ? color.multiply(1 / max) : color;
}

function toByte(channel: number): number {
  return Math.round(255 * Math.max(0, Math.min(1, channel)));
}

export function encodePPM(framebuffer: Framebuffer): Uint8Array {
  const { width, height, data } = framebuffer;
  const header = new TextEncoder().encode(`P6\n${width} ${height}\n255\n`);
  const bytes = new Uint8Array(header.length + width * height * 3);
  bytes.set(header, 0);

  let offset = header.length;
  for (let p = 0; p < width * height; p++) {
    const color = normalizeColor(Vec3.fromArray(data, p * 3));
    bytes[offset++] = toByte(color.x);
    bytes[offset++] = toByte(color.y);
    bytes[offset++] = toByte(color.z);
  }

  return bytes;
}

/**
 * 写出 PPM 文件
 * @throws ImageWriteError 写入失败时
 */
export async function writePPM(path: string, framebuffer: Framebuffer): Promise<void> {
  const bytes = encodePPM(framebuffer);
  try {
    await writeFile(path, bytes);
  } catch (error) {
    throw new ImageWriteError(path, error);
  }
}
