import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Vec3 } from '../core/math/Vec3';
import { Framebuffer } from '../render/Framebuffer';
import { ImageWriteError } from '../utils/errors';
import { encodePPM, normalizeColor, writePPM } from './PPMWriter';

const HEADER = 'P6\n2 1\n255\n';

function sampleFramebuffer(): Framebuffer {
  return new Framebuffer(2, 1, new Float32Array([0.5, 2, 1, -1, 0.25, 0.5]));
}

describe('normalizeColor', () => {
  it('should scale an over-bright color so its maximum is 1', () => {
    expect(normalizeColor(new Vec3(0.5, 2, 1)).equals(new Vec3(0.25, 1, 0.5))).toBe(true);
  });

  it('should leave colors within range untouched', () => {
    const color = new Vec3(0.2, 0.7, 0.8);
    expect(normalizeColor(color)).toBe(color);
  });
});

describe('encodePPM', () => {
  it('should write the P6 header followed by one byte per channel', () => {
    const bytes = encodePPM(sampleFramebuffer());

    expect(Buffer.from(bytes.subarray(0, HEADER.length)).toString('ascii')).toBe(HEADER);
    expect(Array.from(bytes.subarray(HEADER.length))).toEqual([64, 255, 128, 0, 64, 128]);
  });

  it('should emit width * height * 3 pixel bytes', () => {
    const bytes = encodePPM(new Framebuffer(4, 3));
    expect(bytes.length).toBe('P6\n4 3\n255\n'.length + 36);
  });
});

describe('writePPM', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ppm-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write the encoded image', async () => {
    const path = join(dir, 'out.ppm');
    await writePPM(path, sampleFramebuffer());

    const written = await readFile(path);
    expect(Array.from(written)).toEqual(Array.from(encodePPM(sampleFramebuffer())));
  });

  it('should surface a failed write as ImageWriteError', async () => {
    const path = join(dir, 'missing', 'out.ppm');
    await expect(writePPM(path, sampleFramebuffer())).rejects.toBeInstanceOf(ImageWriteError);
    await expect(writePPM(path, sampleFramebuffer())).rejects.toMatchObject({ path });
  });
});
