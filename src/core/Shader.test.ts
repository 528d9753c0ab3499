import { describe, it, expect } from 'vitest';
import { BACKGROUND_COLOR } from './constants';
import { Ray } from './math/Ray';
import { Vec3 } from './math/Vec3';
import { createRenderStats } from './RenderStats';
import { castRay } from './Shader';
import { createLight } from '../scene/lights';
import { IVORY, MIRROR } from '../scene/materials';
import { Scene } from '../scene/Scene';
import { Sphere } from '../surfaces';

const FORWARD = new Ray(Vec3.zero(), new Vec3(0, 0, -1));

function expectColor(actual: Vec3, expected: [number, number, number]): void {
  expect(actual.x).toBeCloseTo(expected[0], 9);
  expect(actual.y).toBeCloseTo(expected[1], 9);
  expect(actual.z).toBeCloseTo(expected[2], 9);
}

describe('castRay', () => {
  it('should return the background color when nothing is hit', () => {
    expect(castRay(FORWARD, new Scene())).toBe(BACKGROUND_COLOR);
  });

  it('should return the background color past the recursion limit', () => {
    const scene = new Scene([new Sphere(new Vec3(0, 0, -10), 2, IVORY)]);
    const stats = createRenderStats();
    expect(castRay(FORWARD, scene, 5, stats)).toBe(BACKGROUND_COLOR);
    expect(stats.tracedRays).toBe(0);
  });

  describe('local lighting', () => {
    const sphere = new Sphere(new Vec3(0, 0, -10), 2, IVORY);

    it('should add diffuse, specular and reflected terms for a head-on light', () => {
      const scene = new Scene([sphere], [createLight({ position: [0, 0, 20], intensity: 1 })]);
      // 0.6 * (0.4, 0.4, 0.3) + 0.3 * white + 0.1 * background
      expectColor(castRay(FORWARD, scene), [0.56, 0.61, 0.56]);
    });

    it('should scale diffuse by the cosine to the light', () => {
      const scene = new Scene([sphere], [createLight({ position: [0, 14, 6], intensity: 1 })]);
      const color = castRay(FORWARD, scene);
      expect(color.x).toBeCloseTo(0.24 * Math.SQRT1_2 + 0.02, 6);
      expect(color.z).toBeCloseTo(0.18 * Math.SQRT1_2 + 0.08, 6);
    });

    it('should drop a light that is blocked by another surface', () => {
      const blocker = new Sphere(new Vec3(0, 7, -1), 1, IVORY);
      const scene = new Scene([sphere, blocker], [createLight({ position: [0, 14, 6], intensity: 1 })]);
      // only the reflected background is left
      expectColor(castRay(FORWARD, scene), [0.02, 0.07, 0.08]);
    });
  });

  describe('recursion', () => {
    it('should weight reflection by albedo alone', () => {
      // kr is 0 at normal incidence with index 1, yet the reflection still counts
      const scene = new Scene([new Sphere(new Vec3(0, 0, -5), 1, MIRROR)]);
      const stats = createRenderStats();
      expectColor(castRay(FORWARD, scene, 0, stats), [0.16, 0.56, 0.64]);
      // primary + refraction + reflection
      expect(stats.tracedRays).toBe(3);
    });

    it('should stop bouncing between facing mirrors at the depth limit', () => {
      const scene = new Scene([
        new Sphere(new Vec3(0, 0, -5), 1, MIRROR),
        new Sphere(new Vec3(0, 0, 5), 1, MIRROR),
      ]);
      const stats = createRenderStats();
      const color = castRay(FORWARD, scene, 0, stats);

      // five mirror hits, each scaling the background by 0.8
      const attenuation = Math.pow(0.8, 5);
      expectColor(color, [0.2 * attenuation, 0.7 * attenuation, 0.8 * attenuation]);
      expect(stats.tracedRays).toBe(9);
      expect(stats.tracedRays).toBeLessThanOrEqual(2 ** 5);
    });
  });
});
