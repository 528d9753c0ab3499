/**
 * 演示场景：四个球体（象牙、玻璃、红橡胶、镜面）和三个点光源
 */

import { Vec3 } from '../core/math/Vec3';
import { Sphere } from '../surfaces';
import type { Surface } from '../surfaces';
import type { Light } from '../types';
import { createLight } from './lights';
import { GLASS, IVORY, MIRROR, RED_RUBBER } from './materials';
import { Scene } from './Scene';

export function createShowcaseSurfaces(): Surface[] {
  return [
    new Sphere(new Vec3(-3, 0, -16), 2, IVORY),
    new Sphere(new Vec3(-1.0, -1.5, -12), 2, GLASS),
    new Sphere(new Vec3(1.5, -0.5, -18), 3, RED_RUBBER),
    new Sphere(new Vec3(7, 5, -18), 4, MIRROR),
  ];
}

export function createShowcaseLights(): Light[] {
  return [
    createLight({ position: [-20, 20, 20], intensity: 1.5 }),
    createLight({ position: [30, 50, -25], intensity: 1.8 }),
    createLight({ position: [30, 20, 30], intensity: 1.7 }),
  ];
}

export function createShowcaseScene(): Scene {
  return new Scene(createShowcaseSurfaces(), createShowcaseLights());
}
