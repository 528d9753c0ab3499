import { Vec3 } from '../core/math/Vec3';
import type { Light, LightData } from '../types';
import { InvalidSceneError } from '../utils/errors';

export function createLight(data: LightData): Light {
  if (!Number.isFinite(data.intensity) || data.intensity < 0) {
    throw new InvalidSceneError(`光源强度必须 >= 0: ${data.intensity}`);
  }
  if (data.position.some((c) => !Number.isFinite(c))) {
    throw new InvalidSceneError(`光源位置包含非法数值: [${data.position.join(', ')}]`);
  }
  return Object.freeze({
    position: Vec3.fromArray(data.position),
    intensity: data.intensity,
  });
}

export function toLightData(light: Light): LightData {
  return {
    position: light.position.toArray(),
    intensity: light.intensity,
  };
}
