import { MAX_DISTANCE } from './constants';
import type { Vec3 } from './math/Vec3';
import type { Surface } from '../surfaces';

export interface SceneSample {
  /** 最小的非负有符号距离，没有时为 MAX_DISTANCE */
  distance: number;
  surface: Surface | null;
}

/**
 * 查询离点最近的表面
 *
 * 距离为负表示点在表面内部，该表面被跳过，因此实体内部的点看不到实体自身。
 * 距离相等时保留先出现的表面。
 */
export function queryScene(point: Vec3, surfaces: readonly Surface[]): SceneSample {
  let minDistance = MAX_DISTANCE;
  let nearest: Surface | null = null;

  for (const surface of surfaces) {
    const distance = surface.distance(point);
    if (distance < 0) {
      continue;
    }
    if (distance < minDistance) {
      minDistance = distance;
      nearest = surface;
    }
  }

  return { distance: minDistance, surface: nearest };
}
