import { Vec3 } from './math/Vec3';

/** 步进收敛阈值，同时用作次级射线起点的偏移量 */
export const EPSILON = 1e-3;

/** 单次步进的最大步数 */
export const MAX_MARCHING_STEPS = 128;

/** 点前方没有任何表面时的场景距离 */
export const MAX_DISTANCE = 9999;

/** 主射线之后允许的次级反弹次数 */
export const MAX_RECURSION_DEPTH = 4;

// 地面 y = -4，只在 |x| < 10、-30 < z < -10 范围内可见
export const GROUND_PLANE_Y = -4;
export const GROUND_HALF_WIDTH = 10;
export const GROUND_Z_NEAR = -10;
export const GROUND_Z_FAR = -30;
/** 命中距离达到该值即视为未命中 */
export const GROUND_CUTOFF = 1000;

export const CHECKER_LIGHT = new Vec3(0.3, 0.3, 0.3);
export const CHECKER_DARK = new Vec3(0.3, 0.2, 0.1);

export const BACKGROUND_COLOR = new Vec3(0.2, 0.7, 0.8);
export const WHITE = Vec3.one();
export const BLACK = Vec3.zero();
