/**
 * 类型定义统一导出
 */

// 几何类型
export type { Vec3Tuple, Vec4Tuple } from './geometry';

// 材质与光源类型
export type { Albedo, Material, MaterialData, Light, LightData } from './material';
export { DEFAULT_MATERIAL } from './material';
