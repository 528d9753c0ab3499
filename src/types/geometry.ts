/**
 * 统一的几何类型定义
 */

/**
 * 3D 向量类型（元组形式）
 */
export type Vec3Tuple = [number, number, number];

/**
 * 4D 向量类型（元组形式）
 */
export type Vec4Tuple = [number, number, number, number];
