/**
 * 统一的材质与光源类型定义
 */

import { Vec3 } from '../core/math/Vec3';
import type { Vec3Tuple, Vec4Tuple } from './geometry';

/**
 * 反照率权重 [漫反射, 高光, 反射, 折射]
 * 各分量非负，不要求和为 1
 */
export type Albedo = Readonly<Vec4Tuple>;

/**
 * 材质（不可变值类型，由表面持有）
 */
export interface Material {
  /** 折射率，>= 1 */
  readonly refractiveIndex: number;
  readonly albedo: Albedo;
  /** 漫反射颜色，可超过 1，输出时再归一化 */
  readonly diffuseColor: Vec3;
  /** 高光指数，>= 0 */
  readonly specularExponent: number;
}

/**
 * 材质的纯数据形式
 * 用于在 worker 线程之间传递场景
 */
export interface MaterialData {
  refractiveIndex: number;
  albedo: Vec4Tuple;
  diffuseColor: Vec3Tuple;
  specularExponent: number;
}

/**
 * 点光源
 */
export interface Light {
  readonly position: Vec3;
  /** 强度，>= 0 */
  readonly intensity: number;
}

/**
 * 光源的纯数据形式
 */
export interface LightData {
  position: Vec3Tuple;
  intensity: number;
}

/**
 * 默认材质
 * 地面棋盘格在着色前使用它，再替换漫反射颜色
 */
export const DEFAULT_MATERIAL: Material = Object.freeze({
  refractiveIndex: 1,
  albedo: Object.freeze([1, 0, 0, 0] as const),
  diffuseColor: Vec3.zero(),
  specularExponent: 0,
});
