/**
 * 工具函数统一导出
 */

// 错误类型
export { InvalidSceneError, ImageWriteError } from './errors';
