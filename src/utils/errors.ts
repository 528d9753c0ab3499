/**
 * 错误类型
 * 退化法线和全内反射不是错误，不在这里
 */

/**
 * 材质、光源或表面参数非法
 */
export class InvalidSceneError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSceneError';
  }
}

/**
 * 图像写入失败（致命）
 */
export class ImageWriteError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`无法写入图像文件 ${path}: ${reason}`, { cause });
    this.name = 'ImageWriteError';
    this.path = path;
  }
}
