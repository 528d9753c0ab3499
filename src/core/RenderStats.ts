/**
 * 渲染统计
 * 每个 worker 各自累计，结束后合并
 */
export interface RenderStats {
  /** 进入步进阶段的 castRay 调用数（不含阴影射线） */
  tracedRays: number;
  /** 命中点法线无法计算的次数 */
  degenerateNormals: number;
}

export function createRenderStats(): RenderStats {
  return { tracedRays: 0, degenerateNormals: 0 };
}

export function mergeRenderStats(target: RenderStats, source: RenderStats): RenderStats {
  target.tracedRays += source.tracedRays;
  target.degenerateNormals += source.degenerateNormals;
  return target;
}
