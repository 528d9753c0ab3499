/**
 * FrameRenderer - 逐像素渲染整帧
 *
 * 每个像素独立计算，只读共享场景。图像按行带切分，分发给固定大小的
 * worker_threads 线程池；每个任务写入互不重叠的行。
 */

import { existsSync } from 'fs';
import { availableParallelism } from 'os';
import { join } from 'path';
import { Worker } from 'worker_threads';
import { Camera } from '../core/Camera';
import { createRenderStats, mergeRenderStats } from '../core/RenderStats';
import type { RenderStats } from '../core/RenderStats';
import type { Scene } from '../scene/Scene';
import { Framebuffer } from './Framebuffer';
import { renderRows, splitRows } from './renderRows';
import type { RenderWorkerInit, RowResult, RowTask } from './renderRows';

/**
 * 渲染选项
 */
export interface RenderOptions {
  width: number;
  height: number;
  /** 垂直视场角（弧度） */
  fov: number;
  /** worker 线程数，<= 1 时在当前线程渲染 */
  workers: number;
  /** 每个任务的行数 */
  rowsPerTask: number;
  /** worker 入口脚本，为 null 时在当前线程渲染 */
  workerScript: string | null;
}

/**
 * 查找 worker 入口
 * 编译产物中为 renderWorker.js；从源码运行时使用 renderWorker.ts，由 tsx 加载
 */
export function resolveWorkerScript(dir: string = __dirname): string | null {
  for (const name of ['renderWorker.js', 'renderWorker.ts']) {
    const script = join(dir, name);
    if (existsSync(script)) {
      return script;
    }
  }
  return null;
}

export const DEFAULT_RENDER_OPTIONS: Readonly<RenderOptions> = Object.freeze({
  width: 1024,
  height: 768,
  fov: Math.PI / 3,
  workers: availableParallelism(),
  rowsPerTask: 16,
  workerScript: resolveWorkerScript(),
});

export interface FrameResult {
  framebuffer: Framebuffer;
  stats: RenderStats;
}

export async function renderFrame(scene: Scene, options: Partial<RenderOptions> = {}): Promise<FrameResult> {
  const opts: RenderOptions = { ...DEFAULT_RENDER_OPTIONS, ...options };
  const framebuffer = new Framebuffer(opts.width, opts.height);
  const tasks = splitRows(opts.height, opts.rowsPerTask);

  const stats =
    opts.workers > 1 && opts.workerScript !== null
      ? await renderWithWorkers(scene, opts.workerScript, opts, tasks, framebuffer)
      : renderInProcess(scene, opts, tasks, framebuffer);

  if (stats.degenerateNormals > 0) {
    console.warn(`FrameRenderer: ${stats.degenerateNormals} 个命中点无法计算法线，已按零向量着色`);
  }

  return { framebuffer, stats };
}

function renderInProcess(
  scene: Scene,
  opts: RenderOptions,
  tasks: RowTask[],
  framebuffer: Framebuffer,
): RenderStats {
  const camera = new Camera(opts.width, opts.height, opts.fov);
  const stats = createRenderStats();
  for (const task of tasks) {
    framebuffer.setRows(task.rowStart, renderRows(scene, camera, task.rowStart, task.rowEnd, stats));
  }
  return stats;
}

function renderWithWorkers(
  scene: Scene,
  script: string,
  opts: RenderOptions,
  tasks: RowTask[],
  framebuffer: Framebuffer,
): Promise<RenderStats> {
  const init: RenderWorkerInit = {
    scene: scene.toDescriptor(),
    width: opts.width,
    height: opts.height,
    fov: opts.fov,
  };
  const poolSize = Math.min(opts.workers, tasks.length);
  const queue = [...tasks];
  const stats = createRenderStats();
  const workers: Worker[] = [];
  const execArgv = script.endsWith('.ts') ? ['--require', 'tsx/cjs'] : undefined;

  return new Promise<RenderStats>((resolve, reject) => {
    let pending = tasks.length;
    let settled = false;

    const finish = (error?: Error): void => {
      if (settled) {
        return;
      }
      settled = true;
      // terminate() 的结果不影响渲染结果
      Promise.all(workers.map((worker) => worker.terminate())).then(
        () => (error ? reject(error) : resolve(stats)),
        (terminateError: unknown) => reject(error ?? terminateError),
      );
    };

    const dispatch = (worker: Worker): void => {
      const task = queue.shift();
      if (task) {
        worker.postMessage(task);
      }
    };

    for (let i = 0; i < poolSize; i++) {
      const worker = new Worker(script, { workerData: init, execArgv });
      workers.push(worker);

      worker.on('message', (result: RowResult) => {
        framebuffer.setRows(result.rowStart, result.pixels);
        mergeRenderStats(stats, result.stats);
        pending--;
        if (pending === 0) {
          finish();
        } else {
          dispatch(worker);
        }
      });
      worker.on('error', (error) => finish(error));
      worker.on('exit', (code) => {
        if (code !== 0) {
          finish(new Error(`渲染 worker 异常退出，退出码 ${code}`));
        }
      });

      dispatch(worker);
    }
  });
}
