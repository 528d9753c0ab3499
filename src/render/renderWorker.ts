/**
 * 渲染 worker 入口
 * 由 FrameRenderer 启动；编译后位于 dist/render/renderWorker.js
 */

import { parentPort, workerData } from 'worker_threads';
import { Camera } from '../core/Camera';
import { createRenderStats } from '../core/RenderStats';
import { Scene } from '../scene/Scene';
import { renderRows } from './renderRows';
import type { RenderWorkerInit, RowResult, RowTask } from './renderRows';

const init: RenderWorkerInit = workerData;
const scene = Scene.fromDescriptor(init.scene);
const camera = new Camera(init.width, init.height, init.fov);

if (!parentPort) {
  throw new Error('renderWorker 只能在 worker 线程中运行');
}
const port = parentPort;

port.on('message', (task: RowTask) => {
  const stats = createRenderStats();
  const pixels = renderRows(scene, camera, task.rowStart, task.rowEnd, stats);
  const result: RowResult = { rowStart: task.rowStart, pixels, stats };
  port.postMessage(result);
});
