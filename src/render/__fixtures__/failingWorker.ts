/**
 * 收到任务即抛错的 worker，用于测试线程池的错误传播
 */

import { parentPort } from 'worker_threads';

parentPort?.on('message', () => {
  throw new Error('行带渲染失败');
});
