#!/usr/bin/env node
/**
 * 命令行入口：渲染演示场景到 ./out.ppm
 */

import { OUTPUT_HEIGHT, OUTPUT_PATH, OUTPUT_WIDTH, render } from './render/render';
import { createShowcaseLights, createShowcaseSurfaces } from './scene/presets';

async function main(): Promise<void> {
  const start = Date.now();
  await render(createShowcaseSurfaces(), createShowcaseLights());
  const seconds = ((Date.now() - start) / 1000).toFixed(1);
  console.log(`已渲染 ${OUTPUT_WIDTH}x${OUTPUT_HEIGHT} -> ${OUTPUT_PATH} (${seconds}s)`);
}

main().catch((error: unknown) => {
  console.error('渲染失败:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
