import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.{test,spec}.{js,ts}'],
    exclude: ['node_modules', 'dist'],
    // render() 的测试需要 process.chdir，线程池中不可用
    pool: 'forks',
  },
});
