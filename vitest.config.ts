import { coverageConfigDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['./src/**/*.test.ts'],
    unstubGlobals: true,
    coverage: {
      exclude: ['**/types/**', '**/*types.ts', 'src/**/index.ts', ...coverageConfigDefaults.exclude],
    },
  },
});
