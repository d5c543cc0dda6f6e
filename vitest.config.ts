import { puyaTsTransformer } from '@algorandfoundation/algorand-typescript-testing/vitest-transformer'
import typescript from '@rollup/plugin-typescript'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  esbuild: {},
  plugins: [
    typescript({
      tsconfig: './tsconfig.json',
      transformers: {
        before: [puyaTsTransformer({ includeExt: ['.algo.ts', '.spec.ts', 'testing/fixture.ts'] })],
      },
    }),
  ],
  test: {
    globals: true,
    environment: 'node',
    include: ['smart_contracts/**/*.spec.ts'],
    setupFiles: 'vitest.setup.ts',
    pool: 'forks',
  },
})
