import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/tests/**/*.test.ts'],
    env: {
      PICA_LOG_LEVEL: 'silent',
    },
    restoreMocks: true,
    unstubGlobals: true,
    unstubEnvs: true,
  },
})
