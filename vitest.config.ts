import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // rot-js ships its ESM build under "module"; let Vite resolve it
    server: {
      deps: {
        inline: ['rot-js'],
      },
    },
  },
});
