import {defineConfig} from 'vitest/config';

export default defineConfig({
  test: {
    name: 'nvp-eval',
    include: ['src/**/*.test.ts'],
  },
});
