import { defineConfig } from 'vitest/config';

import { defineConfig as defineBaseConfig } from './tools/vitest-config/src';

export default defineConfig(
  defineBaseConfig({
    test: {
      include: [
        'tools/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/*.{test,spec}.ts',
      ],
    },
  }),
);
