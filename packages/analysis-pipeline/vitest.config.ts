import { defineConfig as defineBaseConfig } from '../../tools/vitest-config/src';
import { defineConfig } from 'vitest/config';

export default defineConfig(
  defineBaseConfig({
    test: {
      coverage: {
        exclude: ['src/testing/**'],
      },
    },
  }),
);
