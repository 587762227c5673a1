import { defineConfig } from 'tsup';

import { defineConfig as defineBaseConfig } from '../../tools/tsup-config/src';

export default defineConfig(
  defineBaseConfig({
    noExternal: ['@legisight/logger', '@legisight/model', '@legisight/shared'],
  }),
);
