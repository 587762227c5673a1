import type { Options } from 'tsup';

/**
 * Shared tsup defaults: dual CJS/ESM output with declarations.
 */
export const defineConfig = (options: Options = {}): Options => {
  return {
    entry: ['src/index.ts'],
    format: ['cjs', 'esm'],
    target: 'node20',
    dts: true,
    clean: true,
    sourcemap: true,
    ...options,
  };
};
