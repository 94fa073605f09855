import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/providers/porkbun.ts', 'src/bin.ts'],
  format: ['esm'],
  target: 'node20',
  dts: { entry: ['src/index.ts', 'src/providers/porkbun.ts'] },
  splitting: false,
  sourcemap: true,
  clean: true,
  minify: false,
});
