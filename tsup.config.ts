import { defineConfig } from 'tsup';

// tsc emits the ESM build and declarations into dist/; this adds the
// CommonJS entry that the "require" export condition points at.
export default defineConfig({
  entry: ['src/index.ts'],
  format: ['cjs'],
  dts: false,
  sourcemap: true,
  clean: true,
  splitting: false,
  minify: false,
  outDir: 'dist/bundle',
  target: 'node20',
  platform: 'node',
});
