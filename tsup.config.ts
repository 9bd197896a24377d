import { defineConfig } from 'tsup'

export default defineConfig({
  entry: { index: 'src/index.ts' },
  format: ['cjs', 'esm'],
  target: 'es2020',
  dts: true,
  clean: true,
  sourcemap: true,
  treeshake: true,
  // Hosts bring their own Vue and VueUse
  external: ['vue', '@vueuse/core'],
  splitting: false
})
