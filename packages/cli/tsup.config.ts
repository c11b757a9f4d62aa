import { defineConfig } from 'tsup'

export default defineConfig({
  entry: ['src/bin.ts'],
  format: ['esm'],
  sourcemap: true,
  clean: true,
  // The workspace library exports TypeScript sources; bundle it so the
  // emitted binary runs on plain Node.
  noExternal: ['keyseal'],
})
