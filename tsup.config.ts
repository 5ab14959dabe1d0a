import { defineConfig } from 'tsup';

export default defineConfig({
    entry: { 'cli/index': 'src/cli/index.ts' },
    format: ['esm'],
    target: 'node20',
    outDir: 'dist',
    clean: true,
    splitting: false,
    sourcemap: false,
    dts: false,
    // Exclude native addons from bundling
    external: ['better-sqlite3'],
});
