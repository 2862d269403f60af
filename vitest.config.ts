import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [
    {
      // Sources import siblings as './x.js' (NodeNext); point those at the .ts files
      name: 'ts-sources-for-js-specifiers',
      resolveId(source, importer) {
        if (!importer || !source.startsWith('.') || !source.endsWith('.js')) return null;
        return this.resolve(source.replace(/\.js$/, '.ts'), importer, { skipSelf: true });
      },
    },
  ],
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    globals: true,
    pool: 'forks',
    clearMocks: true,
    unstubGlobals: true,
  },
});
