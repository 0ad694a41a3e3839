import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const rootDir = fileURLToPath(new URL('..', import.meta.url));
const sourceDirs = ['farm/src', 'farm/test', 'sdk/src'].map((d) => path.join(rootDir, d));

function isWorkspaceSource(importer: string | undefined): boolean {
  if (!importer) return false;
  return sourceDirs.some((d) => importer.startsWith(d));
}

export default defineConfig({
  plugins: [
    {
      name: 'tickfarm-resolve-js-to-ts',
      enforce: 'pre',
      async resolveId(source: string, importer: string | undefined) {
        // Only rewrite our own NodeNext-style relative imports, including the ones reaching into ../sdk.
        if (!isWorkspaceSource(importer)) return null;
        if (!source.endsWith('.js')) return null;
        if (!source.startsWith('./') && !source.startsWith('../')) return null;

        const tsSource = `${source.slice(0, -3)}.ts`;
        const resolved = await this.resolve(tsSource, importer, { skipSelf: true });
        return resolved?.id ?? null;
      },
    },
  ],
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    testTimeout: 10_000,
  },
});
