import { defineConfig } from 'vitest/config';
import ts from 'typescript';

export default defineConfig({
  // Transpile TypeScript with tsc instead of esbuild: esbuild renames named
  // function expressions that shadow an outer binding (`function add` -> `add2`),
  // which changes `fn.name` compared with the compiled output.
  esbuild: false,
  plugins: [
    {
      name: 'typescript-transpile',
      enforce: 'pre',
      transform(code, id) {
        if (!/\.[cm]?tsx?$/.test(id.split('?')[0])) {
          return null;
        }
        const result = ts.transpileModule(code, {
          fileName: id,
          compilerOptions: {
            target: ts.ScriptTarget.ES2022,
            module: ts.ModuleKind.ESNext,
            sourceMap: true,
            inlineSources: true
          }
        });
        return { code: result.outputText, map: result.sourceMapText };
      }
    }
  ],
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node'
  }
});
