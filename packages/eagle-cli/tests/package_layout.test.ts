/**
 * The published entry points resolve to compiled JavaScript, with the
 * TypeScript sources reachable only through the eaglet-source condition.
 */

import * as fs from 'node:fs';
import { describe, it, expect } from 'vitest';
import { z } from 'zod';

const PackageSchema = z.object({
  main: z.string().optional(),
  types: z.string().optional(),
  bin: z.record(z.string()).optional(),
  exports: z
    .object({
      '.': z.object({
        'eaglet-source': z.string(),
        types: z.string(),
        default: z.string(),
      }),
    })
    .optional(),
});

const BuildConfigSchema = z.object({
  compilerOptions: z.object({ rootDir: z.string(), outDir: z.string() }),
});

function readJson<T>(relative: string, schema: z.ZodType<T>): T {
  const raw: unknown = JSON.parse(fs.readFileSync(new URL(relative, import.meta.url), 'utf8'));
  return schema.parse(raw);
}

describe.each(['eagle-api', 'eagle-cli'])('%s package', (name) => {
  const pkg = readJson(`../../${name}/package.json`, PackageSchema);
  const build = readJson(`../../${name}/tsconfig.build.json`, BuildConfigSchema);

  it('points runtime exports at the build output', () => {
    expect(build.compilerOptions).toEqual({ rootDir: 'src', outDir: 'dist' });
    expect(pkg.exports?.['.']).toEqual({
      'eaglet-source': './src/index.ts',
      types: './dist/index.d.ts',
      default: './dist/index.js',
    });
    expect(pkg.main).toBe('./dist/index.js');
    expect(pkg.types).toBe('./dist/index.d.ts');
  });
});

describe('root package', () => {
  it('runs the compiled cli entry', () => {
    const root = readJson('../../../package.json', PackageSchema);
    expect(root.bin).toEqual({ eaglet: 'packages/eagle-cli/dist/bin.js' });
    expect(fs.existsSync(new URL('../src/bin.ts', import.meta.url))).toBe(true);
  });
});
