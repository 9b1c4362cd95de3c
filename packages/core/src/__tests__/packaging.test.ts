import { describe, it, expect } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const repoRoot = fileURLToPath(new URL('../../../../', import.meta.url));

const buildConfigSchema = z.object({
  compilerOptions: z.object({ rootDir: z.string(), outDir: z.string() }),
});
const manifestSchema = z.object({
  exports: z.record(z.object({ types: z.string(), default: z.string() })).optional(),
  bin: z.record(z.string()).optional(),
});

function readJson<T>(path: string, schema: z.ZodType<T>): T {
  return schema.parse(JSON.parse(readFileSync(`${repoRoot}${path}`, 'utf-8')));
}

/** Map a path under a package's outDir back to the source file it is compiled from. */
function sourceFor(pkg: string, emitted: string): string {
  const { compilerOptions } = readJson(`packages/${pkg}/tsconfig.build.json`, buildConfigSchema);
  const relative = emitted.replace(/^\.\//, '');
  expect(relative.startsWith(`${compilerOptions.outDir}/`)).toBe(true);
  return `packages/${pkg}/${compilerOptions.rootDir}/${relative
    .slice(compilerOptions.outDir.length + 1)
    .replace(/\.js$/, '.ts')}`;
}

describe('packaging', () => {
  it.each(['shared', 'core'])('should export compiled output of %s at runtime', (pkg) => {
    const manifest = readJson(`packages/${pkg}/package.json`, manifestSchema);
    const entry = manifest.exports?.['.'];

    expect(entry?.types).toBe('./src/index.ts');
    expect(existsSync(`${repoRoot}${sourceFor(pkg, entry?.default ?? '')}`)).toBe(true);
  });

  it('should point every binary at the compiled form of an executable source', () => {
    const manifest = readJson('package.json', manifestSchema);
    const bins = Object.entries(manifest.bin ?? {});

    expect(bins.map(([name]) => name).sort()).toEqual(['sentinel', 'sentinel-agent']);
    for (const [, target] of bins) {
      const [, pkg, ...rest] = target.replace(/^\.\//, '').split('/');
      const source = sourceFor(pkg ?? '', `./${rest.join('/')}`);
      expect(readFileSync(`${repoRoot}${source}`, 'utf-8').startsWith('#!/usr/bin/env node\n')).toBe(true);
    }
  });
});
