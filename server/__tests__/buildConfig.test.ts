import { readFileSync } from 'node:fs';

import { describe, expect, it } from 'vitest';

function readJson(relativePath: string): unknown {
  return JSON.parse(readFileSync(new URL(`../../${relativePath}`, import.meta.url), 'utf8'));
}

function field(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
}

describe('build configuration', () => {
  it('emits compiled output to dist from the build script', () => {
    const scripts = field(readJson('package.json'), 'scripts');
    expect(field(scripts, 'build')).toBe('tsc -p tsconfig.build.json');

    const buildConfig = readJson('tsconfig.build.json');
    const compilerOptions = field(buildConfig, 'compilerOptions');
    expect(field(buildConfig, 'extends')).toBe('./tsconfig.json');
    expect(field(compilerOptions, 'noEmit')).toBe(false);
    expect(field(compilerOptions, 'outDir')).toBe('dist');
  });

  it('keeps tests out of the emitted build', () => {
    expect(field(readJson('tsconfig.build.json'), 'exclude')).toEqual(['server/**/__tests__/**', 'server/testing/**']);
  });
});
