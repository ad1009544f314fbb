import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import { userAgent } from '../../src/infrastructure/index.js';

const manifest = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')) as {
  name: string;
  version: string;
};

describe('userAgent', () => {
  it('is <name>/<version> from package.json', () => {
    expect(userAgent()).toBe(`${manifest.name}/${manifest.version}`);
    expect(userAgent()).toBe('echo-dispatch/0.1.0');
  });

  it('returns the cached string on later calls', () => {
    expect(userAgent()).toBe(userAgent());
  });
});
