import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { findProjectRoot } from './load-env.js';

describe('findProjectRoot', () => {
  let base: string;

  beforeEach(() => {
    base = mkdtempSync(join(tmpdir(), 'rollta-env-'));
  });

  afterEach(() => {
    rmSync(base, { recursive: true, force: true });
  });

  it('should find the closest parent holding a .env file', () => {
    const nested = join(base, 'packages', 'shared', 'src');
    mkdirSync(nested, { recursive: true });
    writeFileSync(join(base, '.env'), 'ROLLTA_LOG_LEVEL=debug\n');

    expect(findProjectRoot(nested)).toBe(base);
  });

  it('should prefer the nearest .env', () => {
    const pkg = join(base, 'packages', 'shared');
    mkdirSync(pkg, { recursive: true });
    writeFileSync(join(base, '.env'), '');
    writeFileSync(join(pkg, '.env'), '');

    expect(findProjectRoot(pkg)).toBe(pkg);
  });
});
