import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { TIERS, artifactPath, compareArtifact, isTier, writeArtifact } from './artifact';

describe('tiers', () => {
  it('run in a fixed order', () => {
    expect(TIERS).toEqual(['simple', 'middle', 'difficult', 'malformed']);
  });

  it('recognises tier names', () => {
    expect(isTier('difficult')).toBe(true);
    expect(isTier('hard')).toBe(false);
  });

  it('name their artifact after the tier', () => {
    expect(artifactPath(path.join('tests', 'golden'), 'simple')).toBe(path.join('tests', 'golden', 'simple.golden.test.ts'));
  });
});

describe('artifact files', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'wirevec-artifact-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('creates the output directory and leaves no temporary file', () => {
    const target = artifactPath(path.join(dir, 'nested', 'out'), 'middle');
    writeArtifact({ tier: 'middle', path: target, source: 'export {};\n' });
    expect(fs.readFileSync(target, 'utf8')).toBe('export {};\n');
    expect(fs.readdirSync(path.dirname(target))).toEqual(['middle.golden.test.ts']);
  });

  it('replaces an existing artifact', () => {
    const target = artifactPath(dir, 'simple');
    writeArtifact({ tier: 'simple', path: target, source: 'old\n' });
    writeArtifact({ tier: 'simple', path: target, source: 'new\n' });
    expect(fs.readFileSync(target, 'utf8')).toBe('new\n');
  });

  it('compares with the file on disk', () => {
    const artifact = { tier: 'malformed' as const, path: artifactPath(dir, 'malformed'), source: 'a\n' };
    expect(compareArtifact(artifact)).toBe('missing');
    writeArtifact(artifact);
    expect(compareArtifact(artifact)).toBe('fresh');
    expect(compareArtifact({ ...artifact, source: 'b\n' })).toBe('stale');
  });
});
