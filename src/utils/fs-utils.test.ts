import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { deleteIfExists, expandHome, pathExists, tempPathFor, writeFileAtomic } from './fs-utils.js';

describe('fs-utils', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'podkeep-fs-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should expand a leading tilde only', () => {
    expect(expandHome('~')).toBe(homedir());
    expect(expandHome('~/Podcasts')).toBe(join(homedir(), 'Podcasts'));
    expect(expandHome('/srv/~data')).toBe('/srv/~data');
  });

  it('should build hidden temp paths beside the target', () => {
    expect(tempPathFor('/x/show/ep.mp3')).toMatch(/^\/x\/show\/\.ep\.mp3\.[0-9a-f]{8}\.part$/);
  });

  it('should write atomically, creating parent directories', async () => {
    const target = join(dir, 'nested', 'index.json');
    await writeFileAtomic(target, '{"a":1}');
    await writeFileAtomic(target, '{"a":2}');

    expect(await readFile(target, 'utf-8')).toBe('{"a":2}');
    expect(await readdir(join(dir, 'nested'))).toEqual(['index.json']);
  });

  it('should treat a missing file as already deleted', async () => {
    const target = join(dir, 'a.mp3');
    await writeFile(target, 'x');

    expect(await deleteIfExists(target)).toBe(true);
    expect(await deleteIfExists(target)).toBe(false);
    expect(await pathExists(target)).toBe(false);
  });
});
