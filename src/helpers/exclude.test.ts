import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { basename, join } from 'path';
import { tmpdir } from 'os';
import { buildExcludeSet, writeExcludeFile } from './exclude';
import { TempResources } from './temp';

describe('exclude set', () => {
  let baseDir: string;
  let resources: TempResources;

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), 'resticrun-exclude-'));
    resources = new TempResources(undefined, baseDir);
  });

  afterEach(async () => {
    resources.cleanup();
    await rm(baseDir, { recursive: true, force: true });
  });

  it('writes one pattern per line into a registered file', async () => {
    const file = writeExcludeFile(['*.tmp', '', '   ', '/home/*/.cache'], resources);

    expect(file).toBeDefined();
    expect(basename(file ?? '')).toBe('excludes.txt');
    expect(await readFile(file ?? '', 'utf-8')).toBe('*.tmp\n/home/*/.cache\n');
    expect(resources.registered).toHaveLength(1);
  });

  it('leaves surrounding spaces in a pattern untouched', async () => {
    const file = writeExcludeFile(['/srv/name with trailing space ', ' leading.txt'], resources);
    expect(await readFile(file ?? '', 'utf-8')).toBe('/srv/name with trailing space \n leading.txt\n');
  });

  it('creates nothing without patterns', () => {
    expect(writeExcludeFile([], resources)).toBeUndefined();
    expect(resources.registered).toEqual([]);
  });

  it('keeps marker order and drops blanks', () => {
    const set = buildExcludeSet([], ['.nobackup', '', 'CACHEDIR.TAG'], resources);
    expect(set).toEqual({ excludeFile: undefined, excludeIfPresent: ['.nobackup', 'CACHEDIR.TAG'] });
  });
});
