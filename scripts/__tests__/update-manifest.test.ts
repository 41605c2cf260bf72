import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { updateManifest } from '../update-manifest';

describe('update-manifest', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'update-manifest-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes a manifest keyed by source', async () => {
    await mkdir(path.join(dir, 'db', 'cards'), { recursive: true });
    await writeFile(path.join(dir, 'db', 'cards', 'a.json'), '');
    await writeFile(path.join(dir, 'db', 'cards', 'b.yaml'), 'two');
    const output = path.join(dir, 'manifest.json');

    const code = await updateManifest([
      '--source',
      path.join(dir, 'db', 'cards'),
      '--output',
      output,
      '--include-ext',
      'yaml',
    ]);

    expect(code).toBe(0);
    const manifest = JSON.parse(await readFile(output, 'utf-8'));
    expect(manifest.files).toEqual({
      'cards/a.json': { sha: 'e69de29bb2d1d6434b8b29ae775ad8c2e48c5391', size: 0 },
      'cards/b.yaml': { sha: '64c5e5885a4b06010b3a0c20edb7900dd0311025', size: 3 },
    });
  });

  it('exits 2 without a source', async () => {
    expect(await updateManifest(['--output', path.join(dir, 'manifest.json')])).toBe(2);
  });

  it('exits 2 when no file matches', async () => {
    await mkdir(path.join(dir, 'empty'));

    expect(await updateManifest(['--source', `cards=${path.join(dir, 'empty')}`])).toBe(2);
  });
});
