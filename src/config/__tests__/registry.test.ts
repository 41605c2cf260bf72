import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadRepositoryRegistry, parseRegistry } from '../registry';

describe('repository registry', () => {
  describe('parseRegistry', () => {
    it('defaults enabled to true and resolves relative paths', () => {
      const entries = parseRegistry(
        {
          repositories: [
            { name: 'local', url: '../data/index.json' },
            { name: 'remote', url: 'https://cards.test/index.json', enabled: false },
            { name: 'pinned', url: 'file:///srv/cards/index.json' },
          ],
        },
        '/srv/app/config'
      );

      expect(entries).toEqual([
        { name: 'local', url: path.resolve('/srv/app/config', '../data/index.json'), enabled: true },
        { name: 'remote', url: 'https://cards.test/index.json', enabled: false },
        { name: 'pinned', url: 'file:///srv/cards/index.json', enabled: true },
      ]);
    });

    it('rejects duplicate names', () => {
      expect(() =>
        parseRegistry(
          {
            repositories: [
              { name: 'main', url: 'a/index.json' },
              { name: 'main', url: 'b/index.json' },
            ],
          },
          '/srv'
        )
      ).toThrow(/^Registry validation error: .*duplicate value/);
    });

    it.each([
      [{}],
      [{ repositories: [{ name: 'no-url' }] }],
      [{ repositories: [{ name: 'bad name!', url: 'index.json' }] }],
      [{ repositories: [{ name: 'x', url: 'index.json', enabled: 'yes' }] }],
    ])('rejects %j', (raw) => {
      expect(() => parseRegistry(raw, '/srv')).toThrow(/^Registry validation error/);
    });
  });

  describe('loadRepositoryRegistry', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), 'registry-test-'));
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('reads the file and resolves entries against its directory', async () => {
      const file = path.join(dir, 'repositories.json');
      await writeFile(file, JSON.stringify({ repositories: [{ name: 'sample', url: 'data/index.json' }] }));

      expect(await loadRepositoryRegistry(file)).toEqual([
        { name: 'sample', url: path.join(dir, 'data', 'index.json'), enabled: true },
      ]);
    });

    it('fails on a file that is not JSON', async () => {
      const file = path.join(dir, 'broken.json');
      await writeFile(file, '{ repositories');

      await expect(loadRepositoryRegistry(file)).rejects.toThrow(`Failed to read repository registry ${file}`);
    });

    it('fails on a missing file', async () => {
      await expect(loadRepositoryRegistry(path.join(dir, 'absent.json'))).rejects.toThrow(
        /^Failed to read repository registry/
      );
    });
  });
});
