import { describe, it, expect, beforeEach } from '@jest/globals';
import { RepositoryLoader } from '../loader';
import { CardRepositoryService, RepositoryServiceError } from '../repository.service';
import { INDEX, MemoryEntry, MemorySource, buildRepository, monsterCard, spellCard } from './fixtures';

const NOW = new Date('2024-06-01T12:00:00Z');
const BROKEN = '/broken/index.json';

describe('CardRepositoryService', () => {
  let documents: Record<string, MemoryEntry>;
  let source: MemorySource;
  let service: CardRepositoryService;

  beforeEach(async () => {
    documents = buildRepository([{ id: 'A', cards: [monsterCard(1), spellCard(2)] }]);
    source = new MemorySource(documents);
    service = new CardRepositoryService({
      loader: new RepositoryLoader({ sourceFactory: () => source, now: () => NOW, timeoutMs: undefined }),
      entries: [
        { name: 'main', url: INDEX, enabled: true },
        { name: 'off', url: '/off/index.json', enabled: false },
        { name: 'broken', url: BROKEN, enabled: true },
      ],
    });
    await service.initialize();
  });

  it('loads every enabled repository on startup', () => {
    expect(service.listRepositories()).toEqual([
      {
        name: 'main',
        url: INDEX,
        enabled: true,
        status: 'ready',
        loadedAt: '2024-06-01T12:00:00.000Z',
        setCount: 1,
        cardCount: 2,
        consistent: true,
        issueCounts: { error: 0, warning: 0, lint: 0 },
        lastFailure: null,
      },
      {
        name: 'off',
        url: '/off/index.json',
        enabled: false,
        status: 'disabled',
        loadedAt: null,
        setCount: 0,
        cardCount: 0,
        consistent: null,
        issueCounts: { error: 0, warning: 0, lint: 0 },
        lastFailure: null,
      },
      {
        name: 'broken',
        url: BROKEN,
        enabled: true,
        status: 'failed',
        loadedAt: null,
        setCount: 0,
        cardCount: 0,
        consistent: null,
        issueCounts: { error: 0, warning: 0, lint: 0 },
        lastFailure: {
          code: 'UnreachableSource',
          source: BROKEN,
          message: 'Index /broken/index.json could not be fetched: No document at /broken/index.json',
        },
      },
    ]);
    expect(source.reads).not.toContain('/off/index.json');
  });

  it('hands out the catalog of a loaded repository', () => {
    expect(service.getCatalog('main').getCard(2)?.setId).toBe('A');
  });

  it.each([
    ['nope', 'UnknownRepository'],
    ['off', 'RepositoryDisabled'],
    ['broken', 'RepositoryNotLoaded'],
  ])('refuses the catalog of %p with %p', (name, code) => {
    let caught: unknown;
    try {
      service.getCatalog(name);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(RepositoryServiceError);
    expect(caught).toMatchObject({ code, repository: name });
  });

  it('swaps in a new catalog after a successful reload', async () => {
    const before = service.getCatalog('main');
    Object.assign(documents, buildRepository([{ id: 'A', cards: [monsterCard(1), spellCard(2), spellCard(3)] }]));

    const result = await service.reload('main');

    expect(result.ok).toBe(true);
    expect(service.getCatalog('main')).not.toBe(before);
    expect(service.getCatalog('main').cardCount).toBe(3);
    expect(before.cardCount).toBe(2);
  });

  it('keeps the previous catalog when a reload fails', async () => {
    const before = service.getCatalog('main');
    documents[INDEX] = '{ "repository_info": ';

    const result = await service.reload('main');

    expect(result.ok).toBe(false);
    expect(service.getCatalog('main')).toBe(before);
    expect(service.getState('main').status).toBe('ready');
    expect(service.getState('main').lastFailure?.code).toBe('MalformedIndex');
  });

  it('shares one load between concurrent reloads', async () => {
    const readsBefore = source.reads.filter((location) => location === INDEX).length;

    const first = service.reload('main');
    const second = service.reload('main');

    expect(second).toBe(first);
    await first;
    expect(source.reads.filter((location) => location === INDEX).length).toBe(readsBefore + 1);
  });

  it('refuses to reload a disabled repository', async () => {
    await expect(service.reload('off')).rejects.toMatchObject({ code: 'RepositoryDisabled' });
  });

  it('requires initialize before use', () => {
    const fresh = new CardRepositoryService({ entries: [] });

    expect(() => fresh.listRepositories()).toThrow('CardRepositoryService is not initialized');
  });

  it('forgets its repositories on close', async () => {
    await service.close();

    expect(() => service.listRepositories()).toThrow('CardRepositoryService is not initialized');
  });
});
