import path from 'path';
import { DocumentFetchError, DocumentSource } from '../../data/sources';

export const INDEX = '/repo/index.json';

const images = (id: number) => ({
  artwork_url: `https://images.test/${id}/art.jpg`,
  small_url: `https://images.test/${id}/small.jpg`,
  cropped_url: `https://images.test/${id}/cropped.jpg`,
});

const modSpecific = (overrides: Record<string, unknown> = {}) => ({
  rarity_tier: 'common',
  pack_weight: 0.005,
  craftable: true,
  unlock_condition: '',
  tags: ['test_card'],
  ...overrides,
});

export const monsterCard = (id: number, overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  id,
  name: `Test Monster ${id}`,
  type: 'Effect Monster',
  humanReadableCardType: 'Effect Monster',
  frameType: 'effect',
  description: 'A monster used in tests.',
  attack: 1000,
  defense: 800,
  level: 4,
  race: 'Warrior',
  attribute: 'EARTH',
  images: images(id),
  mod_specific: modSpecific(),
  ...overrides,
});

export const spellCard = (id: number, overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  id,
  name: `Test Spell ${id}`,
  type: 'Spell Card',
  humanReadableCardType: 'Normal Spell',
  frameType: 'spell',
  description: 'A spell used in tests.',
  images: images(id),
  mod_specific: modSpecific(),
  ...overrides,
});

export const withModSpecific = (card: Record<string, unknown>, overrides: Record<string, unknown>) => ({
  ...card,
  mod_specific: modSpecific(overrides),
});

export interface FixtureSet {
  id: string;
  cards: unknown[];
  /** card_count in both the index and set_info; defaults to cards.length */
  declared?: number;
  releaseDate?: string;
  setInfo?: Record<string, unknown>;
}

export const repositoryInfo = {
  name: 'Test Repository',
  version: '1.0.0',
  description: 'Fixture repository',
  last_updated: '2024-01-01',
};

/**
 * Index and set documents keyed by their location under /repo.
 */
export const buildRepository = (sets: FixtureSet[]): Record<string, string> => {
  const documents: Record<string, string> = {};
  const references = sets.map((set) => {
    const count = set.declared ?? set.cards.length;
    const releaseDate = set.releaseDate ?? '2002-03-08';
    documents[`/repo/sets/${set.id}.json`] = JSON.stringify({
      set_info: {
        id: set.id,
        name: `Set ${set.id}`,
        code: set.id,
        release_date: releaseDate,
        card_count: count,
        ...set.setInfo,
      },
      cards: set.cards,
    });
    return { id: set.id, name: `Set ${set.id}`, file: `sets/${set.id}.json`, card_count: count, release_date: releaseDate };
  });
  documents[INDEX] = JSON.stringify({ repository_info: repositoryInfo, sets: references });
  return documents;
};

export type MemoryEntry = string | Buffer | ((signal?: AbortSignal) => Promise<Buffer>);

/**
 * In-process document source over a map of POSIX paths.
 */
export class MemorySource implements DocumentSource {
  public readonly type = 'file' as const;
  public readonly reads: string[] = [];

  constructor(private readonly documents: Record<string, MemoryEntry>) {}

  resolve(base: string, relative: string): string {
    return path.posix.resolve(path.posix.dirname(base), relative);
  }

  async read(location: string, signal?: AbortSignal): Promise<Buffer> {
    this.reads.push(location);
    const entry = this.documents[location];
    if (entry === undefined) {
      throw new DocumentFetchError(location, `No document at ${location}`);
    }
    if (typeof entry === 'function') {
      return entry(signal);
    }
    return typeof entry === 'string' ? Buffer.from(entry, 'utf-8') : entry;
  }
}

/** Never settles until `signal` aborts, then rejects. */
export const pendingUntilAborted = (location: string) => (signal?: AbortSignal) =>
  new Promise<Buffer>((_resolve, reject) => {
    signal?.addEventListener('abort', () => reject(new DocumentFetchError(location, 'aborted')), { once: true });
  });
