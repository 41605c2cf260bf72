import { Card } from '../../models/Card';
import { CardSet, RepositoryInfo } from '../../models/CardSet';

export interface CardLocation {
  setId: string;
  card: Card;
}

export interface CatalogInput {
  source: string;
  repository: RepositoryInfo;
  /** Loaded sets, in index order */
  sets: CardSet[];
  loadedAt?: Date;
}

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze<unknown>(child);
    }
  }
  return value;
};

/**
 * Read-only view of every set that loaded, keyed by set id, with a card index
 * keyed by card id. Built once per load; a refresh builds a new catalog.
 */
export class Catalog {
  public readonly source: string;
  public readonly repository: Readonly<RepositoryInfo>;
  /** ISO timestamp of the load that produced this catalog */
  public readonly loadedAt: string;

  private readonly setsById: ReadonlyMap<string, CardSet>;
  private readonly cardsById: ReadonlyMap<number, CardLocation>;
  private readonly orderedSets: readonly CardSet[];

  constructor(input: CatalogInput) {
    this.source = input.source;
    this.repository = deepFreeze({ ...input.repository });
    this.loadedAt = (input.loadedAt ?? new Date()).toISOString();
    this.orderedSets = deepFreeze([...input.sets]);

    const setsById = new Map<string, CardSet>();
    const cardsById = new Map<number, CardLocation>();
    for (const set of this.orderedSets) {
      setsById.set(set.reference.id, set);
      for (const card of set.cards) {
        if (!cardsById.has(card.id)) {
          cardsById.set(card.id, Object.freeze({ setId: set.reference.id, card }));
        }
      }
    }
    this.setsById = setsById;
    this.cardsById = cardsById;
    Object.freeze(this);
  }

  get setCount(): number {
    return this.orderedSets.length;
  }

  get cardCount(): number {
    return this.cardsById.size;
  }

  hasSet(id: string): boolean {
    return this.setsById.has(id);
  }

  getSet(id: string): CardSet | undefined {
    return this.setsById.get(id);
  }

  listSets(): readonly CardSet[] {
    return this.orderedSets;
  }

  getCard(id: number): CardLocation | undefined {
    return this.cardsById.get(id);
  }
}
