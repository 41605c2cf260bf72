import { Card } from './Card';

export interface RepositoryInfo {
  name: string;
  version: string;
  description: string;
  last_updated: string;
}

export interface SetReference {
  id: string;
  name: string;
  /** Path of the set document, relative to the index document */
  file: string;
  card_count: number;
  release_date?: string;
}

/** As published: `release_date` is linted, never rejected, so it may hold anything. */
export type Published<T extends { release_date?: string }> = Omit<T, 'release_date'> & { release_date?: unknown };

export interface RepositoryIndex {
  repository_info: RepositoryInfo;
  sets: Published<SetReference>[];
}

export interface SetInfo {
  id: string;
  name: string;
  code?: string;
  release_date?: string;
  card_count: number;
}

/** Set document as published; cards are still unvalidated. */
export interface SetDocument {
  set_info: Published<SetInfo>;
  cards: unknown[];
}

export interface CardSet {
  reference: SetReference;
  set_info: SetInfo;
  cards: readonly Card[];
}
