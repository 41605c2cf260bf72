import { Card } from '../../models/Card';
import { CardSet, Published, SetInfo, SetReference } from '../../models/CardSet';
import { httpSourceConfig, repositoryConfig } from '../../config';
import { logger } from '../../utils/logger';
import { ValidationDetail } from '../../utils/validation';
import { mapWithConcurrency } from '../../utils/concurrency';
import { createDocumentSource, describeError, DocumentSource } from '../data/sources';
import { Catalog } from './catalog';
import { validateCard } from './card.validator';
import { parseDocument, repositoryIndexSchema, setDocumentSchema } from './document.schemas';
import { LoadFailure, LoadIssue, isConsistent, issues } from './issues';
import { lintPackWeights, lintReleaseDate, validReleaseDate } from './lint';
import { RepositoryManifest, digestOf, manifestKeyFor, parseManifest } from './manifest.service';

export interface ManifestOption {
  /** Manifest location, relative to the index document */
  location: string;
  /** Key prefix the manifest was built with (the `key` of `key=path`) */
  prefix?: string;
}

export interface LoadOptions {
  signal?: AbortSignal;
  /** Overrides the loader's default; 0 disables the timeout */
  timeoutMs?: number;
  concurrency?: number;
  manifest?: ManifestOption;
}

export interface RepositoryLoaderConfig {
  concurrency: number;
  timeoutMs?: number;
  sourceFactory: (location: string) => DocumentSource;
  now: () => Date;
}

export type LoadResult =
  | { ok: true; catalog: Catalog; issues: LoadIssue[]; consistent: boolean }
  | { ok: false; failure: LoadFailure };

interface ValidatedEntry {
  index: number;
  card: Card;
}

interface SetOutcome {
  issues: LoadIssue[];
  set?: {
    reference: SetReference;
    set_info: SetInfo;
    entries: ValidatedEntry[];
  };
}

interface Cancellation {
  signal: AbortSignal;
  timedOut: () => boolean;
  dispose: () => void;
}

/**
 * One signal for the whole load that fires when the caller aborts or the
 * timeout expires. `dispose` must run once the load settles.
 */
const linkCancellation = (parent: AbortSignal | undefined, timeoutMs: number | undefined): Cancellation => {
  const controller = new AbortController();
  let timedOut = false;
  const onAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onAbort, { once: true });
  }

  const timer =
    timeoutMs !== undefined && timeoutMs > 0
      ? setTimeout(() => {
          timedOut = true;
          controller.abort(new Error(`Load timed out after ${timeoutMs}ms`));
        }, timeoutMs)
      : undefined;

  return {
    signal: controller.signal,
    timedOut: () => timedOut,
    dispose: () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    },
  };
};

const failures = {
  malformedIndex: (source: string, reason: string, details: ValidationDetail[]): LoadFailure => ({
    code: 'MalformedIndex',
    source,
    message: `Index ${source} is malformed: ${reason}`,
    details,
  }),
  duplicateSetId: (source: string, setId: string): LoadFailure => ({
    code: 'DuplicateSetId',
    source,
    message: `Index ${source} lists set ${setId} more than once`,
    setId,
  }),
  unreachable: (source: string, reason: string): LoadFailure => ({
    code: 'UnreachableSource',
    source,
    message: `Index ${source} could not be fetched: ${reason}`,
  }),
  cancelled: (source: string, reason: 'aborted' | 'timeout'): LoadFailure => ({
    code: 'LoadCancelled',
    source,
    message: reason === 'timeout' ? `Loading ${source} timed out` : `Loading ${source} was cancelled`,
    reason,
  }),
};

export class RepositoryLoader {
  private readonly config: RepositoryLoaderConfig;

  constructor(config: Partial<RepositoryLoaderConfig> = {}) {
    this.config = {
      concurrency: repositoryConfig.concurrency,
      timeoutMs: repositoryConfig.timeoutMs,
      sourceFactory: (location) => createDocumentSource(location, httpSourceConfig),
      now: () => new Date(),
      ...config,
    };
  }

  /**
   * Load the index at `source` and every set it references.
   *
   * Index-level problems (unreachable, malformed, duplicate set ids) and
   * cancellation fail the whole load. Set- and card-level problems drop only
   * what they affect and are returned as issues next to the catalog.
   */
  async load(source: string, options: LoadOptions = {}): Promise<LoadResult> {
    const cancellation = linkCancellation(options.signal, options.timeoutMs ?? this.config.timeoutMs);
    const started = Date.now();
    try {
      const result = await this.run(source, options, cancellation);
      if (result.ok) {
        logger.info(`Loaded ${source}`, {
          sets: result.catalog.setCount,
          cards: result.catalog.cardCount,
          issues: result.issues.length,
          consistent: result.consistent,
          durationMs: Date.now() - started,
        });
      } else {
        logger.warn(result.failure.message, { code: result.failure.code });
      }
      return result;
    } finally {
      cancellation.dispose();
    }
  }

  private async run(source: string, options: LoadOptions, cancellation: Cancellation): Promise<LoadResult> {
    const { signal } = cancellation;
    const cancelled = (): LoadResult => ({
      ok: false,
      failure: failures.cancelled(source, cancellation.timedOut() ? 'timeout' : 'aborted'),
    });

    if (signal.aborted) {
      return cancelled();
    }

    const documents = this.config.sourceFactory(source);
    const now = this.config.now();

    let indexBytes: Buffer;
    try {
      indexBytes = await documents.read(source, signal);
    } catch (error) {
      return signal.aborted ? cancelled() : { ok: false, failure: failures.unreachable(source, describeError(error)) };
    }
    if (signal.aborted) {
      return cancelled();
    }

    const parsedIndex = parseDocument(indexBytes, repositoryIndexSchema);
    if (!parsedIndex.ok) {
      return { ok: false, failure: failures.malformedIndex(source, parsedIndex.reason, parsedIndex.details) };
    }
    const index = parsedIndex.value;

    const seenSetIds = new Set<string>();
    for (const reference of index.sets) {
      if (seenSetIds.has(reference.id)) {
        return { ok: false, failure: failures.duplicateSetId(source, reference.id) };
      }
      seenSetIds.add(reference.id);
    }

    const found: LoadIssue[] = [];
    for (const reference of index.sets) {
      const lint = lintReleaseDate(reference.id, reference.release_date, now);
      if (lint) found.push(lint);
    }

    let manifest: RepositoryManifest | undefined;
    if (options.manifest) {
      try {
        const outcome = await this.loadManifest(documents, source, options.manifest.location, signal);
        if ('issue' in outcome) {
          found.push(outcome.issue);
        } else {
          manifest = outcome.manifest;
        }
      } catch (error) {
        if (signal.aborted) return cancelled();
        throw error;
      }
    }

    const outcomes = await mapWithConcurrency(
      index.sets,
      options.concurrency ?? this.config.concurrency,
      (reference) =>
        this.loadSet(
          documents,
          source,
          reference,
          signal,
          now,
          manifest ? { manifest, prefix: options.manifest?.prefix } : undefined
        ),
      signal
    );

    // All-or-nothing: sets that finished before the abort are discarded too
    if (signal.aborted) {
      return cancelled();
    }

    const sets: CardSet[] = [];
    const cardOwners = new Map<number, string>();

    outcomes.forEach((outcome, position) => {
      const reference = index.sets[position];
      if (outcome.status === 'rejected') {
        found.push(issues.malformedSet(reference.id, describeError(outcome.reason)));
        return;
      }

      found.push(...outcome.value.issues);
      const loaded = outcome.value.set;
      if (!loaded) {
        return;
      }

      const cards: Card[] = [];
      for (const { index: cardIndex, card } of loaded.entries) {
        const owner = cardOwners.get(card.id);
        if (owner !== undefined) {
          found.push(issues.duplicateCardId(reference.id, cardIndex, card.id, owner));
          continue;
        }
        cardOwners.set(card.id, reference.id);
        cards.push(card);
      }
      sets.push({ reference: loaded.reference, set_info: loaded.set_info, cards });
    });

    const catalog = new Catalog({ source, repository: index.repository_info, sets, loadedAt: now });
    return { ok: true, catalog, issues: found, consistent: isConsistent(found) };
  }

  private async loadManifest(
    documents: DocumentSource,
    indexLocation: string,
    manifestLocation: string,
    signal: AbortSignal
  ): Promise<{ manifest: RepositoryManifest } | { issue: LoadIssue }> {
    let location = manifestLocation;
    let bytes: Buffer;
    try {
      location = documents.resolve(indexLocation, manifestLocation);
      bytes = await documents.read(location, signal);
    } catch (error) {
      if (signal.aborted) throw error;
      return { issue: issues.manifestUnavailable(location, describeError(error)) };
    }

    const parsed = parseManifest(bytes);
    if (!parsed.ok) {
      return { issue: issues.manifestUnavailable(location, parsed.reason) };
    }
    return { manifest: parsed.value };
  }

  private async loadSet(
    documents: DocumentSource,
    indexLocation: string,
    reference: Published<SetReference>,
    signal: AbortSignal,
    now: Date,
    verification?: { manifest: RepositoryManifest; prefix?: string }
  ): Promise<SetOutcome> {
    let location = reference.file;
    let bytes: Buffer;
    try {
      location = documents.resolve(indexLocation, reference.file);
      bytes = await documents.read(location, signal);
    } catch (error) {
      if (signal.aborted) throw error;
      return { issues: [issues.setUnreachable(reference.id, location, describeError(error))] };
    }

    const found: LoadIssue[] = [];

    if (verification) {
      const key = manifestKeyFor(reference.file, verification.prefix);
      const expected = verification.manifest.files[key] ?? null;
      const actual = digestOf(bytes);
      if (!expected || expected.sha !== actual.sha || expected.size !== actual.size) {
        found.push(issues.manifestMismatch(reference.id, key, expected, actual));
      }
    }

    const parsed = parseDocument(bytes, setDocumentSchema);
    if (!parsed.ok) {
      return { issues: [...found, issues.malformedSet(reference.id, parsed.reason)] };
    }

    const { set_info, cards } = parsed.value;
    if (set_info.id !== reference.id) {
      return { issues: [...found, issues.setIdMismatch(reference.id, set_info.id)] };
    }
    if (cards.length !== reference.card_count || set_info.card_count !== cards.length) {
      return {
        issues: [
          ...found,
          issues.cardCountMismatch(reference.id, reference.card_count, set_info.card_count, cards.length),
        ],
      };
    }

    const releaseLint = lintReleaseDate(reference.id, set_info.release_date, now);
    if (releaseLint) found.push(releaseLint);

    const entries: ValidatedEntry[] = [];
    cards.forEach((raw, cardIndex) => {
      const result = validateCard(raw);
      if (!result.ok) {
        found.push(issues.invalidCard(reference.id, cardIndex, result.error.reason, result.error.details));
        return;
      }

      const { card } = result;
      for (const notice of result.notices) {
        found.push(
          notice.code === 'UnknownCardType'
            ? issues.unknownCardType(reference.id, cardIndex, card.id, notice.type)
            : issues.tagFormat(reference.id, cardIndex, card.id, notice.tag, notice.problem)
        );
      }
      entries.push({ index: cardIndex, card });
    });

    found.push(...lintPackWeights(reference.id, entries.map((entry) => entry.card)));

    return {
      issues: found,
      set: {
        reference: { ...reference, release_date: validReleaseDate(reference.release_date) },
        set_info: { ...set_info, release_date: validReleaseDate(set_info.release_date) },
        entries,
      },
    };
  }
}

export const repositoryLoader = new RepositoryLoader();
