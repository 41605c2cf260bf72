import { repositoryConfig } from '../../config';
import { RepositoryRegistryEntry, loadRepositoryRegistry } from '../../config/registry';
import { logger } from '../../utils/logger';
import { Catalog } from './catalog';
import { IssueSeverity, LoadFailure, LoadIssue, countBySeverity } from './issues';
import { LoadOptions, LoadResult, RepositoryLoader, repositoryLoader } from './loader';

export type RepositoryStatus = 'disabled' | 'idle' | 'loading' | 'ready' | 'failed';

export interface RepositoryState {
  name: string;
  url: string;
  enabled: boolean;
  status: RepositoryStatus;
  /** Catalog of the last successful load; a failed reload keeps it */
  catalog?: Catalog;
  issues: LoadIssue[];
  consistent?: boolean;
  lastFailure?: LoadFailure;
  lastAttemptAt?: string;
}

export interface RepositorySummary {
  name: string;
  url: string;
  enabled: boolean;
  status: RepositoryStatus;
  loadedAt: string | null;
  setCount: number;
  cardCount: number;
  consistent: boolean | null;
  issueCounts: Record<IssueSeverity, number>;
  lastFailure: LoadFailure | null;
}

export type RepositoryServiceErrorCode = 'UnknownRepository' | 'RepositoryDisabled' | 'RepositoryNotLoaded';

export class RepositoryServiceError extends Error {
  readonly code: RepositoryServiceErrorCode;
  readonly repository: string;

  constructor(code: RepositoryServiceErrorCode, repository: string, message: string) {
    super(message);
    this.name = 'RepositoryServiceError';
    this.code = code;
    this.repository = repository;
  }
}

export interface CardRepositoryServiceOptions {
  loader?: RepositoryLoader;
  registryPath?: string;
  /** Registry entries to use instead of reading `registryPath` */
  entries?: RepositoryRegistryEntry[];
  loadOptions?: Omit<LoadOptions, 'signal'>;
}

/**
 * Holds one catalog snapshot per registered repository. Readers always see a
 * complete catalog: a reload builds a new one and swaps it in only when the
 * load succeeds.
 */
export class CardRepositoryService {
  private readonly loader: RepositoryLoader;
  private readonly registryPath: string;
  private readonly presetEntries?: RepositoryRegistryEntry[];
  private readonly loadOptions: Omit<LoadOptions, 'signal'>;

  private readonly states = new Map<string, RepositoryState>();
  private readonly inflight = new Map<string, Promise<LoadResult>>();
  private shutdown = new AbortController();
  private isInitialized = false;

  constructor(options: CardRepositoryServiceOptions = {}) {
    this.loader = options.loader ?? repositoryLoader;
    this.registryPath = options.registryPath ?? repositoryConfig.registryPath;
    this.presetEntries = options.entries;
    this.loadOptions = options.loadOptions ?? {};
  }

  public async initialize(): Promise<void> {
    if (this.isInitialized) {
      logger.warn('CardRepositoryService is already initialized');
      return;
    }

    logger.info('Initializing card repository service...');
    const entries = this.presetEntries ?? (await loadRepositoryRegistry(this.registryPath));

    this.states.clear();
    for (const entry of entries) {
      this.states.set(entry.name, {
        name: entry.name,
        url: entry.url,
        enabled: entry.enabled,
        status: entry.enabled ? 'idle' : 'disabled',
        issues: [],
      });
    }
    this.shutdown = new AbortController();
    this.isInitialized = true;

    const enabled = entries.filter((entry) => entry.enabled);
    const results = await Promise.all(enabled.map((entry) => this.reload(entry.name)));
    const loaded = results.filter((result) => result.ok).length;
    logger.info(`Card repository service initialized: ${loaded}/${enabled.length} repositories loaded`);
  }

  /** Abort in-flight loads and forget every snapshot. */
  public async close(): Promise<void> {
    if (!this.isInitialized) return;

    logger.info('Closing card repository service...');
    this.shutdown.abort(new Error('Service closed'));
    await Promise.allSettled(Array.from(this.inflight.values()));
    this.states.clear();
    this.isInitialized = false;
    logger.info('Card repository service closed');
  }

  /**
   * Load the repository again. Calls made while a load of the same repository
   * is running share that load's result.
   */
  public reload(name: string): Promise<LoadResult> {
    const state = this.requireState(name);
    if (!state.enabled) {
      return Promise.reject(
        new RepositoryServiceError('RepositoryDisabled', name, `Repository ${name} is disabled`)
      );
    }

    const running = this.inflight.get(name);
    if (running) {
      logger.debug(`Reload of ${name} already in progress, joining it`);
      return running;
    }

    const load = this.runLoad(state).finally(() => {
      this.inflight.delete(name);
    });
    this.inflight.set(name, load);
    return load;
  }

  public getState(name: string): Readonly<RepositoryState> {
    return this.requireState(name);
  }

  public listRepositories(): RepositorySummary[] {
    this.ensureInitialized();
    return Array.from(this.states.values(), summarize);
  }

  public getSummary(name: string): RepositorySummary {
    return summarize(this.requireState(name));
  }

  public getCatalog(name: string): Catalog {
    const state = this.requireState(name);
    if (!state.enabled) {
      throw new RepositoryServiceError('RepositoryDisabled', name, `Repository ${name} is disabled`);
    }
    if (!state.catalog) {
      throw new RepositoryServiceError('RepositoryNotLoaded', name, `Repository ${name} has not been loaded`);
    }
    return state.catalog;
  }

  private async runLoad(state: RepositoryState): Promise<LoadResult> {
    state.status = 'loading';
    state.lastAttemptAt = new Date().toISOString();

    let result: LoadResult;
    try {
      result = await this.loader.load(state.url, { ...this.loadOptions, signal: this.shutdown.signal });
    } catch (error) {
      state.status = state.catalog ? 'ready' : 'failed';
      throw error;
    }

    if (result.ok) {
      state.catalog = result.catalog;
      state.issues = result.issues;
      state.consistent = result.consistent;
      state.lastFailure = undefined;
      state.status = 'ready';
    } else {
      logger.error(`Repository ${state.name} failed to load: ${result.failure.message}`, {
        code: result.failure.code,
      });
      state.lastFailure = result.failure;
      state.status = state.catalog ? 'ready' : 'failed';
    }
    return result;
  }

  private ensureInitialized(): void {
    if (!this.isInitialized) {
      throw new Error('CardRepositoryService is not initialized. Call initialize() first.');
    }
  }

  private requireState(name: string): RepositoryState {
    this.ensureInitialized();
    const state = this.states.get(name);
    if (!state) {
      throw new RepositoryServiceError('UnknownRepository', name, `Repository ${name} not found`);
    }
    return state;
  }
}

const summarize = (state: RepositoryState): RepositorySummary => ({
  name: state.name,
  url: state.url,
  enabled: state.enabled,
  status: state.status,
  loadedAt: state.catalog?.loadedAt ?? null,
  setCount: state.catalog?.setCount ?? 0,
  cardCount: state.catalog?.cardCount ?? 0,
  consistent: state.consistent ?? null,
  issueCounts: countBySeverity(state.issues),
  lastFailure: state.lastFailure ?? null,
});

export const cardRepositoryService = new CardRepositoryService();
export default cardRepositoryService;
