#!/usr/bin/env ts-node

import path from 'path';
import { isRemoteLocation } from '../src/services/data/sources';
import { LoadOptions, LoadResult, RepositoryLoader, repositoryLoader } from '../src/services/repository/loader';
import { EXIT_FATAL, exitCodeFor, formatReport } from '../src/services/repository/report';
import { CliUsageError, hasFlag, integerOption, optionValue, parseArgs } from '../src/utils/cliArgs';
import { logger } from '../src/utils/logger';

export const USAGE =
  'Usage: validate-repository <index> [--manifest <path relative to the index>] [--prefix <key>] [--concurrency <n>] [--timeout <ms>] [--json]';

const localOrUrl = (location: string): string =>
  isRemoteLocation(location) || location.startsWith('file:') ? location : path.resolve(location);

export const toJson = (result: LoadResult) => {
  if (!result.ok) {
    return { ok: false, failure: result.failure };
  }
  const { catalog } = result;
  return {
    ok: true,
    consistent: result.consistent,
    repository: catalog.repository,
    loadedAt: catalog.loadedAt,
    sets: catalog.listSets().map((set) => ({ id: set.reference.id, name: set.reference.name, cards: set.cards.length })),
    cardCount: catalog.cardCount,
    issues: result.issues,
  };
};

/**
 * Load one repository, print the report and return the exit code:
 * 0 consistent, 1 data dropped, 2 fatal failure or bad usage.
 */
export async function validateRepository(
  argv: string[],
  loader: RepositoryLoader = repositoryLoader,
  print: (text: string) => void = (text) => process.stdout.write(`${text}\n`)
): Promise<number> {
  const args = parseArgs(argv, { flags: ['json'] });
  const [source] = args.positionals;
  if (!source) {
    throw new CliUsageError(USAGE);
  }

  const manifest = optionValue(args, 'manifest');
  const options: LoadOptions = {
    concurrency: integerOption(args, 'concurrency', 1),
    timeoutMs: integerOption(args, 'timeout'),
    manifest: manifest ? { location: manifest, prefix: optionValue(args, 'prefix') } : undefined,
  };

  const result = await loader.load(localOrUrl(source), options);
  print(hasFlag(args, 'json') ? JSON.stringify(toJson(result), null, 2) : formatReport(result));
  return exitCodeFor(result);
}

if (require.main === module) {
  validateRepository(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      logger.error(error instanceof Error ? error.message : String(error));
      process.exit(EXIT_FATAL);
    });
}
