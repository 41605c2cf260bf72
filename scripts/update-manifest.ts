#!/usr/bin/env ts-node

import {
  DEFAULT_MANIFEST_EXTENSIONS,
  buildManifest,
  normalizeExtensions,
  parseSourceSpec,
  writeManifest,
} from '../src/services/repository/manifest.service';
import { optionValue, optionValues, parseArgs } from '../src/utils/cliArgs';
import { logger } from '../src/utils/logger';

export const USAGE = 'Usage: update-manifest --source [key=]path [--source ...] [--output <file>] [--include-ext <ext> ...]';

export const DEFAULT_OUTPUT = 'manifest.json';

/**
 * Digest the given source directories and write the manifest. Returns the
 * process exit code.
 */
export async function updateManifest(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  const sources = optionValues(args, 'source').map(parseSourceSpec);
  if (sources.length === 0) {
    logger.error(`At least one --source is required\n${USAGE}`);
    return 2;
  }

  const extensions = normalizeExtensions([...DEFAULT_MANIFEST_EXTENSIONS, ...optionValues(args, 'include-ext')]);
  const output = optionValue(args, 'output') ?? DEFAULT_OUTPUT;

  const files = await buildManifest(sources, extensions);
  if (Object.keys(files).length === 0) {
    logger.error('No files found in the given sources; manifest not written');
    return 2;
  }

  await writeManifest(output, files);
  return 0;
}

if (require.main === module) {
  updateManifest(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      logger.error(error instanceof Error ? error.message : String(error));
      process.exit(2);
    });
}
