import { readFile } from 'fs/promises';
import path from 'path';
import Joi from 'joi';
import { logger } from '../utils/logger';
import { isValidUrl, patterns } from '../utils/validation';

export interface RepositoryRegistryEntry {
  name: string;
  /** Index location: http(s) URL, file:// URL or filesystem path */
  url: string;
  enabled: boolean;
}

interface RegistryDocument {
  repositories: RepositoryRegistryEntry[];
}

const registrySchema = Joi.object<RegistryDocument>({
  repositories: Joi.array()
    .items(
      Joi.object<RepositoryRegistryEntry>({
        name: Joi.string().pattern(patterns.repositoryName).required(),
        url: Joi.string().required(),
        enabled: Joi.boolean().default(true),
      })
    )
    .unique('name')
    .required(),
});

const isUrl = (value: string): boolean => isValidUrl(value) || /^file:\/\//i.test(value);

/**
 * Check a registry document and resolve relative paths against `baseDir`.
 * Throws on any schema violation.
 */
export const parseRegistry = (raw: unknown, baseDir: string): RepositoryRegistryEntry[] => {
  const { value, error } = registrySchema.prefs({ errors: { label: 'path' } }).validate(raw, { abortEarly: false });
  if (error) {
    throw new Error(`Registry validation error: ${error.message}`);
  }

  return value.repositories.map((entry) => ({
    name: entry.name,
    url: isUrl(entry.url) ? entry.url : path.resolve(baseDir, entry.url),
    enabled: entry.enabled,
  }));
};

/**
 * Read the repository registry file.
 */
export const loadRepositoryRegistry = async (registryPath: string): Promise<RepositoryRegistryEntry[]> => {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(registryPath, 'utf-8'));
  } catch (error) {
    const message = `Failed to read repository registry ${registryPath}: ${
      error instanceof Error ? error.message : String(error)
    }`;
    logger.error(message);
    throw new Error(message, { cause: error });
  }

  const entries = parseRegistry(raw, path.dirname(path.resolve(registryPath)));
  logger.info(`Repository registry loaded with ${entries.length} entries`, {
    enabled: entries.filter((entry) => entry.enabled).map((entry) => entry.name),
  });
  return entries;
};
