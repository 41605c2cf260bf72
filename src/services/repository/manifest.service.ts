import { createHash } from 'crypto';
import { readdir, readFile, stat } from 'fs/promises';
import { ensureDir, move, writeFile } from 'fs-extra';
import path from 'path';
import Joi from 'joi';
import { logger } from '../../utils/logger';
import { ParseOutcome, parseDocument } from './document.schemas';
import { FileDigest } from './issues';

export interface RepositoryManifest {
  generated: string;
  files: Record<string, FileDigest>;
}

export interface ManifestSource {
  /** Prefix for every key from this source; empty for none */
  key: string;
  path: string;
}

export const DEFAULT_MANIFEST_EXTENSIONS = ['.json'];

/**
 * `key=path`, or a bare path whose last segment becomes the key.
 */
export const parseSourceSpec = (spec: string): ManifestSource => {
  const eq = spec.indexOf('=');
  if (eq >= 0) {
    return { key: spec.slice(0, eq).trim(), path: spec.slice(eq + 1).trim() };
  }
  return { key: path.basename(path.normalize(spec)), path: spec };
};

/**
 * Git's blob object id: SHA-1 over `blob <size>\0` followed by the content.
 * Matches `git hash-object` for the same bytes.
 */
export const gitBlobSha1 = (data: Buffer): string =>
  createHash('sha1')
    .update(`blob ${data.length}\0`)
    .update(data)
    .digest('hex');

export const digestOf = (data: Buffer): FileDigest => ({ sha: gitBlobSha1(data), size: data.length });

export const normalizeExtensions = (extensions: readonly string[]): string[] =>
  Array.from(new Set(extensions.map((ext) => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase())));

/**
 * Walk `dir` recursively in sorted order and return the files whose extension
 * is listed, as [absolute path, path relative to dir with forward slashes].
 */
export const gatherFiles = async (
  dir: string,
  extensions: readonly string[] = DEFAULT_MANIFEST_EXTENSIONS
): Promise<Array<[string, string]>> => {
  const wanted = normalizeExtensions(extensions);
  const found: Array<[string, string]> = [];

  const walk = async (current: string): Promise<void> => {
    const entries = await readdir(current, { withFileTypes: true });
    const dirs = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name).sort();
    const files = entries.filter((entry) => entry.isFile()).map((entry) => entry.name).sort();

    for (const name of files) {
      const lower = name.toLowerCase();
      if (wanted.length > 0 && !wanted.some((ext) => lower.endsWith(ext))) {
        continue;
      }
      const full = path.join(current, name);
      found.push([full, path.relative(dir, full).split(path.sep).join('/')]);
    }
    for (const name of dirs) {
      await walk(path.join(current, name));
    }
  };

  await walk(dir);
  return found;
};

const isDirectory = async (dir: string): Promise<boolean> => {
  try {
    return (await stat(dir)).isDirectory();
  } catch {
    return false;
  }
};

/**
 * Digest every matching file of every source. Keys are `<key>/<relative path>`
 * (or the bare relative path for an empty key); a key seen twice keeps the
 * later source's entry.
 */
export const buildManifest = async (
  sources: readonly ManifestSource[],
  extensions: readonly string[] = DEFAULT_MANIFEST_EXTENSIONS
): Promise<Record<string, FileDigest>> => {
  const combined: Record<string, FileDigest> = {};

  for (const source of sources) {
    if (!(await isDirectory(source.path))) {
      logger.warn(`Manifest source directory does not exist, skipping: ${source.path}`);
      continue;
    }

    for (const [full, relative] of await gatherFiles(source.path, extensions)) {
      let data: Buffer;
      try {
        data = await readFile(full);
      } catch (error) {
        logger.warn(`Failed to read ${full}, leaving it out of the manifest`, {
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }

      const key = source.key ? `${source.key}/${relative}` : relative;
      if (key in combined) {
        logger.warn(`Duplicate key in manifest for ${key}, overwriting with latest source`);
      }
      combined[key] = digestOf(data);
    }
  }

  return combined;
};

export const renderManifest = (files: Record<string, FileDigest>, generated: Date = new Date()): string => {
  const sorted: Record<string, FileDigest> = {};
  for (const key of Object.keys(files).sort()) {
    sorted[key] = { sha: files[key].sha, size: files[key].size };
  }
  const manifest: RepositoryManifest = { generated: generated.toISOString(), files: sorted };
  return `${JSON.stringify(manifest, null, 2)}\n`;
};

/** Writes to `<output>.tmp`, then moves it over the output. */
export const writeManifest = async (
  outputPath: string,
  files: Record<string, FileDigest>,
  generated: Date = new Date()
): Promise<void> => {
  await ensureDir(path.dirname(path.resolve(outputPath)));
  const tmp = `${outputPath}.tmp`;
  await writeFile(tmp, renderManifest(files, generated), 'utf-8');
  await move(tmp, outputPath, { overwrite: true });
  logger.info(`Wrote manifest to ${outputPath} (${Object.keys(files).length} files)`);
};

export const manifestSchema = Joi.object<RepositoryManifest>({
  generated: Joi.string().required(),
  files: Joi.object()
    .pattern(
      Joi.string(),
      Joi.object<FileDigest>({
        sha: Joi.string()
          .pattern(/^[0-9a-f]{40}$/)
          .required(),
        size: Joi.number().integer().min(0).required(),
      })
    )
    .required(),
});

export const parseManifest = (bytes: Buffer | string): ParseOutcome<RepositoryManifest> =>
  parseDocument(bytes, manifestSchema);

/**
 * Manifest key for a set file: the index-relative path without a leading
 * "./", under `prefix` when one is given.
 */
export const manifestKeyFor = (file: string, prefix?: string): string => {
  const relative = file.replace(/\\/g, '/').replace(/^(\.\/)+/, '');
  return prefix ? `${prefix.replace(/\/+$/, '')}/${relative}` : relative;
};
