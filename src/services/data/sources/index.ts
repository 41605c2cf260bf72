import { DocumentSource } from './base.source';
import { createFileSource } from './file.source';
import { createHttpSource, HttpSourceConfig } from './http.source';

export * from './base.source';
export * from './file.source';
export * from './http.source';

export const isRemoteLocation = (location: string): boolean => /^https?:\/\//i.test(location);

/**
 * Pick the source able to read `location`: HTTP(S) URLs go through axios,
 * everything else (paths, file:// URLs) through the filesystem.
 */
export const createDocumentSource = (
  location: string,
  httpConfig: Partial<HttpSourceConfig> = {}
): DocumentSource => (isRemoteLocation(location) ? createHttpSource(httpConfig) : createFileSource());
