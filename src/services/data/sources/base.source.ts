export type DocumentSourceType = 'file' | 'http';

/**
 * Reads raw repository documents. Locations are whatever the source
 * understands: filesystem paths for `file`, absolute URLs for `http`.
 */
export interface DocumentSource {
  readonly type: DocumentSourceType;

  /** Resolve `relative` against the location of the document at `base`. */
  resolve(base: string, relative: string): string;

  /** Fetch the raw bytes of a document. Rejects with DocumentFetchError. */
  read(location: string, signal?: AbortSignal): Promise<Buffer>;
}

export class DocumentFetchError extends Error {
  readonly location: string;
  readonly status?: number;

  constructor(location: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'DocumentFetchError';
    this.location = location;
    this.status = options.status;
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
