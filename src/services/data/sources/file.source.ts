import { readFile } from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import { DocumentFetchError, DocumentSource, describeError } from './base.source';

export class FileDocumentSource implements DocumentSource {
  public readonly type = 'file' as const;

  resolve(base: string, relative: string): string {
    return path.resolve(path.dirname(this.toPath(base)), relative);
  }

  async read(location: string, signal?: AbortSignal): Promise<Buffer> {
    const filePath = this.toPath(location);
    try {
      return await readFile(filePath, { signal });
    } catch (error) {
      throw new DocumentFetchError(location, `Failed to read ${filePath}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  private toPath(location: string): string {
    return location.startsWith('file:') ? fileURLToPath(location) : path.resolve(location);
  }
}

export const createFileSource = (): FileDocumentSource => new FileDocumentSource();
