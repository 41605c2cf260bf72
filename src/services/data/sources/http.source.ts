import axios, { AxiosInstance } from 'axios';
import { DocumentFetchError, DocumentSource, describeError } from './base.source';
import { logger } from '../../../utils/logger';

export interface HttpSourceConfig {
  timeoutMs: number;
  userAgent: string;
  /** Preconfigured client; tests pass one with a local adapter */
  client?: AxiosInstance;
}

export class HttpDocumentSource implements DocumentSource {
  public readonly type = 'http' as const;

  private client: AxiosInstance;

  constructor(config: Partial<HttpSourceConfig> = {}) {
    this.client =
      config.client ??
      axios.create({
        timeout: config.timeoutMs ?? 15000,
        headers: {
          Accept: 'application/json',
          'User-Agent': config.userAgent ?? 'CardRepositoryLoader/1.0',
        },
      });
  }

  resolve(base: string, relative: string): string {
    return new URL(relative, base).toString();
  }

  async read(location: string, signal?: AbortSignal): Promise<Buffer> {
    logger.debug(`GET ${location}`);
    try {
      const response = await this.client.get<ArrayBuffer>(location, {
        responseType: 'arraybuffer',
        signal,
      });
      return Buffer.from(response.data);
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      const message = status
        ? `GET ${location} failed with HTTP ${status}`
        : `GET ${location} failed: ${describeError(error)}`;
      throw new DocumentFetchError(location, message, { status, cause: error });
    }
  }
}

export const createHttpSource = (config: Partial<HttpSourceConfig> = {}): HttpDocumentSource =>
  new HttpDocumentSource(config);
