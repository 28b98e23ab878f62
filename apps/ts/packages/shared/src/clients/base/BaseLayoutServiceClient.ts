import { getConfig } from '../../config';
import { FetchFailedError } from '../../errors';
import { createDefaultLogger, type Logger } from '../../utils/logger';
import { HttpRequestError, type HttpRequestOptions, requestBuffer, requestText } from './http-client';

export interface LayoutServiceEndpoints {
  queryEndpoint: string;
  metadataEndpoint: string;
}

export interface LayoutServiceClientOptions extends Partial<LayoutServiceEndpoints> {
  /** Per-request deadline in milliseconds, 0 disables it */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Shared plumbing for the clients of the remote layout configuration service.
 * Endpoints and the request deadline default to the application config.
 */
export abstract class BaseLayoutServiceClient {
  protected readonly endpoints: LayoutServiceEndpoints;
  protected readonly timeoutMs: number;
  protected logger: Logger;

  constructor(options?: LayoutServiceClientOptions) {
    const { remote } = getConfig();

    this.endpoints = {
      queryEndpoint: options?.queryEndpoint || remote.queryEndpoint,
      metadataEndpoint: options?.metadataEndpoint || remote.metadataEndpoint,
    };
    this.timeoutMs = options?.timeoutMs ?? remote.requestTimeoutMs;
    this.logger = options?.logger || createDefaultLogger();
  }

  private toFetchFailed(error: unknown, url: string, what: string): never {
    if (error instanceof HttpRequestError) {
      const status = error.kind === 'http' ? ` (HTTP ${error.status ?? 'unknown'})` : '';
      this.logger.error(`Failed to get ${what}`, { url, kind: error.kind, status: error.status });
      throw new FetchFailedError(`Failed to get ${what}${status}: ${error.message}`, url, error);
    }
    throw error;
  }

  protected async fetchText(url: string, what: string, init?: RequestInit): Promise<string> {
    const options: HttpRequestOptions = { ...init, timeoutMs: this.timeoutMs };
    this.logger.debug(`Requesting ${what}`, { url, method: init?.method ?? 'GET' });

    try {
      return await requestText(url, options);
    } catch (error) {
      this.toFetchFailed(error, url, what);
    }
  }

  protected async fetchBuffer(url: string, what: string, init?: RequestInit): Promise<Buffer> {
    const options: HttpRequestOptions = { ...init, timeoutMs: this.timeoutMs };
    this.logger.debug(`Requesting ${what}`, { url, method: init?.method ?? 'GET' });

    try {
      return await requestBuffer(url, options);
    } catch (error) {
      this.toFetchFailed(error, url, what);
    }
  }
}
