import { BaseLayoutServiceClient } from '../base/BaseLayoutServiceClient';
import type { MetadataFetcher } from './types';

/**
 * Fetches the metadata document the desktop configurator expects in its
 * `metadata` table. The body is returned byte for byte.
 */
export class MetadataClient extends BaseLayoutServiceClient implements MetadataFetcher {
  async fetchMetadata(): Promise<Buffer> {
    const data = await this.fetchBuffer(this.endpoints.metadataEndpoint, 'metadata');
    this.logger.debug('Fetched metadata', { bytes: data.length });
    return data;
  }
}
