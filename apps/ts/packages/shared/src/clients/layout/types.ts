import type { LayoutAddress } from '../../layout/address';

/**
 * A revision as returned by the remote query endpoint
 */
export interface RevisionPayload {
  /** Canonical revision id reported by the service (`layout.revision.hashId`) */
  revisionId: string;
  /** The response's `Data` value, stored opaquely */
  data: Buffer;
}

export interface RevisionFetcher {
  fetchRevision(address: LayoutAddress): Promise<RevisionPayload>;
}

export interface MetadataFetcher {
  fetchMetadata(): Promise<Buffer>;
}

/**
 * Request document sent to the query endpoint
 */
export interface LayoutQueryRequest {
  operationName: string;
  variables: {
    hashId: string;
    geometry: string;
    revisionId: string;
  };
  query: string;
}
