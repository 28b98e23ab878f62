/**
 * Layout Sync - Types
 */

import type { MetadataFetcher, RevisionFetcher } from '../clients/layout/types';
import type { DrizzleLayoutStore } from '../db/drizzle-layout-store';
import type { LayoutAddress } from '../layout/address';
import type { Logger } from '../utils/logger';

export type LayoutSyncStage = 'address' | 'revision' | 'store' | 'config' | 'metadata' | 'save';

/**
 * Progress callback for sync runs
 */
export type LayoutSyncProgressCallback = (stage: LayoutSyncStage, message: string) => void;

/**
 * Store operations a sync run performs
 */
export type LayoutStoreWriter = Pick<
  DrizzleLayoutStore,
  'seedDefaultConfig' | 'countMetadata' | 'insertMetadata' | 'upsertRevision' | 'close'
>;

export interface LayoutSyncOptions {
  /** Configuration page address of the layout revision */
  address: string;
  /** Absolute path of the store file */
  storePath: string;
  /** Create missing parent directories of the store (default: true) */
  createDirectories?: boolean;
}

export interface LayoutSyncDependencies {
  revisionFetcher: RevisionFetcher;
  metadataFetcher: MetadataFetcher;
  openStore?: (storePath: string) => LayoutStoreWriter;
  ensureDirectory?: (storePath: string) => unknown;
  logger?: Logger;
  onProgress?: LayoutSyncProgressCallback;
}

export interface LayoutSyncResult {
  address: LayoutAddress;
  /** Revision id reported by the service, which keys the stored row */
  revisionId: string;
  revisionBytes: number;
  metadataFetched: boolean;
  metadataBytes: number;
  /** Default settings inserted by this run */
  seededKeys: string[];
  storePath: string;
}
