/**
 * Layout Sync
 *
 * Mirrors one layout revision from the remote service into the configurator's
 * local store. The store is only opened once the revision has been fetched, so
 * a bad address or an unreachable service never creates or touches the file.
 */

import { DrizzleLayoutStore } from '../db/drizzle-layout-store';
import { decodeLayoutAddress } from '../layout/address';
import { SilentLogger } from '../utils/logger';
import { ensureStoreDirectory } from '../utils/store-paths';
import type { LayoutStoreWriter, LayoutSyncDependencies, LayoutSyncOptions, LayoutSyncResult } from './types';

function defaultOpenStore(storePath: string): LayoutStoreWriter {
  return new DrizzleLayoutStore(storePath);
}

export async function syncLayout(
  options: LayoutSyncOptions,
  dependencies: LayoutSyncDependencies
): Promise<LayoutSyncResult> {
  const { storePath, createDirectories = true } = options;
  const {
    revisionFetcher,
    metadataFetcher,
    openStore = defaultOpenStore,
    ensureDirectory = ensureStoreDirectory,
    logger = new SilentLogger(),
    onProgress,
  } = dependencies;

  onProgress?.('address', 'Decoding layout address...');
  const address = decodeLayoutAddress(options.address);
  logger.debug('Decoded layout address', { ...address });

  onProgress?.('revision', `Fetching revision ${address.revisionId} of layout ${address.layoutId}...`);
  const revision = await revisionFetcher.fetchRevision(address);
  logger.info('Fetched layout revision', { revisionId: revision.revisionId, bytes: revision.data.length });

  if (createDirectories) {
    ensureDirectory(storePath);
  }

  onProgress?.('store', `Opening store at ${storePath}...`);
  const store = openStore(storePath);

  try {
    onProgress?.('config', 'Seeding default settings...');
    const seededKeys = store.seedDefaultConfig();
    if (seededKeys.length > 0) {
      logger.debug('Seeded default settings', { keys: seededKeys });
    }

    let metadataFetched = false;
    let metadataBytes = 0;
    if (store.countMetadata() === 0) {
      onProgress?.('metadata', 'Fetching layout metadata...');
      const document = await metadataFetcher.fetchMetadata();
      store.insertMetadata(document);
      metadataFetched = true;
      metadataBytes = document.length;
      logger.info('Stored layout metadata', { bytes: metadataBytes });
    } else {
      logger.debug('Metadata already present, skipping fetch');
    }

    onProgress?.('save', `Saving revision ${revision.revisionId}...`);
    store.upsertRevision(revision.revisionId, revision.data);

    return {
      address,
      revisionId: revision.revisionId,
      revisionBytes: revision.data.length,
      metadataFetched,
      metadataBytes,
      seededKeys,
      storePath,
    };
  } finally {
    store.close();
  }
}
