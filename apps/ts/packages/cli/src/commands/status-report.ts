/**
 * Store status helpers
 */

import type { ConfigEntry, DrizzleLayoutStore, StoredRevisionSummary } from '@keymirror/shared';

export interface StoreStatus {
  storePath: string;
  tables: string[];
  config: ConfigEntry[];
  /** Size of the stored metadata document, null when none is stored */
  metadataBytes: number | null;
  revisions: StoredRevisionSummary[];
}

type StoreReader = Pick<DrizzleLayoutStore, 'dbPath' | 'listTables' | 'getConfigEntries' | 'getMetadata' | 'listRevisions'>;

/**
 * Read what the store holds. Tables missing from the file are reported as
 * empty, since a read-only store never creates them.
 */
export function collectStoreStatus(store: StoreReader): StoreStatus {
  const tables = store.listTables();
  const document = tables.includes('metadata') ? store.getMetadata() : null;
  return {
    storePath: store.dbPath,
    tables,
    config: tables.includes('config') ? store.getConfigEntries() : [],
    metadataBytes: document ? document.length : null,
    revisions: tables.includes('revision') ? store.listRevisions() : [],
  };
}
