/**
 * Layout store database module
 */

export { DEFAULT_CONFIG_ENTRIES, type DefaultConfigEntry } from './constants/default-config';
export {
  type ConfigEntry,
  DrizzleLayoutStore,
  type LayoutStoreOptions,
  type StoredRevisionSummary,
} from './drizzle-layout-store';
export { config, LAYOUT_STORE_TABLES, type LayoutStoreTable, metadata, revision } from './schema/layout-store-schema';
export { executeTransaction } from './transaction-helpers';
