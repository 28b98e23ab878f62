/**
 * keymirror Shared Package - Main Entry Point
 *
 * Everything the CLI needs to mirror a layout revision into the configurator's
 * local store: address decoding, remote clients, the store and the sync run.
 */

// ===== CLIENT EXPORTS =====
export type { LayoutServiceClientOptions, LayoutServiceEndpoints } from './clients/base/BaseLayoutServiceClient';
export { HttpRequestError, type HttpRequestErrorKind } from './clients/base/http-client';
export type { MetadataFetcher, RevisionFetcher, RevisionPayload } from './clients/layout';
export { buildLayoutQuery, MetadataClient, parseRevisionResponse, RevisionClient } from './clients/layout';
// ===== CONFIGURATION EXPORTS =====
export type { AppConfig, RemoteConfig, StoreConfig } from './config';
export { getConfig, resetConfig, setConfig } from './config';
// ===== DATABASE EXPORTS =====
export type { ConfigEntry, LayoutStoreOptions, StoredRevisionSummary } from './db';
export { DEFAULT_CONFIG_ENTRIES, DrizzleLayoutStore, LAYOUT_STORE_TABLES, type LayoutStoreTable } from './db';
// ===== ERROR EXPORTS =====
export {
  FetchFailedError,
  getErrorMessage,
  InvalidAddressError,
  isKeymirrorError,
  KeymirrorError,
  type KeymirrorErrorCode,
  MalformedResponseError,
  StoreError,
} from './errors';
// ===== LAYOUT EXPORTS =====
export { decodeLayoutAddress, type LayoutAddress } from './layout/address';
export type {
  LayoutStoreWriter,
  LayoutSyncDependencies,
  LayoutSyncOptions,
  LayoutSyncProgressCallback,
  LayoutSyncResult,
  LayoutSyncStage,
} from './layout-sync';
export { syncLayout } from './layout-sync';
// ===== UTILITY EXPORTS =====
export type { LogLevel } from './utils/logger-interface';
export { ConsoleLogger, isValidLogLevel, type Logger, logger, SilentLogger } from './utils/logger';
export { ensureStoreDirectory, expandHomeDir, resolveStorePath } from './utils/store-paths';
