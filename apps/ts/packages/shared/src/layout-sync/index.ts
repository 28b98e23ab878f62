export { syncLayout } from './sync';
export type {
  LayoutStoreWriter,
  LayoutSyncDependencies,
  LayoutSyncOptions,
  LayoutSyncProgressCallback,
  LayoutSyncResult,
  LayoutSyncStage,
} from './types';
