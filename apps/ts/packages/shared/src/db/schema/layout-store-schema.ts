/**
 * Layout Store Drizzle Schema
 *
 * Typed views of the tables a sync run reads and writes:
 * - config: key/value settings (key uniqueness is enforced by the seeder, not SQLite)
 * - metadata: the single remote metadata document
 * - revision: layout revisions keyed by revision id
 *
 * heatmap, smart_layer and auth belong to the configurator; they are created
 * by the DDL in DrizzleLayoutStore and never queried here.
 */

import { blob, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const config = sqliteTable('config', {
  key: text('key'),
  value: text('value'),
});

export const metadata = sqliteTable('metadata', {
  data: blob('data', { mode: 'buffer' }),
});

export const revision = sqliteTable('revision', {
  revisionId: text('revisionId').notNull().unique(),
  data: blob('data', { mode: 'buffer' }),
});

/**
 * Tables created by the store, in creation order
 */
export const LAYOUT_STORE_TABLES = ['config', 'metadata', 'heatmap', 'revision', 'smart_layer', 'auth'] as const;

export type LayoutStoreTable = (typeof LAYOUT_STORE_TABLES)[number];
