/**
 * Transaction Helpers
 * Common transaction patterns for database operations
 */

import type Database from 'better-sqlite3';
import { logger } from '../utils/logger';

/**
 * Execute a transaction with debug error logging
 */
export function executeTransaction<T>(
  sqlite: Database.Database,
  operation: () => T,
  options?: {
    debug?: boolean;
    operationName?: string;
  }
): T {
  const { debug = false, operationName = 'operation' } = options ?? {};

  try {
    return sqlite.transaction(operation)();
  } catch (error) {
    if (debug) {
      logger.error(`[DrizzleLayoutStore] ${operationName} transaction failed`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    throw error;
  }
}
