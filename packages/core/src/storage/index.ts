/**
 * Storage Module
 *
 * Run-report persistence. SQLite by default; set PIPEWRIGHT_STORAGE=memory
 * (or `storage.backend` in config) for a process-local store.
 *
 * @module @pipewright/core/storage
 */

export * from './interfaces.js';
export { SQLiteRunReportStore } from './sqlite.js';
export { InMemoryRunReportStore } from './inmemory.js';

import type { StorageConfig } from '../config/schema.js';
import type { RunReportStore } from './interfaces.js';
import { SQLiteRunReportStore } from './sqlite.js';
import { InMemoryRunReportStore } from './inmemory.js';

/**
 * Create a run-report store based on configuration
 */
export function createRunReportStore(config: StorageConfig): RunReportStore {
  switch (config.backend) {
    case 'sqlite':
      return new SQLiteRunReportStore(config.path);
    case 'memory':
      return new InMemoryRunReportStore();
  }
}
