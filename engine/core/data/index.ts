/**
 * GridCalc Engine - Data Module Exports
 */

export { SparseDataStore, emptyCell, isBlank } from './SparseDataStore.js';
export type {
  CellEntry,
  DataStoreConfig,
  DataStoreStats,
} from './SparseDataStore.js';
