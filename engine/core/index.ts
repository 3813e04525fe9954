/**
 * GridCalc Engine - Core Module Exports
 */

// Main Engine
export { SpreadsheetEngine } from './SpreadsheetEngine.js';
export type {
  SpreadsheetEngineConfig,
  SpreadsheetEngineEvents,
  EditResult,
  CellSnapshot,
  CellInput,
  SheetContents,
  LoadResult,
  FillResult,
  EngineStats,
} from './SpreadsheetEngine.js';

// Types - export all
export * from './types/index.js';

export * from './data/index.js';
export * from './formula/index.js';
export * from './clipboard/index.js';
export * from './history/index.js';
export * from './persistence/index.js';

// Logging
export { createLogger, createSilentLogger } from './logging/logger.js';
export type { Logger, LoggerConfig } from './logging/logger.js';
