/**
 * GridCalc Engine - History Module Exports
 */

export {
  UndoRedoManager,
  CellSnapshotCommand,
  BatchCommandImpl,
  CustomCommand,
  recordChange,
  recordEdit,
  recordCopy,
  recordFill,
} from './UndoRedoManager.js';

export type {
  Command,
  BatchCommand,
  CommandOutcome,
  OperationType,
  HistoryTarget,
  UndoRedoState,
  UndoRedoEvents,
  UndoRedoConfig,
  UndoRedoResult,
} from './UndoRedoManager.js';
