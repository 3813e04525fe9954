/**
 * GridCalc Engine - Undo/Redo Manager (Command Pattern)
 *
 * Each recorded mutation is a Command with apply() and revert(). Cell
 * commands replay engine snapshots, so cached values come back exactly
 * as they were instead of being recomputed from scratch.
 *
 * Features:
 * - Batch operations: group several commands into a single undo step
 * - Bounded history (maxHistory)
 * - Event hooks for callers tracking undo state
 */

import { formatAddress, type Address, type CellRange } from '../types/index.js';
import type {
  CellSnapshot,
  EditResult,
  FillResult,
  SpreadsheetEngine,
} from '../SpreadsheetEngine.js';
import type { EditError } from '../formula/errors.js';
import type { FillDirection } from '../clipboard/FillSeries.js';

// =============================================================================
// Types - Commands
// =============================================================================

export type OperationType = 'setCell' | 'clearCell' | 'copy' | 'fill' | 'batch' | 'custom';

export type CommandOutcome = { ok: true } | { ok: false; error: EditError };

/**
 * Every undoable operation implements this interface.
 */
export interface Command {
  readonly id: string;
  readonly type: OperationType;
  /** Human-readable description, e.g. "Edit B2" */
  readonly description: string;

  /** Redo the mutation */
  apply(): CommandOutcome;

  /** Restore the state from before the mutation */
  revert(): CommandOutcome;
}

export interface BatchCommand extends Command {
  readonly type: 'batch';
  readonly commands: ReadonlyArray<Command>;
}

/**
 * The part of the engine commands write through.
 */
export interface HistoryTarget {
  snapshotCell(address: Address): CellSnapshot;
  restoreCell(snapshot: CellSnapshot): EditResult;
}

// =============================================================================
// Types - State & Events
// =============================================================================

export interface UndoRedoState {
  canUndo: boolean;
  canRedo: boolean;
  undoCount: number;
  redoCount: number;
  undoDescription: string | null;
  redoDescription: string | null;
}

export interface UndoRedoEvents {
  onRecord?: (command: Command) => void;
  onUndo?: (command: Command) => void;
  onRedo?: (command: Command) => void;
  onStateChange?: (state: UndoRedoState) => void;
}

export interface UndoRedoConfig {
  /** Maximum number of undo steps kept (default: 100) */
  maxHistory?: number;
}

export type UndoRedoResult =
  | { ok: true; command: Command }
  | { ok: false; error: EditError | null };

// =============================================================================
// Command Implementations
// =============================================================================

let commandIdCounter = 0;

function generateCommandId(): string {
  return `cmd_${++commandIdCounter}`;
}

/**
 * Replays captured before/after snapshots of a set of cells.
 */
export class CellSnapshotCommand implements Command {
  readonly id: string;

  constructor(
    private readonly target: HistoryTarget,
    readonly type: OperationType,
    readonly description: string,
    private readonly before: readonly CellSnapshot[],
    private readonly after: readonly CellSnapshot[]
  ) {
    this.id = generateCommandId();
  }

  get cells(): Address[] {
    return this.after.map((snapshot) => ({ ...snapshot.address }));
  }

  apply(): CommandOutcome {
    return this.replay(this.after);
  }

  revert(): CommandOutcome {
    // Reverse order so cells written later are unwound first
    return this.replay([...this.before].reverse());
  }

  private replay(snapshots: readonly CellSnapshot[]): CommandOutcome {
    for (const snapshot of snapshots) {
      const result = this.target.restoreCell(snapshot);
      if (!result.ok) return result;
    }
    return { ok: true };
  }
}

export class BatchCommandImpl implements BatchCommand {
  readonly id: string;
  readonly type = 'batch' as const;

  constructor(
    readonly description: string,
    readonly commands: ReadonlyArray<Command>
  ) {
    this.id = generateCommandId();
  }

  apply(): CommandOutcome {
    for (const command of this.commands) {
      const outcome = command.apply();
      if (!outcome.ok) return outcome;
    }
    return { ok: true };
  }

  revert(): CommandOutcome {
    for (let i = this.commands.length - 1; i >= 0; i--) {
      const outcome = this.commands[i].revert();
      if (!outcome.ok) return outcome;
    }
    return { ok: true };
  }
}

/**
 * Command with caller-supplied apply/revert functions.
 */
export class CustomCommand implements Command {
  readonly id: string;
  readonly type = 'custom' as const;

  constructor(
    readonly description: string,
    private readonly applyFn: () => CommandOutcome,
    private readonly revertFn: () => CommandOutcome
  ) {
    this.id = generateCommandId();
  }

  apply(): CommandOutcome {
    return this.applyFn();
  }

  revert(): CommandOutcome {
    return this.revertFn();
  }
}

// =============================================================================
// Undo/Redo Manager
// =============================================================================

export class UndoRedoManager {
  /** Most recent at end */
  private undoStack: Command[] = [];
  private redoStack: Command[] = [];

  private events: UndoRedoEvents = {};
  private config: Required<UndoRedoConfig>;

  /** Open batches, innermost last */
  private batchStack: Array<{ description: string; commands: Command[] }> = [];

  constructor(config: UndoRedoConfig = {}) {
    this.config = {
      maxHistory: config.maxHistory ?? 100,
    };
  }

  setEventHandlers(events: UndoRedoEvents): void {
    this.events = { ...this.events, ...events };
  }

  // ===========================================================================
  // State Queries
  // ===========================================================================

  getState(): UndoRedoState {
    return {
      canUndo: this.canUndo(),
      canRedo: this.canRedo(),
      undoCount: this.undoStack.length,
      redoCount: this.redoStack.length,
      undoDescription: this.undoStack.at(-1)?.description ?? null,
      redoDescription: this.redoStack.at(-1)?.description ?? null,
    };
  }

  canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  isInBatch(): boolean {
    return this.batchStack.length > 0;
  }

  // ===========================================================================
  // Recording
  // ===========================================================================

  /**
   * Record a command whose mutation has already happened. Clears redo.
   */
  record(command: Command): void {
    const batch = this.batchStack.at(-1);
    if (batch) {
      batch.commands.push(command);
      return;
    }
    this.push(command);
  }

  /**
   * Apply a command, recording it only when it succeeds.
   */
  execute(command: Command): CommandOutcome {
    const outcome = command.apply();
    if (outcome.ok) this.record(command);
    return outcome;
  }

  // ===========================================================================
  // Undo/Redo Operations
  // ===========================================================================

  /**
   * Revert the last command. A failed revert leaves the command on the
   * undo stack.
   */
  undo(): UndoRedoResult {
    const command = this.undoStack.at(-1);
    if (!command) return { ok: false, error: null };

    const outcome = command.revert();
    if (!outcome.ok) return outcome;

    this.undoStack.pop();
    this.redoStack.push(command);
    this.events.onUndo?.(command);
    this.notifyStateChange();
    return { ok: true, command };
  }

  redo(): UndoRedoResult {
    const command = this.redoStack.at(-1);
    if (!command) return { ok: false, error: null };

    const outcome = command.apply();
    if (!outcome.ok) return outcome;

    this.redoStack.pop();
    this.undoStack.push(command);
    this.events.onRedo?.(command);
    this.notifyStateChange();
    return { ok: true, command };
  }

  // ===========================================================================
  // Batch Operations
  // ===========================================================================

  /**
   * Commands recorded until the matching endBatch() become one undo step.
   * Batches nest.
   */
  beginBatch(description: string): void {
    this.batchStack.push({ description, commands: [] });
  }

  endBatch(): void {
    const batch = this.batchStack.pop();
    if (!batch || batch.commands.length === 0) return;

    const command: Command = batch.commands.length === 1
      ? batch.commands[0]
      : new BatchCommandImpl(batch.description, batch.commands);
    this.record(command);
  }

  /**
   * Drop the open batch, optionally reverting what it recorded.
   */
  cancelBatch(revert = false): CommandOutcome {
    const batch = this.batchStack.pop();
    if (!batch || !revert) return { ok: true };
    return new BatchCommandImpl(batch.description, batch.commands).revert();
  }

  // ===========================================================================
  // History Management
  // ===========================================================================

  /**
   * Descriptions, most recent first
   */
  getUndoHistory(): string[] {
    return this.undoStack.map((command) => command.description).reverse();
  }

  getRedoHistory(): string[] {
    return this.redoStack.map((command) => command.description).reverse();
  }

  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
    this.batchStack = [];
    this.notifyStateChange();
  }

  private push(command: Command): void {
    this.undoStack.push(command);
    this.redoStack = [];

    if (this.undoStack.length > this.config.maxHistory) {
      this.undoStack.splice(0, this.undoStack.length - this.config.maxHistory);
    }

    this.events.onRecord?.(command);
    this.notifyStateChange();
  }

  private notifyStateChange(): void {
    this.events.onStateChange?.(this.getState());
  }
}

// =============================================================================
// Engine Helpers
// =============================================================================

/**
 * Run `mutate` and, if it succeeds, record the change to `cells` as one
 * undo step.
 */
export function recordChange<R extends { ok: boolean }>(
  history: UndoRedoManager,
  engine: HistoryTarget,
  cells: readonly Address[],
  type: OperationType,
  description: string,
  mutate: () => R
): R {
  const before = cells.map((address) => engine.snapshotCell(address));
  const result = mutate();
  if (result.ok) {
    const after = cells.map((address) => engine.snapshotCell(address));
    history.record(new CellSnapshotCommand(engine, type, description, before, after));
  }
  return result;
}

export function recordEdit(
  history: UndoRedoManager,
  engine: SpreadsheetEngine,
  address: Address,
  rawText: string
): EditResult {
  const type: OperationType = rawText === '' ? 'clearCell' : 'setCell';
  const verb = rawText === '' ? 'Clear' : 'Edit';
  return recordChange(history, engine, [address], type, `${verb} ${formatAddress(address)}`, () =>
    engine.setCell(address, rawText)
  );
}

export function recordCopy(
  history: UndoRedoManager,
  engine: SpreadsheetEngine,
  from: Address,
  to: Address
): EditResult {
  return recordChange(
    history,
    engine,
    [to],
    'copy',
    `Copy ${formatAddress(from)} to ${formatAddress(to)}`,
    () => engine.copyCell(from, to)
  );
}

/**
 * Fill as one undo step. A fill that stops part way still records the
 * cells it wrote so they can be undone.
 */
export function recordFill(
  history: UndoRedoManager,
  engine: SpreadsheetEngine,
  source: CellRange,
  direction: FillDirection,
  count: number
): FillResult {
  const targets = engine
    .fillTargets(source, direction, count)
    .flatMap((strip) => strip.targets)
    .filter((address) => engine.isInBounds(address));
  const before = targets.map((address) => engine.snapshotCell(address));

  const result = engine.fill(source, direction, count);
  if (result.written.length > 0) {
    const written = new Set(result.written.map(formatAddress));
    const touched = before.filter((snapshot) => written.has(formatAddress(snapshot.address)));
    const after = touched.map((snapshot) => engine.snapshotCell(snapshot.address));
    history.record(
      new CellSnapshotCommand(engine, 'fill', `Fill ${direction} ${count}`, touched, after)
    );
  }
  return result;
}
