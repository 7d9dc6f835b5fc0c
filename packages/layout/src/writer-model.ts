/**
 * Writer model — folds writer events into the growing document.
 *
 * The model is a value: `applyEvent` returns a new model and leaves its input
 * untouched, so a discarded trial is simply never looked at again.
 */

import type { WriterEvent } from './events';
import { isBreakVariant } from './events';
import { cons, consToArray, withHead, type ConsCell } from './persistent';

// ============================================================================
// Types
// ============================================================================

/** One outstanding bet that a sub-rendering fits. */
export interface TrialBudget {
  readonly maxWidth: number;
  readonly startColumn: number;
  /** Monotone: once set, the trial is doomed */
  readonly confirmedOverflow: boolean;
}

export type WriterMode =
  | { readonly type: 'NORMAL' }
  /** Lookahead rendering whose result is inspected, never merged */
  | { readonly type: 'MEASUREMENT' }
  /** Innermost budget first */
  | { readonly type: 'TRIAL'; readonly budgets: readonly TrialBudget[] };

export interface WriterModel {
  /** Newest line first */
  readonly lines: ConsCell<string>;
  readonly indent: number;
  /** Floor for the indentation applied by the next break */
  readonly alignColumn: number;
  /** Text deferred until the current line is broken */
  readonly pendingSuffix: string;
  readonly mode: WriterMode;
  /** Length of the open line */
  readonly column: number;
}

export const NORMAL_MODE: WriterMode = { type: 'NORMAL' };
export const MEASUREMENT_MODE: WriterMode = { type: 'MEASUREMENT' };

export const initialWriterModel: WriterModel = {
  lines: cons('', null),
  indent: 0,
  alignColumn: 0,
  pendingSuffix: '',
  mode: NORMAL_MODE,
  column: 0,
};

// ============================================================================
// Budgets
// ============================================================================

export function isTooLong(budget: TrialBudget, pageWidth: number, column: number): boolean {
  return column - budget.startColumn > budget.maxWidth || column > pageWidth;
}

export function hasConfirmedOverflow(mode: WriterMode): boolean {
  return mode.type === 'TRIAL' && mode.budgets.some(budget => budget.confirmedOverflow);
}

/** A trial is lost once any budget overflowed or the column is past a bound. */
export function trialHasFailed(mode: WriterMode, pageWidth: number, column: number): boolean {
  return (
    mode.type === 'TRIAL' &&
    mode.budgets.some(budget => budget.confirmedOverflow || isTooLong(budget, pageWidth, column))
  );
}

export function sameBudget(a: TrialBudget, b: TrialBudget): boolean {
  return a.maxWidth === b.maxWidth && a.startColumn === b.startColumn && a.confirmedOverflow === b.confirmedOverflow;
}

// ============================================================================
// Queries
// ============================================================================

export function currentLine(model: WriterModel): string {
  return model.lines.head;
}

export function lineCount(model: WriterModel): number {
  return model.lines.size;
}

/** Lines in document order. */
export function linesOf(model: WriterModel): string[] {
  return consToArray(model.lines);
}

// ============================================================================
// Update
// ============================================================================

function breakLine(model: WriterModel): WriterModel {
  const indent = Math.max(model.indent, model.alignColumn);
  const finished = (model.lines.head + model.pendingSuffix).trimEnd();
  return {
    ...model,
    indent,
    lines: cons(' '.repeat(indent), withHead(model.lines, finished)),
    pendingSuffix: '',
    column: indent,
  };
}

function applyToDocument(event: WriterEvent, model: WriterModel): WriterModel {
  switch (event.type) {
    case 'BREAK_LINE':
    case 'BREAK_LINE_DUE_TO_TRIVIA':
      return breakLine(model);
    case 'BREAK_LINE_IN_STRING_LITERAL':
      return { ...model, lines: cons('', model.lines), column: 0 };
    case 'BREAK_LINE_IN_TRIVIA':
      return { ...model, lines: cons('', withHead(model.lines, model.lines.head.trimEnd())), column: 0 };
    case 'WRITE_TEXT':
      return {
        ...model,
        lines: withHead(model.lines, model.lines.head + event.text),
        column: model.column + event.text.length,
      };
    case 'DEFER_TEXT_UNTIL_BREAK':
      return { ...model, pendingSuffix: event.text };
    case 'INDENT_BY':
      return {
        ...model,
        indent: model.alignColumn >= model.indent + event.amount
          ? model.alignColumn + event.amount
          : model.indent + event.amount,
      };
    case 'UNINDENT_BY':
      return { ...model, indent: Math.max(model.alignColumn, model.indent - event.amount) };
    case 'SET_INDENT':
    case 'RESTORE_INDENT':
      return { ...model, indent: event.level };
    case 'SET_ALIGN_COLUMN':
    case 'RESTORE_ALIGN_COLUMN':
      return { ...model, alignColumn: event.column };
  }
}

export function applyEvent(pageWidth: number, event: WriterEvent, model: WriterModel): WriterModel {
  const mode = model.mode;
  if (mode.type !== 'TRIAL') {
    return applyToDocument(event, model);
  }

  if (mode.budgets.some(budget => budget.confirmedOverflow)) {
    return model;
  }

  const forcesBreak = isBreakVariant(event) || (event.type === 'WRITE_TEXT' && model.pendingSuffix !== '');
  const budgets = mode.budgets.map(budget => ({
    ...budget,
    confirmedOverflow: forcesBreak || isTooLong(budget, pageWidth, model.column),
  }));

  if (budgets.some(budget => budget.confirmedOverflow)) {
    return { ...model, mode: { type: 'TRIAL', budgets } };
  }
  return applyToDocument(event, model);
}

export function applyEvents(pageWidth: number, events: Iterable<WriterEvent>, model: WriterModel): WriterModel {
  let result = model;
  for (const event of events) {
    result = applyEvent(pageWidth, event, result);
  }
  return result;
}
