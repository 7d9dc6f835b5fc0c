/**
 * Context — the per-document value threaded through every printer.
 *
 * Bundles the writer model, the append-only event log, the options record and
 * the trivia lookup tables. Printers never mutate a context; they return a new
 * one, which is what lets the trial engine drop a failed attempt wholesale.
 */

import type { FormatConfig, SourceRange, SourceText, TriviaInstruction } from '@linefold/types';
import { DEFAULT_FORMAT_CONFIG, LeakedTrialError, NegativeIndentError, debugLog, newlineString } from '@linefold/core';
import type { WriterEvent } from './events';
import {
  indentBy,
  normalize,
  restoreAlignColumn,
  restoreIndent,
  setAlignColumn,
  setIndent,
  unindentBy,
  writeText,
} from './events';
import { AppendLog, cons } from './persistent';
import { rangeEq } from './source-text';
import type { TrialBudget, WriterModel } from './writer-model';
import { MEASUREMENT_MODE, applyEvents, initialWriterModel, linesOf, sameBudget } from './writer-model';

// ============================================================================
// Types
// ============================================================================

export type TriviaByNodeType = ReadonlyMap<string, readonly TriviaInstruction[]>;

export interface Context {
  readonly config: FormatConfig;
  readonly writerModel: WriterModel;
  readonly writerEvents: AppendLog<WriterEvent>;
  readonly triviaBefore: TriviaByNodeType;
  readonly triviaAfter: TriviaByNodeType;
  readonly sourceText: SourceText | undefined;
}

/** A layout step. Must be pure: the trial engine and list joiner may run it twice. */
export type Printer = (ctx: Context) => Context;

export interface CreateContextOptions {
  /** Instructions from the trivia collector, before and after mixed */
  trivia?: readonly TriviaInstruction[];
  sourceText?: SourceText;
}

// ============================================================================
// Construction
// ============================================================================

function groupByNodeType(instructions: readonly TriviaInstruction[]): TriviaByNodeType {
  const grouped = new Map<string, TriviaInstruction[]>();
  for (const instruction of instructions) {
    const bucket = grouped.get(instruction.nodeType);
    if (bucket) {
      bucket.push(instruction);
    } else {
      grouped.set(instruction.nodeType, [instruction]);
    }
  }
  return grouped;
}

export function createContext(config: FormatConfig = DEFAULT_FORMAT_CONFIG, options: CreateContextOptions = {}): Context {
  const trivia = config.strictMode ? [] : options.trivia ?? [];
  return {
    config,
    writerModel: initialWriterModel,
    writerEvents: AppendLog.empty(),
    triviaBefore: groupByNodeType(trivia.filter(instruction => instruction.isBefore)),
    triviaAfter: groupByNodeType(trivia.filter(instruction => !instruction.isBefore)),
    sourceText: config.strictMode ? undefined : options.sourceText,
  };
}

/** Append an event (split into primitive events first) and fold it into the model. */
export function writerEvent(event: WriterEvent): Printer {
  return ctx => {
    const events = normalize(event);
    return {
      ...ctx,
      writerEvents: ctx.writerEvents.append(events),
      writerModel: applyEvents(ctx.config.maxLineLength, events, ctx.writerModel),
    };
  };
}

// ============================================================================
// Derived Contexts
// ============================================================================

export function column(ctx: Context): number {
  return ctx.writerModel.column;
}

export function isMeasurement(ctx: Context): boolean {
  return ctx.writerModel.mode.type === 'MEASUREMENT';
}

/**
 * Independent context for lookahead: one line padded to the current column, an
 * empty log, and an unlimited page width unless `keepPageWidth`.
 */
export function withMeasurement(ctx: Context, keepPageWidth = false): Context {
  return {
    ...ctx,
    config: keepPageWidth ? ctx.config : { ...ctx.config, maxLineLength: Number.MAX_SAFE_INTEGER },
    writerModel: {
      ...ctx.writerModel,
      mode: MEASUREMENT_MODE,
      lines: cons(' '.repeat(ctx.writerModel.column), null),
      pendingSuffix: '',
    },
    writerEvents: AppendLog.empty(),
  };
}

/** Render `producer` in measurement mode. The result is never merged into `ctx`. */
export function measure(ctx: Context, producer: Printer, keepPageWidth = false): Context {
  return producer(withMeasurement(ctx, keepPageWidth));
}

/** Push a budget onto the trial stack; an identical outstanding budget is reused. */
export function withTrialBudget(ctx: Context, maxWidth: number, startColumn?: number): Context {
  const budget: TrialBudget = {
    maxWidth,
    startColumn: startColumn ?? ctx.writerModel.column,
    confirmedOverflow: false,
  };
  const mode = ctx.writerModel.mode;

  if (mode.type === 'TRIAL') {
    if (mode.budgets.some(existing => sameBudget(existing, budget))) return ctx;
    return {
      ...ctx,
      writerModel: { ...ctx.writerModel, mode: { type: 'TRIAL', budgets: [budget, ...mode.budgets] } },
    };
  }
  return { ...ctx, writerModel: { ...ctx.writerModel, mode: { type: 'TRIAL', budgets: [budget] } } };
}

// ============================================================================
// Source & Trivia Lookup
// ============================================================================

export function fromSourceText(ctx: Context, range: SourceRange): string | undefined {
  return ctx.sourceText?.getContentAt(range);
}

function hasTriviaAt(table: TriviaByNodeType, nodeType: string, range: SourceRange): boolean {
  return (table.get(nodeType) ?? []).some(instruction => rangeEq(instruction.range, range));
}

export function hasContentBefore(ctx: Context, nodeType: string, range: SourceRange): boolean {
  return hasTriviaAt(ctx.triviaBefore, nodeType, range);
}

export function hasContentAfter(ctx: Context, nodeType: string, range: SourceRange): boolean {
  return hasTriviaAt(ctx.triviaAfter, nodeType, range);
}

// ============================================================================
// Finalization
// ============================================================================

export function hasPendingSuffix(ctx: Context): boolean {
  return ctx.writerModel.pendingSuffix !== '';
}

export function finalizeWriterModel(ctx: Context): Context {
  return hasPendingSuffix(ctx) ? writerEvent(writeText(ctx.writerModel.pendingSuffix))(ctx) : ctx;
}

/**
 * Flatten the document to text. Leading blank lines are dropped unless a
 * selection is being formatted.
 */
export function dump(ctx: Context, isSelection = false): string {
  const mode = ctx.writerModel.mode;
  if (mode.type === 'TRIAL') {
    throw new LeakedTrialError(mode.budgets.length);
  }

  const lines = linesOf(finalizeWriterModel(ctx).writerModel);
  const last = lines.length - 1;
  lines[last] = lines[last].trimEnd();

  let start = 0;
  if (!isSelection) {
    while (start < lines.length && lines[start] === '') start++;
  }
  return lines.slice(start).join(newlineString(ctx.config.endOfLine));
}

export function dumpAndContinue(ctx: Context): Context {
  debugLog(linesOf(finalizeWriterModel(ctx).writerModel).join('\n'));
  return ctx;
}

// ============================================================================
// Event Log Inspection
// ============================================================================

/** Non-empty writes since the last break, newest first. */
export function writeEventsOnLastLine(ctx: Context): string[] {
  const writes: string[] = [];
  for (const event of ctx.writerEvents.reversed()) {
    if (
      event.type === 'BREAK_LINE' ||
      event.type === 'BREAK_LINE_DUE_TO_TRIVIA' ||
      event.type === 'BREAK_LINE_IN_STRING_LITERAL'
    ) {
      break;
    }
    if (event.type === 'WRITE_TEXT' && event.text.length > 0) {
      writes.push(event.text);
    }
  }
  return writes;
}

export function lastWriteEventOnLastLine(ctx: Context): string | undefined {
  return writeEventsOnLastLine(ctx)[0];
}

export function forallCharsOnLastLine(predicate: (char: string) => boolean, ctx: Context): boolean {
  return writeEventsOnLastLine(ctx).every(write => [...write].every(predicate));
}

/** Whether the last meaningful event is a break (restores and empty writes are skipped). */
export function lastWriteEventIsNewline(ctx: Context): boolean {
  for (const event of ctx.writerEvents.reversed()) {
    switch (event.type) {
      case 'RESTORE_INDENT':
      case 'RESTORE_ALIGN_COLUMN':
      case 'UNINDENT_BY':
        continue;
      case 'WRITE_TEXT':
        if (event.text === '') continue;
        return false;
      case 'BREAK_LINE':
      case 'BREAK_LINE_DUE_TO_TRIVIA':
        return true;
      default:
        return false;
    }
  }
  return false;
}

/** Whether the log already ends in a full blank line. */
export function newlineBetweenLastWriteEvent(ctx: Context): boolean {
  let breaks = 0;
  for (const event of ctx.writerEvents.reversed()) {
    if (event.type === 'BREAK_LINE') {
      breaks++;
    } else if (event.type === 'WRITE_TEXT') {
      if (event.text !== '') break;
    } else if (
      event.type !== 'INDENT_BY' &&
      event.type !== 'UNINDENT_BY' &&
      event.type !== 'SET_INDENT' &&
      event.type !== 'RESTORE_INDENT' &&
      event.type !== 'SET_ALIGN_COLUMN' &&
      event.type !== 'RESTORE_ALIGN_COLUMN'
    ) {
      break;
    }
  }
  return breaks > 1;
}

// ============================================================================
// Indentation
// ============================================================================

export function indent(ctx: Context): Context {
  return writerEvent(indentBy(ctx.config.indentSize))(ctx);
}

export function unindent(ctx: Context): Context {
  return writerEvent(unindentBy(ctx.config.indentSize))(ctx);
}

export function incrIndent(amount: number): Printer {
  return writerEvent(indentBy(amount));
}

export function decrIndent(amount: number): Printer {
  return writerEvent(unindentBy(amount));
}

/**
 * Run `body` with the align column (and optionally the indent) at an absolute
 * level. The previous values are restored after `body`, including when it
 * fell back from a trial.
 */
export function atIndentLevel(alsoSetIndent: boolean, level: number, body: Printer): Printer {
  if (level < 0) {
    throw new NegativeIndentError(level);
  }
  return ctx => {
    const { indent: savedIndent, alignColumn: savedAlignColumn } = ctx.writerModel;
    let result = writerEvent(setAlignColumn(level))(ctx);
    if (alsoSetIndent) result = writerEvent(setIndent(level))(result);
    result = body(result);
    result = writerEvent(restoreAlignColumn(savedAlignColumn))(result);
    return writerEvent(restoreIndent(savedIndent))(result);
  };
}

/**
 * Align the next breaks inside `body` at least on the current column.
 *
 * { X = // indent=0, alignColumn=2
 *     "some long string" // indent=4: deeper than the align column
 *   Y = 1 // indent=0, alignColumn=2
 * }
 */
export function atCurrentColumn(body: Printer): Printer {
  return ctx => atIndentLevel(false, ctx.writerModel.column, body)(ctx);
}

/** Like `atCurrentColumn`, measured after `prepend` has run. */
export function atCurrentColumnWithPrepend(prepend: Printer, body: Printer): Printer {
  return ctx => {
    const col = ctx.writerModel.column;
    return atIndentLevel(false, col, body)(prepend(ctx));
  };
}

/** Set both indent and align column to the current column for `body`. */
export function atCurrentColumnIndent(body: Printer): Printer {
  return ctx => atIndentLevel(true, ctx.writerModel.column, body)(ctx);
}
