/**
 * Speculative trial / fallback engine.
 *
 * Every "does this fit on one line" decision goes through `tryCompact`: render
 * the compact form under a width budget and, if the budget overflows or the
 * form breaks a line, drop that rendering and render the long form against the
 * context as it was before the attempt.
 */

import type { Context, Printer } from './context';
import { indent, measure, unindent, withMeasurement, withTrialBudget } from './context';
import type { WriterEvent } from './events';
import { containsBreak, isCommentOrDirective } from './events';
import { coli, ifElseCtx, onlyIf, seq } from './combinators';
import { indentSepNlnUnindent, sepCloseT, sepNln, sepNone, sepOpenT, sepSpace } from './separators';
import { lineCount, trialHasFailed } from './writer-model';

// ============================================================================
// Core Trial
// ============================================================================

function trialAlreadyFailed(ctx: Context): boolean {
  return trialHasFailed(ctx.writerModel.mode, ctx.config.maxLineLength, ctx.writerModel.column);
}

/**
 * Render `shortForm` if it fits within `maxWidth` columns from `startColumn`
 * (default: the current column) and within the page width, without breaking a
 * line. Otherwise render `longForm` from the original context.
 *
 * Inside an outer trial that is already lost this does nothing: the outer
 * attempt is discarded anyway.
 */
export function tryCompact(
  maxWidth: number,
  startColumn: number | undefined,
  shortForm: Printer,
  longForm: Printer
): Printer {
  return ctx => {
    if (trialAlreadyFailed(ctx)) return ctx;

    const resultCtx = shortForm(withTrialBudget(ctx, maxWidth, startColumn));
    const mode = resultCtx.writerModel.mode;

    if (mode.type !== 'TRIAL' || trialHasFailed(mode, ctx.config.maxLineLength, resultCtx.writerModel.column)) {
      return longForm(ctx);
    }
    return { ...resultCtx, writerModel: { ...resultCtx.writerModel, mode: ctx.writerModel.mode } };
  };
}

export function isShortExpression(maxWidth: number, shortExpression: Printer, fallback: Printer): Printer {
  return tryCompact(maxWidth, undefined, shortExpression, fallback);
}

export function isShortExpressionOrAddIndentAndNewline(maxWidth: number, expr: Printer): Printer {
  return tryCompact(maxWidth, undefined, expr, indentSepNlnUnindent(expr));
}

export function sepSpaceIfShortExpressionOrAddIndentAndNewline(maxWidth: number, expr: Printer): Printer {
  return tryCompact(maxWidth, undefined, seq(sepSpace, expr), indentSepNlnUnindent(expr));
}

/** Fits when the line stays within the page width. */
export function expressionFitsOnRestOfLine(expr: Printer, fallback: Printer): Printer {
  return ctx => tryCompact(ctx.config.maxLineLength, 0, expr, fallback)(ctx);
}

// ============================================================================
// Size Thresholds
// ============================================================================

export type Size =
  | { type: 'CHARACTER_WIDTH'; maxWidth: number }
  | { type: 'NUMBER_OF_ITEMS'; items: number; maxItems: number };

export function getListOrArrayExprSize(ctx: Context, maxWidth: number, items: readonly unknown[]): Size {
  return ctx.config.arrayOrListMultilineFormatter === 'number_of_items'
    ? { type: 'NUMBER_OF_ITEMS', items: items.length, maxItems: ctx.config.maxArrayOrListNumberOfItems }
    : { type: 'CHARACTER_WIDTH', maxWidth };
}

export function getRecordSize(ctx: Context, fields: readonly unknown[]): Size {
  return ctx.config.recordMultilineFormatter === 'number_of_items'
    ? { type: 'NUMBER_OF_ITEMS', items: fields.length, maxItems: ctx.config.maxRecordNumberOfItems }
    : { type: 'CHARACTER_WIDTH', maxWidth: ctx.config.maxRecordWidth };
}

/** Small by width, or by item count and then by page width. */
export function isSmallExpression(size: Size, smallExpression: Printer, fallback: Printer): Printer {
  switch (size.type) {
    case 'CHARACTER_WIDTH':
      return isShortExpression(size.maxWidth, smallExpression, fallback);
    case 'NUMBER_OF_ITEMS':
      return size.items > size.maxItems ? fallback : expressionFitsOnRestOfLine(smallExpression, fallback);
  }
}

// ============================================================================
// Page Width Fallbacks
// ============================================================================

/**
 * Surround `expr` with the short or the long decoration depending on whether
 * it fits on the rest of the line. Inside an outstanding trial only the short
 * form is tried; the outer trial makes the decision.
 */
export function expressionExceedsPageWidth(
  beforeShort: Printer,
  afterShort: Printer,
  beforeLong: Printer,
  afterLong: Printer,
  expr: Printer
): Printer {
  return ctx => {
    if (trialAlreadyFailed(ctx)) return ctx;

    const shortForm = seq(beforeShort, expr, afterShort);
    if (ctx.writerModel.mode.type === 'TRIAL') return shortForm(ctx);

    return tryCompact(ctx.config.maxLineLength, 0, shortForm, seq(beforeLong, expr, afterLong))(ctx);
  };
}

/** Rest of the line, or indented on a new line. */
export function autoIndentAndNlnIfExpressionExceedsPageWidth(expr: Printer): Printer {
  return expressionExceedsPageWidth(sepNone, sepNone, seq(indent, sepNln), unindent, expr);
}

export function sepSpaceOrIndentAndNlnIfExpressionExceedsPageWidth(expr: Printer): Printer {
  return expressionExceedsPageWidth(sepSpace, sepNone, seq(indent, sepNln), unindent, expr);
}

export function sepSpaceOrDoubleIndentAndNlnIfExpressionExceedsPageWidth(expr: Printer): Printer {
  return expressionExceedsPageWidth(sepSpace, sepNone, seq(indent, indent, sepNln), seq(unindent, unindent), expr);
}

export function sepSpaceWhenOrIndentAndNlnIfExpressionExceedsPageWidth(
  addSpace: (ctx: Context) => boolean,
  expr: Printer
): Printer {
  return expressionExceedsPageWidth(ifElseCtx(addSpace, sepSpace, sepNone), sepNone, seq(indent, sepNln), unindent, expr);
}

export function autoNlnIfExpressionExceedsPageWidth(expr: Printer): Printer {
  return expressionExceedsPageWidth(sepNone, sepNone, sepNln, sepNone, expr);
}

export function autoParenthesisIfExpressionExceedsPageWidth(expr: Printer): Printer {
  return expressionFitsOnRestOfLine(expr, seq(sepOpenT, expr, sepCloseT));
}

/** Like `autoNlnIfExpressionExceedsPageWidth` with a trivia-aware break. */
export function autoNlnConsideringTriviaIfExpressionExceedsPageWidth(
  sepNlnConsideringTriviaContentBefore: Printer,
  expr: Printer
): Printer {
  return expressionExceedsPageWidth(sepNone, sepNone, sepNlnConsideringTriviaContentBefore, sepNone, expr);
}

/** Like `coli`, but every item after the first moves to a new line when it does not fit. */
export function colAutoNlnSkip0i<T>(
  separator: Printer,
  items: Iterable<T>,
  f: (index: number, item: T) => Printer
): Printer {
  return coli(separator, items, (index, item) =>
    index === 0 ? f(index, item) : autoNlnIfExpressionExceedsPageWidth(f(index, item))
  );
}

export function colAutoNlnSkip0<T>(separator: Printer, items: Iterable<T>, f: (item: T) => Printer): Printer {
  return colAutoNlnSkip0i(separator, items, (_index, item) => f(item));
}

// ============================================================================
// Measurement Lookahead
// ============================================================================

/**
 * Would `f` break a line or run past the page width? Always false while
 * already measuring.
 */
export function futureNlnCheck(f: Printer, ctx: Context): boolean {
  if (ctx.writerModel.mode.type === 'MEASUREMENT') return false;

  const measured = measure(ctx, f, true);
  return containsBreak(measured.writerEvents.reversed()) || measured.writerModel.column > ctx.config.maxLineLength;
}

/** Would `f` break a line, or grow the line by more than `maxWidth`? */
export function exceedsWidth(maxWidth: number, f: Printer, ctx: Context): boolean {
  const dummy = withMeasurement(ctx, true);
  const linesBefore = lineCount(dummy.writerModel);
  const columnBefore = dummy.writerModel.column;
  const after = f(dummy);

  return (
    lineCount(after.writerModel) > linesBefore ||
    after.writerModel.column - columnBefore > maxWidth ||
    columnBefore > ctx.config.maxLineLength
  );
}

// ============================================================================
// Leading Expressions
// ============================================================================

export interface WriterPosition {
  lineCount: number;
  column: number;
}

function positionOf(ctx: Context): WriterPosition {
  return { lineCount: lineCount(ctx.writerModel), column: ctx.writerModel.column };
}

/** Hand the position before and after `leading` to the continuation. */
export function leadingExpressionResult(
  leading: Printer,
  continuation: (before: WriterPosition, after: WriterPosition) => Printer
): Printer {
  return ctx => {
    const before = positionOf(ctx);
    const afterLeading = leading(ctx);
    return continuation(before, positionOf(afterLeading))(afterLeading);
  };
}

/** Tell the continuation whether `leading` broke a line or grew past `threshold`. */
export function leadingExpressionLong(
  threshold: number,
  leading: Printer,
  continuation: (isLong: boolean) => Printer
): Printer {
  return leadingExpressionResult(leading, (before, after) =>
    continuation(after.lineCount > before.lineCount || after.column - before.column > threshold)
  );
}

/**
 * `#if FOO` / blank / `#endif` with nothing between the directives.
 */
function isEmptyDirectiveBlock(chunk: readonly WriterEvent[]): boolean {
  if (chunk.length < 2) return false;
  if (!isCommentOrDirective(chunk[0]) || !isCommentOrDirective(chunk[chunk.length - 1])) return false;
  return chunk
    .slice(1, -1)
    .every(
      event =>
        event.type === 'BREAK_LINE_IN_STRING_LITERAL' ||
        event.type === 'BREAK_LINE_IN_TRIVIA' ||
        (event.type === 'WRITE_TEXT' && event.text === '')
    );
}

/**
 * Look at what was appended to the log since it had `fromIndex` events: skip
 * the leading chunks matching `skipLeading`, then check the rest for an event
 * matching `isBreak`.
 */
export function breaksAfter(
  ctx: Context,
  fromIndex: number,
  isBreak: (event: WriterEvent) => boolean,
  skipLeading: (chunk: readonly WriterEvent[]) => boolean
): boolean {
  const chunks = ctx.writerEvents.chunksFrom(fromIndex);
  let start = 0;
  while (start < chunks.length && skipLeading(chunks[start])) start++;
  return chunks.slice(start).some(chunk => chunk.some(isBreak));
}

/**
 * A leading expression preceded only by a comment, a blank line or an empty
 * directive block does not count as multiline.
 *
 * let a = 7
 * // foo
 * let b = 8   <- not multiline
 */
export function leadingExpressionIsMultiline(leading: Printer, continuation: (isMultiline: boolean) => Printer): Printer {
  return ctx => {
    const eventCountBefore = ctx.writerEvents.length;
    const afterLeading = leading(ctx);
    const isMultiline = breaksAfter(
      afterLeading,
      eventCountBefore,
      event => event.type === 'BREAK_LINE',
      chunk =>
        (chunk.length === 1 &&
          (isCommentOrDirective(chunk[0]) ||
            chunk[0].type === 'BREAK_LINE' ||
            (chunk[0].type === 'WRITE_TEXT' && chunk[0].text === ''))) ||
        isEmptyDirectiveBlock(chunk)
    );
    return continuation(isMultiline)(afterLeading);
  };
}

/** Break after `leading`, and break once more when it was multiline. */
export function addExtraNewlineIfLeadingWasMultiline(
  leading: Printer,
  sepNlnConsideringTriviaContentBefore: Printer,
  continuation: Printer
): Printer {
  return leadingExpressionIsMultiline(leading, isMultiline =>
    seq(sepNln, onlyIf(isMultiline, sepNlnConsideringTriviaContentBefore), continuation)
  );
}
