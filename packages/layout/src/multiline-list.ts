/**
 * Multiline-aware list joining.
 *
 * A blank line goes around every item whose own rendering breaks a line; two
 * single-line neighbours stay on consecutive lines. The first item never gets
 * a leading blank line.
 *
 *   let a = AAAA
 *
 *   let b =
 *       BBBB
 *       BBBB
 *
 *   let c = CCCC
 */

import type { Context, Printer } from './context';
import { newlineBetweenLastWriteEvent } from './context';
import { isCommentOrDirective } from './events';
import { col, ifElseCtx, seq } from './combinators';
import { sepNln, sepNone } from './separators';
import { breaksAfter } from './trial';

export interface ColMultilineItem {
  /** Renders the item; may run twice */
  expr: Printer;
  /** Break that separates this item from the previous one */
  sepNln: Printer;
}

/**
 * Render `expr` and report whether the user's code in it broke a line. Leading
 * comments and breaks are not counted, nor are breaks added for trivia.
 */
function renderItem(expr: Printer, ctx: Context): { isMultiline: boolean; ctx: Context } {
  const eventCountBefore = ctx.writerEvents.length;
  const next = expr(ctx);
  const isMultiline = breaksAfter(
    next,
    eventCountBefore,
    event => event.type === 'BREAK_LINE' || event.type === 'BREAK_LINE_IN_STRING_LITERAL',
    chunk =>
      chunk.length > 0 &&
      (isCommentOrDirective(chunk[0]) || chunk[0].type === 'BREAK_LINE' || chunk[0].type === 'BREAK_LINE_DUE_TO_TRIVIA')
  );
  return { isMultiline, ctx: next };
}

export function colWithNlnWhenItemIsMultiline(items: readonly ColMultilineItem[]): Printer {
  return ctx => {
    if (items.length === 0) return ctx;
    if (items.length === 1) return items[0].expr(ctx);

    const initial = renderItem(items[0].expr, ctx);
    let current = initial.ctx;
    let lastWasMultiline = initial.isMultiline;

    for (const item of items.slice(1)) {
      // Assume a blank line is needed; replaying two single-line items is cheaper
      const afterBreak = seq(
        ifElseCtx(newlineBetweenLastWriteEvent, sepNone, sepNln),
        item.sepNln
      )(current);
      const rendered = renderItem(item.expr, afterBreak);

      current = !rendered.isMultiline && !lastWasMultiline
        ? seq(item.sepNln, item.expr)(current)
        : rendered.ctx;
      lastWasMultiline = rendered.isMultiline;
    }

    return current;
  };
}

/** Plain breaks between items when blank lines around multiline items are turned off. */
export function colWithNlnWhenItemIsMultilineUsingConfig(items: readonly ColMultilineItem[]): Printer {
  return ctx =>
    ctx.config.blankLinesAroundNestedMultilineExpressions
      ? colWithNlnWhenItemIsMultiline(items)(ctx)
      : col(sepNln, items, item => item.expr)(ctx);
}
