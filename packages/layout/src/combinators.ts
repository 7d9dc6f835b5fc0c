/**
 * Combinator algebra — composing printers.
 */

import type { Context, Printer } from './context';
import { atIndentLevel, finalizeWriterModel, forallCharsOnLastLine, writerEvent } from './context';
import { breakLine, writeText } from './events';
import { hasConfirmedOverflow } from './writer-model';

// ============================================================================
// Sequencing
// ============================================================================

/**
 * Run printers left to right. Once a trial budget is confirmed overflowing the
 * remaining steps are skipped: their output would be discarded anyway.
 */
export function seq(...steps: Printer[]): Printer {
  return ctx => {
    let result = ctx;
    for (let i = 0; i < steps.length; i++) {
      if (i > 0 && hasConfirmedOverflow(result.writerModel.mode)) return result;
      result = steps[i](result);
    }
    return result;
  };
}

// ============================================================================
// Text
// ============================================================================

export function text(value: string): Printer {
  return writerEvent(writeText(value));
}

export function str(value: string | number | bigint | boolean): Printer {
  return text(String(value));
}

/** Write `value` on a fresh line unless the current line is still blank. */
export function textOnNewLineUnlessBlank(value: string): Printer {
  return ctx => {
    const lineHasContent = !forallCharsOnLastLine(char => char.trim() === '', ctx);
    const afterBreak = lineHasContent ? writerEvent(breakLine())(ctx) : ctx;
    return text(value)(afterBreak);
  };
}

export function rep(times: number, f: Printer): Printer {
  return ctx => {
    let result = ctx;
    for (let i = 0; i < times; i++) result = f(result);
    return result;
  };
}

/** Pad with spaces up to `targetColumn`, whatever is already on the line. */
export function addFixedSpaces(targetColumn: number): Printer {
  return ctx => {
    const delta = targetColumn - ctx.writerModel.column;
    return delta > 0 ? rep(delta, text(' '))(ctx) : ctx;
  };
}

/**
 * Keep an expression applied to a function further right than the align
 * column; when the cursor is not past it, pad at an absolute level instead of
 * running `f`.
 */
export function indentIfNeeded(f: Printer): Printer {
  return ctx => {
    const savedColumn = ctx.writerModel.alignColumn;
    if (savedColumn < ctx.writerModel.column) {
      return f(ctx);
    }
    const missingSpaces = savedColumn - finalizeWriterModel(ctx).writerModel.column + ctx.config.indentSize;
    return atIndentLevel(true, savedColumn, text(' '.repeat(missingSpaces)))(ctx);
  };
}

// ============================================================================
// Collections
// ============================================================================

/** Print each item with `f`, calling `separator` between two items. */
export function col<T>(separator: Printer, items: Iterable<T>, f: (item: T) => Printer): Printer {
  return coli(separator, items, (_index, item) => f(item));
}

export function coli<T>(separator: Printer, items: Iterable<T>, f: (index: number, item: T) => Printer): Printer {
  return colii(() => separator, items, f);
}

/** Like `coli`, the separator also gets the index of the item that follows it. */
export function colii<T>(
  separator: (index: number) => Printer,
  items: Iterable<T>,
  f: (index: number, item: T) => Printer
): Printer {
  return ctx => {
    let result = ctx;
    let index = 0;
    for (const item of items) {
      if (index > 0) result = separator(index)(result);
      result = f(index, item)(result);
      index++;
    }
    return result;
  };
}

/** Like `col`, the separator also gets the item that follows it. */
export function colEx<T>(separator: (item: T) => Printer, items: Iterable<T>, f: (item: T) => Printer): Printer {
  return ctx => {
    let result = ctx;
    let first = true;
    for (const item of items) {
      if (!first) result = separator(item)(result);
      result = f(item)(result);
      first = false;
    }
    return result;
  };
}

/** `col`, then `after` when there was at least one item. */
export function colPost<T>(after: Printer, separator: Printer, items: readonly T[], f: (item: T) => Printer): Printer {
  return ctx => (items.length === 0 ? ctx : after(col(separator, items, f)(ctx)));
}

/** `before`, then `col`, when there is at least one item. */
export function colPre<T>(before: Printer, separator: Printer, items: readonly T[], f: (item: T) => Printer): Printer {
  return ctx => (items.length === 0 ? ctx : col(separator, items, f)(before(ctx)));
}

export function colPreEx<T>(
  before: Printer,
  separator: (item: T) => Printer,
  items: readonly T[],
  f: (item: T) => Printer
): Printer {
  return ctx => (items.length === 0 ? ctx : colEx(separator, items, f)(before(ctx)));
}

/** `col` wrapped in `start`/`end` when there is more than one item. */
export function colSurr<T>(
  start: Printer,
  end: Printer,
  separator: Printer,
  items: readonly T[],
  f: (item: T) => Printer
): Printer {
  return ctx => {
    if (items.length === 0) return ctx;
    const body = col(separator, items, f);
    return (items.length > 1 ? seq(start, body, end) : body)(ctx);
  };
}

// ============================================================================
// Options & Conditions
// ============================================================================

/** Print a present value with `f`, followed by `after`. */
export function opt<T>(after: Printer, value: T | undefined, f: (value: T) => Printer): Printer {
  return ctx => (value === undefined ? ctx : after(f(value)(ctx)));
}

export function optSingle<T>(f: (value: T) => Printer, value: T | undefined): Printer {
  return ctx => (value === undefined ? ctx : f(value)(ctx));
}

export function optPre<T>(before: Printer, after: Printer, value: T | undefined, f: (value: T) => Printer): Printer {
  return ctx => (value === undefined ? ctx : after(f(value)(before(ctx))));
}

export function ifElse(condition: boolean, whenTrue: Printer, whenFalse: Printer): Printer {
  return condition ? whenTrue : whenFalse;
}

export function ifElseCtx(condition: (ctx: Context) => boolean, whenTrue: Printer, whenFalse: Printer): Printer {
  return ctx => (condition(ctx) ? whenTrue(ctx) : whenFalse(ctx));
}

export function onlyIf(condition: boolean, f: Printer): Printer {
  return condition ? f : ctx => ctx;
}

export function onlyIfCtx(condition: (ctx: Context) => boolean, f: Printer): Printer {
  return ctx => (condition(ctx) ? f(ctx) : ctx);
}

export function onlyIfNot(condition: boolean, f: Printer): Printer {
  return onlyIf(!condition, f);
}

/** Apply `f` only with an indent size below 3. */
export function whenShortIndent(f: Printer): Printer {
  return onlyIfCtx(ctx => ctx.config.indentSize < 3, f);
}

export function ifStroustrupElse(whenStroustrup: Printer, otherwise: Printer): Printer {
  return ifElseCtx(ctx => ctx.config.experimentalStroustrupStyle, whenStroustrup, otherwise);
}

export function ifStroustrup(f: Printer): Printer {
  return ifStroustrupElse(f, ctx => ctx);
}

export function ifAlignBrackets(aligned: Printer, otherwise: Printer): Printer {
  return ifElseCtx(ctx => ctx.config.multilineBlockBracketsOnSameColumn, aligned, otherwise);
}
