import { describe, it, expect, vi } from 'vitest';
import type { Context } from '../context';
import { dump, withMeasurement, withTrialBudget } from '../context';
import { seq, text } from '../combinators';
import { sepNln, sepSpace } from '../separators';
import {
  addExtraNewlineIfLeadingWasMultiline,
  autoIndentAndNlnIfExpressionExceedsPageWidth,
  autoNlnIfExpressionExceedsPageWidth,
  autoParenthesisIfExpressionExceedsPageWidth,
  colAutoNlnSkip0,
  exceedsWidth,
  expressionFitsOnRestOfLine,
  futureNlnCheck,
  getListOrArrayExprSize,
  getRecordSize,
  isShortExpressionOrAddIndentAndNewline,
  isSmallExpression,
  leadingExpressionIsMultiline,
  leadingExpressionLong,
  leadingExpressionResult,
  sepSpaceOrIndentAndNlnIfExpressionExceedsPageWidth,
  tryCompact,
} from '../trial';
import type { WriterPosition } from '../trial';
import { linesOf } from '../writer-model';
import { ctxWith, render } from './helpers';

describe('tryCompact', () => {
  it('commits the short form and restores the caller mode', () => {
    const ctx = ctxWith();
    const result = tryCompact(20, undefined, text('short'), text('long'))(ctx);
    expect(dump(result)).toBe('short');
    expect(result.writerModel.mode).toBe(ctx.writerModel.mode);
  });

  it('falls back when the short form passes its width', () => {
    const ctx = ctxWith();
    const longForm = seq(sepNln, text('x'));
    const result = tryCompact(10, 0, text('abcdefghijk'), longForm)(ctx);
    expect(result).toEqual(longForm(ctx));
    expect(linesOf(result.writerModel)).toEqual(['', 'x']);
  });

  it('accepts a short form ending exactly on the width', () => {
    expect(render(tryCompact(10, 0, text('abcdefghij'), text('long')))).toBe('abcdefghij');
  });

  it('falls back when the short form breaks a line', () => {
    expect(render(tryCompact(80, undefined, seq(text('a'), sepNln, text('b')), text('long')))).toBe('long');
  });

  it('falls back past the page width whatever the budget', () => {
    expect(render(tryCompact(100, undefined, text('12345678901'), text('short')), { maxLineLength: 10 })).toBe('short');
  });

  it('discards the whole trial log on fallback', () => {
    const ctx = text('x = ')(ctxWith());
    const result = tryCompact(3, undefined, seq(text('aa'), text('bb')), text('c'))(ctx);
    expect(result.writerEvents.length).toBe(ctx.writerEvents.length + 1);
    expect(dump(result)).toBe('x = c');
  });

  it('lets a nested trial fall back inside a successful outer trial', () => {
    const printer = tryCompact(20, undefined, seq(text('a'), tryCompact(2, undefined, text('bbbb'), text('c'))), text('L'));
    const result = printer(ctxWith());
    expect(dump(result)).toBe('ac');
    expect(result.writerModel.mode).toEqual({ type: 'NORMAL' });
  });

  it('skips a nested trial once the outer one is lost', () => {
    const inner = vi.fn((ctx: Context) => text('x')(ctx));
    const printer = tryCompact(3, 0, seq(text('abcd'), tryCompact(10, undefined, inner, text('y'))), text('L'));
    expect(render(printer)).toBe('L');
    expect(inner).not.toHaveBeenCalled();
  });

  it('stops composed steps after a confirmed overflow', () => {
    const next = vi.fn((ctx: Context) => ctx);
    expect(render(tryCompact(10, undefined, seq(sepNln, next), text('long')))).toBe('long');
    expect(next).not.toHaveBeenCalled();
  });

  it('does nothing inside a trial that already overflowed', () => {
    const doomed = sepNln(withTrialBudget(ctxWith(), 10));
    expect(tryCompact(10, undefined, text('a'), text('b'))(doomed)).toBe(doomed);
  });
});

describe('isShortExpressionOrAddIndentAndNewline', () => {
  it('indents the expression on a new line when too wide', () => {
    const printer = seq(text('let x ='), isShortExpressionOrAddIndentAndNewline(3, text(' 12345')));
    expect(render(printer)).toBe('let x =\n     12345');
  });
});

describe('isSmallExpression', () => {
  it('uses the fallback when there are too many items', () => {
    const small = vi.fn((ctx: Context) => text('small')(ctx));
    expect(render(isSmallExpression({ type: 'NUMBER_OF_ITEMS', items: 3, maxItems: 1 }, small, text('big')))).toBe('big');
    expect(small).not.toHaveBeenCalled();
  });

  it('checks the page width when the item count is allowed', () => {
    expect(render(isSmallExpression({ type: 'NUMBER_OF_ITEMS', items: 1, maxItems: 1 }, text('small'), text('big')))).toBe('small');
    expect(
      render(isSmallExpression({ type: 'NUMBER_OF_ITEMS', items: 1, maxItems: 1 }, text('small'), text('big')), { maxLineLength: 4 })
    ).toBe('big');
  });

  it('checks the character width', () => {
    expect(render(isSmallExpression({ type: 'CHARACTER_WIDTH', maxWidth: 4 }, text('small'), text('big')))).toBe('big');
  });
});

describe('size thresholds', () => {
  it('reads the list and record formatter from config', () => {
    expect(getListOrArrayExprSize(ctxWith(), 30, [1, 2])).toEqual({ type: 'CHARACTER_WIDTH', maxWidth: 30 });
    expect(getListOrArrayExprSize(ctxWith({ arrayOrListMultilineFormatter: 'number_of_items' }), 30, [1, 2])).toEqual({
      type: 'NUMBER_OF_ITEMS',
      items: 2,
      maxItems: 1,
    });
    expect(getRecordSize(ctxWith(), ['a'])).toEqual({ type: 'CHARACTER_WIDTH', maxWidth: 40 });
    expect(getRecordSize(ctxWith({ recordMultilineFormatter: 'number_of_items', maxRecordNumberOfItems: 3 }), ['a'])).toEqual({
      type: 'NUMBER_OF_ITEMS',
      items: 1,
      maxItems: 3,
    });
  });
});

describe('page width fallbacks', () => {
  it('keeps the expression on the line when it fits', () => {
    const printer = seq(text('let x ='), sepSpaceOrIndentAndNlnIfExpressionExceedsPageWidth(text('1234567')));
    expect(render(printer, { maxLineLength: 20 })).toBe('let x = 1234567');
  });

  it('indents the expression on a new line when it does not', () => {
    const printer = seq(text('let x ='), sepSpaceOrIndentAndNlnIfExpressionExceedsPageWidth(text('1234567')));
    expect(render(printer, { maxLineLength: 10 })).toBe('let x =\n    1234567');
  });

  it('restores the indent after the long form', () => {
    const ctx = seq(text('let x ='), autoIndentAndNlnIfExpressionExceedsPageWidth(text('1234567')))(ctxWith({ maxLineLength: 10 }));
    expect(dump(ctx)).toBe('let x =\n    1234567');
    expect(ctx.writerModel.indent).toBe(0);
  });

  it('only runs the short form inside an outstanding trial', () => {
    const trial = withTrialBudget(ctxWith(), 100);
    const result = autoNlnIfExpressionExceedsPageWidth(text('x'))(trial);
    expect(linesOf(result.writerModel)).toEqual(['x']);
    expect(result.writerModel.mode.type).toBe('TRIAL');
  });

  it('parenthesizes an expression that does not fit', () => {
    expect(render(seq(text('abcdefgh'), autoParenthesisIfExpressionExceedsPageWidth(text('xyz'))), { maxLineLength: 10 })).toBe(
      'abcdefgh(xyz)'
    );
    expect(render(seq(text('abc'), autoParenthesisIfExpressionExceedsPageWidth(text('xyz'))), { maxLineLength: 10 })).toBe('abcxyz');
  });

  it('measures the rest of the line from column 0', () => {
    expect(render(seq(text('abcdef'), expressionFitsOnRestOfLine(text('ghij'), text('!'))), { maxLineLength: 10 })).toBe('abcdefghij');
    expect(render(seq(text('abcdef'), expressionFitsOnRestOfLine(text('ghijk'), text('!'))), { maxLineLength: 10 })).toBe('abcdef!');
  });

  it('moves items after the first to a new line when they do not fit', () => {
    const printer = colAutoNlnSkip0(sepSpace, ['aaaa', 'bbbb', 'cccc'], item => text(item));
    expect(render(printer, { maxLineLength: 10 })).toBe('aaaa bbbb\ncccc');
  });
});

describe('measurement lookahead', () => {
  it('reports a future line break', () => {
    expect(futureNlnCheck(seq(text('a'), sepNln), ctxWith())).toBe(true);
    expect(futureNlnCheck(text('a'), ctxWith())).toBe(false);
  });

  it('reports a line past the page width', () => {
    expect(futureNlnCheck(text('abcdef'), ctxWith({ maxLineLength: 5 }))).toBe(true);
    expect(futureNlnCheck(text('abcde'), ctxWith({ maxLineLength: 5 }))).toBe(false);
  });

  it('is false while already measuring', () => {
    expect(futureNlnCheck(sepNln, withMeasurement(ctxWith()))).toBe(false);
  });

  it('compares the growth of the line against a width', () => {
    const ctx = text('xx')(ctxWith());
    expect(exceedsWidth(3, text('abcd'), ctx)).toBe(true);
    expect(exceedsWidth(4, text('abcd'), ctx)).toBe(false);
    expect(exceedsWidth(100, seq(text('a'), sepNln), ctx)).toBe(true);
  });

  it('leaves the context untouched', () => {
    const ctx = text('xx')(ctxWith());
    futureNlnCheck(seq(text('a'), sepNln), ctx);
    exceedsWidth(1, text('abc'), ctx);
    expect(linesOf(ctx.writerModel)).toEqual(['xx']);
    expect(ctx.writerEvents.length).toBe(1);
  });
});

describe('leading expressions', () => {
  it('hands positions before and after to the continuation', () => {
    const seen: WriterPosition[] = [];
    const printer = leadingExpressionResult(seq(text('ab'), sepNln, text('c')), (before, after) => ctx => {
      seen.push(before, after);
      return ctx;
    });
    printer(ctxWith());
    expect(seen).toEqual([
      { lineCount: 1, column: 0 },
      { lineCount: 2, column: 1 },
    ]);
  });

  it('flags a leading expression longer than the threshold', () => {
    const mark = (isLong: boolean) => text(isLong ? '!' : '.');
    expect(render(leadingExpressionLong(3, text('abcd'), mark))).toBe('abcd!');
    expect(render(leadingExpressionLong(3, text('ab'), mark))).toBe('ab.');
    expect(render(leadingExpressionLong(3, seq(text('a'), sepNln, text('b')), mark))).toBe('a\nb!');
  });

  it('does not count a leading comment as multiline', () => {
    const mark = (isMultiline: boolean) => text(isMultiline ? ' M' : ' S');
    expect(render(leadingExpressionIsMultiline(seq(text('a'), sepNln, text('b')), mark))).toBe('a\nb M');
    expect(render(leadingExpressionIsMultiline(seq(text('// foo'), sepNln, text('let b = 8')), mark))).toBe('// foo\nlet b = 8 S');
    expect(render(leadingExpressionIsMultiline(text('x'), mark))).toBe('x S');
  });

  it('adds a blank line after a multiline leading expression', () => {
    expect(render(addExtraNewlineIfLeadingWasMultiline(seq(text('a'), sepNln, text('b')), sepNln, text('c')))).toBe('a\nb\n\nc');
    expect(render(addExtraNewlineIfLeadingWasMultiline(text('a'), sepNln, text('c')))).toBe('a\nc');
  });
});
