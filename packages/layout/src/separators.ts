/**
 * Separators and tokens — small printers with no trial logic of their own.
 * Spacing variants read their toggles from the options record.
 */

import type { Context, Printer } from './context';
import {
  hasPendingSuffix,
  indent,
  isMeasurement,
  lastWriteEventIsNewline,
  lastWriteEventOnLastLine,
  unindent,
  writerEvent,
} from './context';
import { breakLine, breakLineDueToTrivia } from './events';
import { seq, text } from './combinators';

export const sepNone: Printer = ctx => ctx;
export const sepDot = text('.');

/** A single space, unless the line is empty or already ends in whitespace. */
export function sepSpace(ctx: Context): Context {
  // The measurement log starts empty, so it cannot tell what precedes the cursor
  if (isMeasurement(ctx)) return text(' ')(ctx);

  const last = lastWriteEventOnLastLine(ctx);
  if (last === undefined || last.endsWith(' ') || last.endsWith('\n')) return ctx;
  return text(' ')(ctx);
}

export const sepNln = writerEvent(breakLine());

/** A break introduced by trivia; it does not make the surrounding code multiline. */
export const sepNlnForTrivia = writerEvent(breakLineDueToTrivia());

export function sepNlnUnlessLastEventIsNewline(ctx: Context): Context {
  return lastWriteEventIsNewline(ctx) ? ctx : sepNln(ctx);
}

export function sepNlnUnlessLastEventIsNewlineOrStroustrup(ctx: Context): Context {
  return lastWriteEventIsNewline(ctx) || ctx.config.experimentalStroustrupStyle ? ctx : sepNln(ctx);
}

export const sepStar = seq(sepSpace, text('* '));
export const sepStarFixed = text('* ');
export const sepEq = text(' =');
export const sepEqFixed = text('=');
export const sepArrow = text(' -> ');
export const sepArrowFixed = text('->');
export const sepArrowRev = text(' <- ');
export const sepWild = text('_');
export const sepBar = text('| ');

export const wordAnd = seq(sepSpace, text('and '));
export const wordAndFixed = text('and');
export const wordOr = seq(sepSpace, text('or '));
export const wordOf = seq(sepSpace, text('of '));

// ============================================================================
// Punctuation
// ============================================================================

export function sepColon(ctx: Context): Context {
  const spaced = ctx.config.spaceBeforeColon ? text(' : ') : text(': ');
  if (isMeasurement(ctx)) return spaced(ctx);

  const last = lastWriteEventOnLastLine(ctx);
  if (last === undefined || last.endsWith(' ')) return text(': ')(ctx);
  return spaced(ctx);
}

export const sepColonFixed = text(':');
export const sepColonWithSpacesFixed = text(' : ');

export function sepComma(ctx: Context): Context {
  return text(ctx.config.spaceAfterComma ? ', ' : ',')(ctx);
}

export const sepCommaFixed = text(',');

export function sepSemi(ctx: Context): Context {
  const before = ctx.config.spaceBeforeSemicolon ? ' ' : '';
  const after = ctx.config.spaceAfterSemicolon ? ' ' : '';
  return text(`${before};${after}`)(ctx);
}

export function sepSpaceBeforeClassConstructor(ctx: Context): Context {
  return ctx.config.spaceBeforeClassConstructor ? sepSpace(ctx) : ctx;
}

// ============================================================================
// Brackets
// ============================================================================

function delimiter(bracket: string, side: 'open' | 'close'): Printer {
  return ctx => {
    if (!ctx.config.spaceAroundDelimiter) return text(bracket)(ctx);
    return text(side === 'open' ? `${bracket} ` : ` ${bracket}`)(ctx);
  };
}

/** List brackets */
export const sepOpenL = delimiter('[', 'open');
export const sepCloseL = delimiter(']', 'close');
export const sepOpenLFixed = text('[');
export const sepCloseLFixed = text(']');

/** Array brackets */
export const sepOpenA = delimiter('[|', 'open');
export const sepCloseA = delimiter('|]', 'close');
export const sepOpenAFixed = text('[|');
export const sepCloseAFixed = text('|]');

/** Record and sequence braces */
export const sepOpenS = delimiter('{', 'open');
export const sepCloseS = delimiter('}', 'close');
export const sepOpenSFixed = text('{');
export const sepCloseSFixed = text('}');

/** Anonymous record braces */
export const sepOpenAnonRecd = delimiter('{|', 'open');
export const sepCloseAnonRecd = delimiter('|}', 'close');
export const sepOpenAnonRecdFixed = text('{|');
export const sepCloseAnonRecdFixed = text('|}');

/** Tuple parentheses */
export const sepOpenT = text('(');
export const sepCloseT = text(')');

// ============================================================================
// Indentation & Deferred Text
// ============================================================================

export function indentSepNlnUnindent(f: Printer): Printer {
  return seq(indent, sepNln, f, unindent);
}

/** Break when a trailing comment is waiting, else run `fallback`. */
export function sepNlnWhenPendingSuffix(fallback: Printer): Printer {
  return ctx => (hasPendingSuffix(ctx) ? sepNln(ctx) : fallback(ctx));
}

export function sepSpaceUnlessPendingSuffix(ctx: Context): Context {
  return hasPendingSuffix(ctx) ? ctx : sepSpace(ctx);
}

export function autoIndentAndNlnWhenPendingSuffix(f: Printer): Printer {
  return ctx => (hasPendingSuffix(ctx) ? indentSepNlnUnindent(f)(ctx) : f(ctx));
}
