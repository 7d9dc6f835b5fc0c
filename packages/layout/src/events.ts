/**
 * Writer events — the closed set of layout instructions.
 *
 * Every combinator ends up appending one of these to the context. A write
 * containing newlines is split into primitive events by `normalize` before it
 * reaches the log.
 */

export type WriterEvent =
  | { readonly type: 'WRITE_TEXT'; readonly text: string }
  | { readonly type: 'BREAK_LINE' }
  /** Break inside a multiline literal: the finished line is kept as written */
  | { readonly type: 'BREAK_LINE_IN_STRING_LITERAL' }
  /** Break inside multiline trivia: the finished line is right-trimmed */
  | { readonly type: 'BREAK_LINE_IN_TRIVIA' }
  /** Held back and appended to the current line once it is broken */
  | { readonly type: 'DEFER_TEXT_UNTIL_BREAK'; readonly text: string }
  /** A regular break that trivia asked for, not the rendered code */
  | { readonly type: 'BREAK_LINE_DUE_TO_TRIVIA' }
  | { readonly type: 'INDENT_BY'; readonly amount: number }
  | { readonly type: 'UNINDENT_BY'; readonly amount: number }
  | { readonly type: 'SET_INDENT'; readonly level: number }
  | { readonly type: 'RESTORE_INDENT'; readonly level: number }
  | { readonly type: 'SET_ALIGN_COLUMN'; readonly column: number }
  | { readonly type: 'RESTORE_ALIGN_COLUMN'; readonly column: number };

export type WriterEventType = WriterEvent['type'];

// ============================================================================
// Constructors
// ============================================================================

const BREAK_LINE: WriterEvent = { type: 'BREAK_LINE' };
const BREAK_LINE_IN_STRING_LITERAL: WriterEvent = { type: 'BREAK_LINE_IN_STRING_LITERAL' };
const BREAK_LINE_IN_TRIVIA: WriterEvent = { type: 'BREAK_LINE_IN_TRIVIA' };
const BREAK_LINE_DUE_TO_TRIVIA: WriterEvent = { type: 'BREAK_LINE_DUE_TO_TRIVIA' };

export const writeText = (text: string): WriterEvent => ({ type: 'WRITE_TEXT', text });
export const breakLine = (): WriterEvent => BREAK_LINE;
export const breakLineInStringLiteral = (): WriterEvent => BREAK_LINE_IN_STRING_LITERAL;
export const breakLineInTrivia = (): WriterEvent => BREAK_LINE_IN_TRIVIA;
export const deferTextUntilBreak = (text: string): WriterEvent => ({ type: 'DEFER_TEXT_UNTIL_BREAK', text });
export const breakLineDueToTrivia = (): WriterEvent => BREAK_LINE_DUE_TO_TRIVIA;
export const indentBy = (amount: number): WriterEvent => ({ type: 'INDENT_BY', amount });
export const unindentBy = (amount: number): WriterEvent => ({ type: 'UNINDENT_BY', amount });
export const setIndent = (level: number): WriterEvent => ({ type: 'SET_INDENT', level });
export const restoreIndent = (level: number): WriterEvent => ({ type: 'RESTORE_INDENT', level });
export const setAlignColumn = (column: number): WriterEvent => ({ type: 'SET_ALIGN_COLUMN', column });
export const restoreAlignColumn = (column: number): WriterEvent => ({ type: 'RESTORE_ALIGN_COLUMN', column });

// ============================================================================
// Classification
// ============================================================================

const COMMENT_OR_DIRECTIVE_PREFIXES = ['//', '(*', '#if', '#else', '#endif'];

export function isCommentOrDirective(event: WriterEvent): boolean {
  return event.type === 'WRITE_TEXT' && COMMENT_OR_DIRECTIVE_PREFIXES.some(prefix => event.text.startsWith(prefix));
}

/** Any of the four line-breaking events. */
export function isBreakVariant(event: WriterEvent): boolean {
  switch (event.type) {
    case 'BREAK_LINE':
    case 'BREAK_LINE_IN_STRING_LITERAL':
    case 'BREAK_LINE_IN_TRIVIA':
    case 'BREAK_LINE_DUE_TO_TRIVIA':
      return true;
    default:
      return false;
  }
}

/** Whether the rendering broke a line with a regular (non-literal) break. */
export function containsBreak(events: Iterable<WriterEvent>): boolean {
  for (const event of events) {
    if (event.type === 'BREAK_LINE' || event.type === 'BREAK_LINE_DUE_TO_TRIVIA') return true;
  }
  return false;
}

// ============================================================================
// Normalization
// ============================================================================

export function normalize(event: WriterEvent): WriterEvent[] {
  if (event.type !== 'WRITE_TEXT' || !event.text.includes('\n')) {
    return [event];
  }

  // Literals from the source may carry \r; output line endings are applied at dump time
  const lineBreak = isCommentOrDirective(event) ? breakLineInTrivia() : breakLineInStringLiteral();
  const parts = event.text.replace(/\r/g, '').split('\n');

  const events: WriterEvent[] = [];
  parts.forEach((part, index) => {
    if (index > 0) events.push(lineBreak);
    events.push(writeText(part));
  });
  return events;
}
