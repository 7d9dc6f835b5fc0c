/**
 * @linefold/types — Shared type definitions for the layout engine
 *
 * The options record the engine reads, the source ranges trivia is keyed by,
 * and the trivia payloads handed over by the trivia collector.
 */

// ============================================================================
// Configuration
// ============================================================================

export type EndOfLineStyle = 'lf' | 'crlf' | 'cr';

/** How a bracketed construct decides it no longer fits on one line. */
export type MultilineFormatterType = 'character_width' | 'number_of_items';

export interface FormatConfig {
  /** Spaces per indentation level */
  indentSize: number;
  /** Page width */
  maxLineLength: number;
  endOfLine: EndOfLineStyle;

  spaceBeforeColon: boolean;
  spaceAfterComma: boolean;
  spaceBeforeSemicolon: boolean;
  spaceAfterSemicolon: boolean;
  /** `[ a ]` instead of `[a]` */
  spaceAroundDelimiter: boolean;
  spaceBeforeClassConstructor: boolean;

  /** Closing bracket of a multiline block goes on the column of the opening one */
  multilineBlockBracketsOnSameColumn: boolean;
  blankLinesAroundNestedMultilineExpressions: boolean;
  /** Compact (Stroustrup-style) bracket layout */
  experimentalStroustrupStyle: boolean;
  newlineBetweenTypeDefinitionAndMembers: boolean;

  arrayOrListMultilineFormatter: MultilineFormatterType;
  maxArrayOrListWidth: number;
  maxArrayOrListNumberOfItems: number;
  recordMultilineFormatter: MultilineFormatterType;
  maxRecordWidth: number;
  maxRecordNumberOfItems: number;

  /** Ignore trivia (comments, directives, blank lines) from the source */
  strictMode: boolean;
}

// ============================================================================
// Source Ranges
// ============================================================================

export interface SourcePosition {
  /** 1-based */
  line: number;
  /** 0-based */
  column: number;
}

export interface SourceRange {
  start: SourcePosition;
  end: SourcePosition;
}

export interface SourceText {
  getContentAt(range: SourceRange): string;
}

// ============================================================================
// Trivia
// ============================================================================

export type TriviaContent =
  | { type: 'LINE_COMMENT_AFTER_SOURCE'; text: string }
  | { type: 'BLOCK_COMMENT'; text: string; newlineBefore: boolean; newlineAfter: boolean }
  | { type: 'LINE_COMMENT'; text: string }
  | { type: 'NEWLINE' }
  | { type: 'DIRECTIVE'; text: string };

export interface TriviaInstruction {
  /** Node-type tag the trivia is attached to */
  nodeType: string;
  range: SourceRange;
  /** Printed when entering the node (true) or when leaving it (false) */
  isBefore: boolean;
  content: TriviaContent;
}
