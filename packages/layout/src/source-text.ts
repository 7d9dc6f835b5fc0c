/**
 * Source text access and range comparison for trivia lookup.
 */

import type { SourceRange, SourceText } from '@linefold/types';

export function rangeEq(a: SourceRange, b: SourceRange): boolean {
  return (
    a.start.line === b.start.line &&
    a.start.column === b.start.column &&
    a.end.line === b.end.line &&
    a.end.column === b.end.column
  );
}

/**
 * Wrap a source string. Lines are 1-based, columns 0-based, and the end
 * column is exclusive.
 */
export function createSourceText(source: string): SourceText {
  const lines = source.replace(/\r\n/g, '\n').split('\n');
  const lineAt = (line: number): string => lines[line - 1] ?? '';

  return {
    getContentAt(range: SourceRange): string {
      const { start, end } = range;
      if (end.line < start.line) return '';
      if (start.line === end.line) {
        return lineAt(start.line).slice(start.column, end.column);
      }
      const parts = [lineAt(start.line).slice(start.column)];
      for (let line = start.line + 1; line < end.line; line++) {
        parts.push(lineAt(line));
      }
      parts.push(lineAt(end.line).slice(0, end.column));
      return parts.join('\n');
    },
  };
}
