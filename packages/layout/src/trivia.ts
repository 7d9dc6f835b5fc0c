/**
 * Trivia printing — splices comments, directives and blank lines collected
 * from the source into the output at node entry and exit.
 */

import type { SourceRange, TriviaContent, TriviaInstruction } from '@linefold/types';
import type { Context, Printer, TriviaByNodeType } from './context';
import { hasContentBefore, writerEvent } from './context';
import { deferTextUntilBreak } from './events';
import { col, ifElse, seq, text } from './combinators';
import { sepNln, sepNlnForTrivia, sepNone, sepSpace } from './separators';
import { rangeEq } from './source-text';

export function printTriviaContent(content: TriviaContent): Printer {
  return ctx => {
    const lastLine = ctx.writerModel.lines.head;
    // Directives and blank lines must start on their own line
    const addNewline = lastLine.trim().length > 0;
    const addSpace = lastLine.length > 0 && !lastLine.endsWith(' ');

    switch (content.type) {
      case 'LINE_COMMENT_AFTER_SOURCE':
        return writerEvent(deferTextUntilBreak(`${addSpace ? ' ' : ''}${content.text}`))(ctx);
      case 'BLOCK_COMMENT':
        return seq(
          ifElse(content.newlineBefore && addNewline, sepNlnForTrivia, sepNone),
          sepSpace,
          text(content.text),
          sepSpace,
          ifElse(content.newlineAfter, sepNlnForTrivia, sepNone)
        )(ctx);
      case 'NEWLINE':
        return ifElse(addNewline, seq(sepNlnForTrivia, sepNlnForTrivia), sepNlnForTrivia)(ctx);
      case 'DIRECTIVE':
      case 'LINE_COMMENT':
        return seq(ifElse(addNewline, sepNlnForTrivia, sepNone), text(content.text), sepNlnForTrivia)(ctx);
    }
  };
}

export function printTriviaInstructions(instructions: readonly TriviaInstruction[]): Printer {
  return col(sepNone, instructions, instruction => printTriviaContent(instruction.content));
}

function printTriviaAt(table: (ctx: Context) => TriviaByNodeType, nodeType: string, range: SourceRange): Printer {
  return ctx => {
    const matching = (table(ctx).get(nodeType) ?? []).filter(instruction => rangeEq(instruction.range, range));
    return matching.length === 0 ? ctx : printTriviaInstructions(matching)(ctx);
  };
}

/** Print the trivia recorded before the node with this type and range. */
export function enterNode(nodeType: string, range: SourceRange): Printer {
  return printTriviaAt(ctx => ctx.triviaBefore, nodeType, range);
}

/** Print the trivia recorded after the node with this type and range. */
export function leaveNode(nodeType: string, range: SourceRange): Printer {
  return printTriviaAt(ctx => ctx.triviaAfter, nodeType, range);
}

/** Run `separator` unless the node has trivia of its own to print first. */
export function sepConsideringTriviaContentBefore(separator: Printer, nodeType: string, range: SourceRange): Printer {
  return ctx => (hasContentBefore(ctx, nodeType, range) ? ctx : separator(ctx));
}

export function sepNlnConsideringTriviaContentBefore(nodeType: string, range: SourceRange): Printer {
  return sepConsideringTriviaContentBefore(sepNln, nodeType, range);
}

/**
 * Between a type definition and its members: trivia before the `with` keyword
 * wins, otherwise a blank line when the options ask for one.
 */
export function sepNlnTypeAndMembers(
  withKeywordNodeType: string,
  withKeywordRange: SourceRange | undefined,
  firstMemberRange: SourceRange,
  mainNodeType: string
): Printer {
  return ctx => {
    const triviaBeforeWithKeyword =
      withKeywordRange === undefined
        ? []
        : (ctx.triviaBefore.get(withKeywordNodeType) ?? []).filter(instruction =>
            rangeEq(instruction.range, withKeywordRange)
          );

    if (triviaBeforeWithKeyword.length > 0) {
      return printTriviaInstructions(triviaBeforeWithKeyword)(ctx);
    }
    if (ctx.config.newlineBetweenTypeDefinitionAndMembers) {
      return sepNlnConsideringTriviaContentBefore(mainNodeType, firstMemberRange)(ctx);
    }
    return ctx;
  };
}
