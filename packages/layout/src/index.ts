export {
  writeText,
  breakLine,
  breakLineInStringLiteral,
  breakLineInTrivia,
  deferTextUntilBreak,
  breakLineDueToTrivia,
  indentBy,
  unindentBy,
  setIndent,
  restoreIndent,
  setAlignColumn,
  restoreAlignColumn,
  normalize,
  isCommentOrDirective,
  isBreakVariant,
  containsBreak,
} from './events';
export type { WriterEvent, WriterEventType } from './events';

export {
  applyEvent,
  applyEvents,
  initialWriterModel,
  isTooLong,
  hasConfirmedOverflow,
  trialHasFailed,
  currentLine,
  lineCount,
  linesOf,
  NORMAL_MODE,
  MEASUREMENT_MODE,
} from './writer-model';
export type { TrialBudget, WriterMode, WriterModel } from './writer-model';

export { AppendLog } from './persistent';

export {
  createContext,
  writerEvent,
  column,
  isMeasurement,
  withMeasurement,
  measure,
  withTrialBudget,
  fromSourceText,
  hasContentBefore,
  hasContentAfter,
  hasPendingSuffix,
  finalizeWriterModel,
  dump,
  dumpAndContinue,
  writeEventsOnLastLine,
  lastWriteEventOnLastLine,
  forallCharsOnLastLine,
  lastWriteEventIsNewline,
  newlineBetweenLastWriteEvent,
  indent,
  unindent,
  incrIndent,
  decrIndent,
  atIndentLevel,
  atCurrentColumn,
  atCurrentColumnWithPrepend,
  atCurrentColumnIndent,
} from './context';
export type { Context, Printer, CreateContextOptions, TriviaByNodeType } from './context';

export * from './combinators';
export * from './separators';
export * from './trial';
export * from './trivia';
export { colWithNlnWhenItemIsMultiline, colWithNlnWhenItemIsMultilineUsingConfig } from './multiline-list';
export type { ColMultilineItem } from './multiline-list';
export { createSourceText, rangeEq } from './source-text';
