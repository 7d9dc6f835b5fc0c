/**
 * Zod validation schema for the format options record.
 *
 * Every field has a default, so an empty object parses to the default config.
 */

import { z } from 'zod';

const MultilineFormatterSchema = z.enum(['character_width', 'number_of_items']);

const widthField = (fallback: number) => z.number().int().min(0).default(fallback);

export const FormatConfigSchema = z.object({
  indentSize: z.number().int().min(1, 'indentSize must be at least 1').default(4),
  maxLineLength: z.number().int().min(1, 'maxLineLength must be at least 1').default(120),
  endOfLine: z.enum(['lf', 'crlf', 'cr']).default('lf'),

  spaceBeforeColon: z.boolean().default(false),
  spaceAfterComma: z.boolean().default(true),
  spaceBeforeSemicolon: z.boolean().default(false),
  spaceAfterSemicolon: z.boolean().default(true),
  spaceAroundDelimiter: z.boolean().default(true),
  spaceBeforeClassConstructor: z.boolean().default(false),

  multilineBlockBracketsOnSameColumn: z.boolean().default(false),
  blankLinesAroundNestedMultilineExpressions: z.boolean().default(true),
  experimentalStroustrupStyle: z.boolean().default(false),
  newlineBetweenTypeDefinitionAndMembers: z.boolean().default(true),

  arrayOrListMultilineFormatter: MultilineFormatterSchema.default('character_width'),
  maxArrayOrListWidth: widthField(80),
  maxArrayOrListNumberOfItems: widthField(1),
  recordMultilineFormatter: MultilineFormatterSchema.default('character_width'),
  maxRecordWidth: widthField(40),
  maxRecordNumberOfItems: widthField(1),

  strictMode: z.boolean().default(false),
}).strict();

export type FormatConfigInput = z.input<typeof FormatConfigSchema>;
