/**
 * Format config construction.
 *
 * Loading options from disk belongs to the caller; this module only validates
 * an in-memory record and fills in defaults.
 */

import type { EndOfLineStyle, FormatConfig } from '@linefold/types';
import { ConfigError } from './errors';
import { FormatConfigSchema, type FormatConfigInput } from './schemas';

export function createFormatConfig(overrides: FormatConfigInput = {}): FormatConfig {
  return parseFormatConfig(overrides);
}

/**
 * Validate an untrusted options record (for example, parsed JSON).
 */
export function parseFormatConfig(raw: unknown): FormatConfig {
  const result = FormatConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    );
  }
  const config: FormatConfig = result.data;
  return Object.freeze(config);
}

export const DEFAULT_FORMAT_CONFIG: FormatConfig = createFormatConfig();

const NEWLINES: Record<EndOfLineStyle, string> = {
  lf: '\n',
  crlf: '\r\n',
  cr: '\r',
};

export function newlineString(endOfLine: EndOfLineStyle): string {
  return NEWLINES[endOfLine];
}
