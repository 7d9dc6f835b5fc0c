export { LayoutError, NegativeIndentError, LeakedTrialError, ConfigError } from './errors';
export { FormatConfigSchema } from './schemas';
export type { FormatConfigInput } from './schemas';
export { createFormatConfig, parseFormatConfig, DEFAULT_FORMAT_CONFIG, newlineString } from './config';
export { debugLog, isDebugEnabled } from './logger';
