import type { FormatConfigInput } from '@linefold/core';
import { createFormatConfig } from '@linefold/core';
import type { Context, Printer } from '../context';
import { createContext, dump } from '../context';

export function ctxWith(overrides: FormatConfigInput = {}): Context {
  return createContext(createFormatConfig(overrides));
}

export function render(printer: Printer, overrides: FormatConfigInput = {}): string {
  return dump(printer(ctxWith(overrides)));
}
