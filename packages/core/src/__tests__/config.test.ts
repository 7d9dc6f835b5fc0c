import { describe, it, expect } from 'vitest';
import { createFormatConfig, DEFAULT_FORMAT_CONFIG, newlineString, parseFormatConfig } from '../config';
import { ConfigError } from '../errors';

describe('createFormatConfig', () => {
  it('fills every field with its default', () => {
    const config = createFormatConfig();
    expect(config.indentSize).toBe(4);
    expect(config.maxLineLength).toBe(120);
    expect(config.endOfLine).toBe('lf');
    expect(config.spaceAroundDelimiter).toBe(true);
    expect(config.spaceBeforeColon).toBe(false);
    expect(config.arrayOrListMultilineFormatter).toBe('character_width');
    expect(config.maxRecordWidth).toBe(40);
    expect(config.strictMode).toBe(false);
  });

  it('keeps overrides', () => {
    const config = createFormatConfig({ indentSize: 2, maxLineLength: 80, spaceAfterComma: false });
    expect(config.indentSize).toBe(2);
    expect(config.maxLineLength).toBe(80);
    expect(config.spaceAfterComma).toBe(false);
    expect(config.spaceAfterSemicolon).toBe(true);
  });

  it('returns a frozen record', () => {
    expect(Object.isFrozen(createFormatConfig())).toBe(true);
  });

  it('rejects a zero indent size', () => {
    expect(() => createFormatConfig({ indentSize: 0 })).toThrow(ConfigError);
  });

  it('lists each issue with its path', () => {
    try {
      createFormatConfig({ indentSize: 0, maxLineLength: 0 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toEqual([
          'indentSize: indentSize must be at least 1',
          'maxLineLength: maxLineLength must be at least 1',
        ]);
      }
    }
  });

});

describe('parseFormatConfig', () => {
  it('rejects unknown keys', () => {
    expect(() => parseFormatConfig({ pageWidth: 80 })).toThrow(/Invalid format config/);
  });

  it('rejects values of the wrong type', () => {
    expect(() => parseFormatConfig({ endOfLine: 'crlf', indentSize: '4' })).toThrow(ConfigError);
  });

  it('rejects a non-object', () => {
    expect(() => parseFormatConfig(null)).toThrow(ConfigError);
  });
});

describe('DEFAULT_FORMAT_CONFIG', () => {
  it('matches an empty override', () => {
    expect(DEFAULT_FORMAT_CONFIG).toEqual(createFormatConfig({}));
  });
});

describe('newlineString', () => {
  it('maps line-ending styles', () => {
    expect(newlineString('lf')).toBe('\n');
    expect(newlineString('crlf')).toBe('\r\n');
    expect(newlineString('cr')).toBe('\r');
  });
});
