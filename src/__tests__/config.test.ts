/**
 * Unit Tests: Configuration
 */
import { describe, test, expect } from 'vitest';
import { DEFAULT_PLACEHOLDER_PATTERN, loadConfig, parseHexColor } from '../config';
import { ConfigError } from '../errors';

describe('loadConfig', () => {
  test('defaults when nothing is set', () => {
    expect(loadConfig({})).toEqual({
      logLevel: 'info',
      logFormat: 'pretty',
      placeholderPattern: DEFAULT_PLACEHOLDER_PATTERN,
      textColor: { r: 0, g: 0, b: 0 },
      filterColor: 'red',
    });
  });

  test('empty values fall back to defaults', () => {
    expect(loadConfig({ LOG_LEVEL: '' }).logLevel).toBe('info');
  });

  test('reads overrides', () => {
    const cfg = loadConfig({
      LOG_LEVEL: 'debug',
      LOG_FORMAT: 'json',
      TEMPLATE_PLACEHOLDER_PATTERN: '\\[\\[.*?\\]\\]',
      TEMPLATE_TEXT_COLOR: '#ff0000',
    });
    expect(cfg.logLevel).toBe('debug');
    expect(cfg.logFormat).toBe('json');
    expect(cfg.placeholderPattern).toBe('\\[\\[.*?\\]\\]');
    expect(cfg.textColor).toEqual({ r: 1, g: 0, b: 0 });
  });

  test('ignores unrelated variables', () => {
    expect(loadConfig({ HOME: '/home/test' }).logLevel).toBe('info');
  });

  test.each([
    [{ LOG_LEVEL: 'verbose' }],
    [{ TEMPLATE_TEXT_COLOR: 'red' }],
    [{ TEMPLATE_PLACEHOLDER_PATTERN: '([' }],
  ])('rejects %j', (env) => {
    expect(() => loadConfig(env)).toThrow(ConfigError);
  });
});

describe('parseHexColor', () => {
  test('with or without #', () => {
    expect(parseHexColor('#000000')).toEqual({ r: 0, g: 0, b: 0 });
    expect(parseHexColor('00ff00')).toEqual({ r: 0, g: 1, b: 0 });
  });
});
