import { z } from 'zod';
import { ConfigError } from './errors';
import type { ColorFilter, RgbColor } from './types';
import type { LogFormat, LogLevel } from './utils/logger';

export const DEFAULT_PLACEHOLDER_PATTERN = '\\{\\{.*?\\}\\}';

const hexColor = z
  .string()
  .regex(/^#?[0-9a-fA-F]{6}$/, 'Expected a #rrggbb color');

const envSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT: z.enum(['json', 'pretty']).default('pretty'),
  TEMPLATE_PLACEHOLDER_PATTERN: z
    .string()
    .min(1)
    .refine(isValidRegex, 'Not a valid regular expression')
    .default(DEFAULT_PLACEHOLDER_PATTERN),
  TEMPLATE_TEXT_COLOR: hexColor.default('#000000'),
  TEMPLATE_FILTER_COLOR: z.enum(['red']).default('red'),
});

export interface TemplateConfig {
  logLevel: LogLevel;
  logFormat: LogFormat;
  placeholderPattern: string;
  textColor: RgbColor;
  filterColor: ColorFilter;
}

function isValidRegex(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

export function parseHexColor(hex: string): RgbColor {
  const clean = hex.replace(/^#/, '');
  return {
    r: parseInt(clean.slice(0, 2), 16) / 255,
    g: parseInt(clean.slice(2, 4), 16) / 255,
    b: parseInt(clean.slice(4, 6), 16) / 255,
  };
}

/**
 * Read configuration from environment variables. Unset and empty values fall
 * back to defaults; anything else that fails validation raises ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TemplateConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, parsed.error.issues);
  }
  const cfg = parsed.data;
  return {
    logLevel: cfg.LOG_LEVEL,
    logFormat: cfg.LOG_FORMAT,
    placeholderPattern: cfg.TEMPLATE_PLACEHOLDER_PATTERN,
    textColor: parseHexColor(cfg.TEMPLATE_TEXT_COLOR),
    filterColor: cfg.TEMPLATE_FILTER_COLOR,
  };
}
