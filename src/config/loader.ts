// Config loader: reads ~/.config/pig-latin/config.yaml (or an explicit path),
// deep-merges it over DEFAULT_CONFIG and validates the result with zod.
// A missing default file is not an error; a missing explicit file is.
import { readFileSync, existsSync } from 'fs';
import path from 'path';
import os from 'os';
import { parse as parseYaml } from 'yaml';
import { ConverterConfigSchema } from './schema.js';
import type { ConverterConfig } from './schema.js';
import type { TransformRules } from '../transform/rules.js';
import { ConverterError, ConverterErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.config', 'pig-latin', 'config.yaml');

export const DEFAULT_CONFIG: ConverterConfig = {
  rules: {
    vowels: 'aeiou',
    separator: '-',
    vowel_suffix: 'hay',
    consonant_suffix: 'ay',
  },
  encoding: 'utf8',
};

/** A fresh copy of DEFAULT_CONFIG that callers may mutate. */
export function defaultConfig(): ConverterConfig {
  return { ...DEFAULT_CONFIG, rules: { ...DEFAULT_CONFIG.rules } };
}

export interface ConfigResult {
  config: ConverterConfig;
  configPath: string;
  fromFile: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? process.env['PIG_LATIN_CONFIG'] ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    if (configPath !== DEFAULT_CONFIG_PATH) {
      throw new ConverterError(ConverterErrorCode.CONFIG_NOT_FOUND, `Config file not found: ${configPath}`, {
        path: configPath,
      });
    }
    logger.debug({ configPath }, 'No config file found, using defaults');
    return { config: defaultConfig(), configPath, fromFile: false };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConverterError(ConverterErrorCode.INVALID_CONFIG, `Could not read config: ${configPath}`, {
      path: configPath,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  // An empty YAML document parses to null
  if (parsed !== null && parsed !== undefined && !isPlainObject(parsed)) {
    throw new ConverterError(ConverterErrorCode.INVALID_CONFIG, `Config must be a mapping: ${configPath}`, {
      path: configPath,
    });
  }
  const overrides = isPlainObject(parsed) ? parsed : {};

  const result = ConverterConfigSchema.safeParse(deepMerge(defaultConfig(), overrides));
  if (!result.success) {
    throw new ConverterError(ConverterErrorCode.INVALID_CONFIG, `Invalid config: ${configPath}`, {
      path: configPath,
      issues: result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  logger.debug({ configPath }, 'Configuration loaded');
  return { config: result.data, configPath, fromFile: true };
}

export function rulesFromConfig(config: ConverterConfig): TransformRules {
  return {
    vowels: config.rules.vowels,
    separator: config.rules.separator,
    vowelSuffix: config.rules.vowel_suffix,
    consonantSuffix: config.rules.consonant_suffix,
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isPlainObject(aVal) && isPlainObject(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
