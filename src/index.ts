export { transformToken, startsWithVowel } from './transform/token.js';
export { splitTokens, transformLine, splitLines, transformText } from './transform/line.js';
export { DEFAULT_RULES } from './transform/rules.js';
export type { TransformRules } from './transform/rules.js';
export { convertFile } from './pipeline/convert.js';
export type { ConvertOptions, ConversionResult, SourceEncoding } from './pipeline/convert.js';
export { ConverterError, ConverterErrorCode } from './shared/errors.js';
export type { ConverterErrorContext } from './shared/errors.js';
export { loadConfig, rulesFromConfig, defaultConfig, DEFAULT_CONFIG, DEFAULT_CONFIG_PATH } from './config/loader.js';
export type { ConfigResult } from './config/loader.js';
export type { ConverterConfig, LogLevel } from './config/schema.js';
