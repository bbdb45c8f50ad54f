import { DEFAULT_RULES } from './rules.js';
import type { TransformRules } from './rules.js';
import { transformToken } from './token.js';

const WHITESPACE_RUN = /[ \t\n\v\f\r]+/;
export const LINE_BREAK = /\r\n|\n|\r/;

export function splitTokens(line: string): string[] {
  return line.split(WHITESPACE_RUN).filter(token => token.length > 0);
}

export function transformLine(line: string, rules: TransformRules = DEFAULT_RULES): string {
  return splitTokens(line)
    .map(token => transformToken(token, rules))
    .join(' ');
}

/** Splits the way readline does: a final terminator does not open another line. */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(LINE_BREAK);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

export function transformText(text: string, rules: TransformRules = DEFAULT_RULES): string {
  return splitLines(text)
    .map(line => `${transformLine(line, rules)}\n`)
    .join('');
}
