import { DEFAULT_RULES } from './rules.js';
import type { TransformRules } from './rules.js';

// First code point, not first UTF-16 unit: an emoji or astral letter moves as a whole.
function firstCharacter(token: string): string {
  const codePoint = token.codePointAt(0);
  return codePoint === undefined ? '' : String.fromCodePoint(codePoint);
}

/** Case folding is ASCII-only; accented vowels take the consonant branch. */
export function startsWithVowel(token: string, rules: TransformRules = DEFAULT_RULES): boolean {
  const first = firstCharacter(token);
  const folded = /^[A-Z]$/.test(first) ? first.toLowerCase() : first;
  return folded.length === 1 && rules.vowels.includes(folded);
}

/**
 * Rewrites one whitespace-free token.
 *
 * `apple` becomes `apple-hay`, `hello` becomes `ello-hay`, and a lone
 * consonant keeps its empty remainder: `y` becomes `-yay`. Attached
 * punctuation is part of the token.
 */
export function transformToken(token: string, rules: TransformRules = DEFAULT_RULES): string {
  if (startsWithVowel(token, rules)) {
    return `${token}${rules.separator}${rules.vowelSuffix}`;
  }
  const first = firstCharacter(token);
  return `${token.slice(first.length)}${rules.separator}${first}${rules.consonantSuffix}`;
}
