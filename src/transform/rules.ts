export interface TransformRules {
  /** Lowercase ASCII letters that send a token down the vowel branch. */
  vowels: string;
  separator: string;
  vowelSuffix: string;
  consonantSuffix: string;
}

export const DEFAULT_RULES: Readonly<TransformRules> = {
  vowels: 'aeiou',
  separator: '-',
  vowelSuffix: 'hay',
  consonantSuffix: 'ay',
};
