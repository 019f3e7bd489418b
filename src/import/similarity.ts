import { stringSimilarity } from 'string-similarity-js';

/**
 * Case-fold, strip diacritics and punctuation, collapse whitespace.
 * "Beyoncé - Halo!" -> "beyonce halo"
 */
export const normalizeString = (str: string): string =>
  str
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '') // combining marks left by NFKD
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();

/**
 * Comparison key for a name. Falls back to the NFKC case-folded text when
 * normalization leaves nothing, so symbol-only titles ("÷", "×") stay distinct.
 */
export const foldString = (str: string): string =>
  normalizeString(str) || str.normalize('NFKC').toLowerCase().replace(/\s+/g, ' ').trim();

const ratio = (a: string, b: string): number => {
  if (a === b) {
    return 1;
  }
  return stringSimilarity(a, b);
};

/**
 * Token-set ratio over folded strings: compares the shared tokens with
 * each side's full token set, so word order and extra words on one side
 * ("the beatles" vs "beatles the") cost little or nothing.
 */
export const tokenSetRatio = (a: string, b: string): number => {
  const tokensA = new Set(foldString(a).split(' ').filter(Boolean));
  const tokensB = new Set(foldString(b).split(' ').filter(Boolean));

  if (tokensA.size === 0 && tokensB.size === 0) {
    return 1;
  }
  if (tokensA.size === 0 || tokensB.size === 0) {
    return 0;
  }

  const shared = [...tokensA].filter(token => tokensB.has(token)).sort();
  const onlyA = [...tokensA].filter(token => !tokensB.has(token)).sort();
  const onlyB = [...tokensB].filter(token => !tokensA.has(token)).sort();

  const base = shared.join(' ');
  const withA = [base, ...onlyA].filter(Boolean).join(' ');
  const withB = [base, ...onlyB].filter(Boolean).join(' ');

  const scores = [ratio(withA, withB)];
  if (base) {
    scores.push(ratio(base, withA), ratio(base, withB));
  }
  return Math.max(...scores);
};

/**
 * Query text without bracketed qualifiers and featured-artist segments:
 * "Get Lucky (feat. Pharrell Williams) [Radio Edit]" -> "Get Lucky"
 */
export const cleanSearchText = (text: string): string =>
  text
    .replace(/\([^)]*\)/g, ' ')
    .replace(/\[[^\]]*\]/g, ' ')
    .replace(/\s(?:feat\.?|ft\.|featuring)\s.*$/i, ' ')
    .replace(/\s+/g, ' ')
    .trim();
