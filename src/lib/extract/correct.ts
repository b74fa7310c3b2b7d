import type { CorrectedFragment, RawFragment } from '@/lib/ocr/types';
import type { OptionType } from '@/lib/extract/types';

// Letters OCR returns for digits. Only used on tokens that already hold a digit.
const NUMERIC_SUBSTITUTIONS: Readonly<Record<string, string>> = {
  O: '0',
  o: '0',
  D: '0',
  Q: '0',
  I: '1',
  i: '1',
  l: '1',
  L: '1',
  '|': '1',
  '!': '1',
  Z: '2',
  z: '2',
  S: '5',
  s: '5',
  G: '6',
  b: '6',
  T: '7',
  B: '8',
  g: '9',
  q: '9',
};

// Digits OCR returns for letters inside ticker-like words.
const TEXT_SUBSTITUTIONS: Readonly<Record<string, string>> = {
  '0': 'O',
  '1': 'I',
  '5': 'S',
  '8': 'B',
};

const OPTION_FIRST_CHAR: Readonly<Record<string, string>> = {
  C: 'C',
  P: 'P',
  G: 'C',
  '(': 'C',
  '[': 'C',
  R: 'P',
};

const OPTION_SECOND_CHAR: Readonly<Record<string, string>> = {
  E: 'E',
  F: 'E',
  '€': 'E',
};

const integerTokenRegex = /^\d{1,6}$/;
const decimalTokenRegex = /^\d{3,6}\.\d{1,2}$/;
const clockTokenRegex = /^\d{1,2}[:;.]\d{2}$/;
const edgePunctuationRegex = /^([,()[\]{}"'`]*)(.*?)([,()[\]{}"'`]*)$/;

export function stripEdgePunctuation(token: string): string {
  const match = token.match(edgePunctuationRegex);
  return match ? (match[2] ?? '') : token;
}

export function tokensOf(text: string): string[] {
  return text
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .map(stripEdgePunctuation);
}

function substitute(
  token: string,
  table: Readonly<Record<string, string>>,
): string {
  return Array.from(token, (char) => table[char] ?? char).join('');
}

function mapTokens(text: string, fn: (token: string) => string): string {
  return text
    .split(/(\s+)/)
    .map((part) => {
      if (part.trim().length === 0) return part;
      const match = part.match(edgePunctuationRegex);
      if (!match) return fn(part);
      return `${match[1] ?? ''}${fn(match[2] ?? '')}${match[3] ?? ''}`;
    })
    .join('');
}

export function isValidNumericToken(token: string): boolean {
  return (
    integerTokenRegex.test(token) ||
    decimalTokenRegex.test(token) ||
    clockTokenRegex.test(token)
  );
}

export function correctNumericToken(token: string): string {
  if (isValidNumericToken(token)) return token;
  if (!/\d/.test(token)) return token;
  const candidate = substitute(token, NUMERIC_SUBSTITUTIONS);
  return isValidNumericToken(candidate) ? candidate : token;
}

export function correctNumeric(text: string): string {
  return mapTokens(text, correctNumericToken);
}

export function correctTextToken(token: string): string {
  const letters = token.match(/[A-Za-z]/g)?.length ?? 0;
  const digits = token.match(/\d/g)?.length ?? 0;
  if (digits === 0 || letters <= digits) return token;
  return substitute(token, TEXT_SUBSTITUTIONS);
}

export function correctText(text: string): string {
  return mapTokens(text, correctTextToken);
}

export type OptionTypeReading = { value: OptionType; corrected: boolean };

export function correctOptionType(token: string): OptionTypeReading | null {
  const cleaned = stripEdgePunctuation(token.trim())
    .toUpperCase()
    .replace(/[.:;]+$/, '');
  if (cleaned === 'CE' || cleaned === 'PE') {
    return { value: cleaned, corrected: false };
  }
  if (Array.from(cleaned).length !== 2) return null;

  const [first, second] = Array.from(cleaned);
  const fixed = `${OPTION_FIRST_CHAR[first] ?? ''}${OPTION_SECOND_CHAR[second] ?? ''}`;
  if (fixed === 'CE' || fixed === 'PE') {
    return { value: fixed, corrected: true };
  }
  return null;
}

export function correctFragments(
  fragments: readonly RawFragment[],
): CorrectedFragment[] {
  return fragments.map((fragment) => ({
    ...fragment,
    text: correctNumeric(fragment.text),
    originalText: fragment.text,
  }));
}
