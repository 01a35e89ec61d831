// Cryptanalysis toolkit: n-gram statistics, repeated sequences, index of
// coincidence, and the key-length and cipher-family estimates built on them

import { ALPHABET, ALPHABET_SIZE, normalizeText } from './alphabet.js';
import { DomainError } from './errors.js';
import { caesarDecrypt, vigenereDecrypt } from './substitution.js';

export type LikelyCipherType = 'transposition' | 'monoalphabetic' | 'polyalphabetic';

export interface DetectionResult {
  likelyType: LikelyCipherType;
  ic: number;
  keyLengths: number[];
  confidence: number;
}

export interface SolverResult {
  type: 'caesar' | 'vigenere';
  key: string;
  shift?: number;
  plaintext: string;
  // Chi-squared against English; lower is better
  score: number;
  confidence: number;
  formula: string;
}

// Relative letter frequencies of English text, A to Z
export const ENGLISH_FREQUENCIES: readonly number[] = [
  0.08167, 0.01492, 0.02782, 0.04253, 0.12702, 0.02228, 0.02015, 0.06094, 0.06966,
  0.00153, 0.00772, 0.04025, 0.02406, 0.06749, 0.07507, 0.01929, 0.00095, 0.05987,
  0.06327, 0.09056, 0.02758, 0.00978, 0.0236, 0.0015, 0.01974, 0.00074,
];

export const ENGLISH_IC = 0.0667;
export const RANDOM_IC = 0.0385;

// IC at or above this reads as a single substitution alphabet
const MONOALPHABETIC_IC = 0.055;
// Chi-squared per letter below this means the letters already follow English
const ENGLISH_CHI_PER_LETTER = 0.5;

function assertGramSize(n: number, label: string): void {
  if (!Number.isInteger(n) || n < 1) {
    throw new DomainError(`${label} must be at least 1, got ${n}`);
  }
}

/**
 * Character n-grams of the uppercased text (every character counts, spaces
 * included), or with `asWord` n-grams of lowercased words joined by a space.
 * Words are ASCII `\w` runs and characters are UTF-16 units, so accented
 * letters split words (`café` gives `caf`).
 */
export function ngrams(text: string, n: number, asWord = false): string[] {
  assertGramSize(n, 'n');

  if (asWord) {
    const words = text.toLowerCase().match(/\b\w+\b/g) ?? [];
    const grams: string[] = [];
    for (let i = 0; i + n <= words.length; i++) {
      grams.push(words.slice(i, i + n).join(' '));
    }
    return grams;
  }

  const upper = text.toUpperCase();
  const grams: string[] = [];
  for (let i = 0; i + n <= upper.length; i++) {
    grams.push(upper.slice(i, i + n));
  }
  return grams;
}

// Percentage of each n-gram, most frequent first (ties keep first-seen order)
export function frequencyAnalysis(text: string, n = 1, asWord = false): Map<string, number> {
  const grams = ngrams(text, n, asWord);
  const counts = new Map<string, number>();
  for (const gram of grams) {
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }

  const frequencies = new Map<string, number>();
  [...counts.entries()]
    .sort(([, a], [, b]) => b - a)
    .forEach(([gram, count]) => frequencies.set(gram, (count / grams.length) * 100));
  return frequencies;
}

/**
 * Letter sequences of `minLength` to `maxLength` that occur at least twice,
 * with their ascending start offsets in the uppercased text.
 */
export function findRepeatedSequences(
  text: string,
  minLength = 3,
  maxLength = 10,
): Map<string, number[]> {
  assertGramSize(minLength, 'minLength');
  const upper = text.toUpperCase();
  const repeated = new Map<string, number[]>();

  for (let length = minLength; length <= Math.min(maxLength, upper.length); length++) {
    const positions = new Map<string, number[]>();
    for (let i = 0; i + length <= upper.length; i++) {
      const sequence = upper.slice(i, i + length);
      if (!/^[A-Z]+$/.test(sequence)) continue;
      const offsets = positions.get(sequence) ?? [];
      offsets.push(i);
      positions.set(sequence, offsets);
    }

    for (const [sequence, offsets] of positions) {
      if (offsets.length > 1) repeated.set(sequence, offsets);
    }
  }

  return repeated;
}

function letterCounts(letters: string): number[] {
  const counts = new Array<number>(ALPHABET_SIZE).fill(0);
  for (const char of letters) {
    counts[char.charCodeAt(0) - 65]++;
  }
  return counts;
}

// Calculate Index of Coincidence
export function indexOfCoincidence(text: string): number {
  const letters = normalizeText(text);
  const n = letters.length;
  if (n <= 1) return 0;

  const sum = letterCounts(letters).reduce((acc, count) => acc + count * (count - 1), 0);
  return sum / (n * (n - 1));
}

// Chi-squared of the letter counts against English; Infinity for text without letters
export function chiSquared(text: string): number {
  const letters = normalizeText(text);
  const n = letters.length;
  if (n === 0) return Number.POSITIVE_INFINITY;

  return letterCounts(letters).reduce((acc, observed, i) => {
    const expected = ENGLISH_FREQUENCIES[i] * n;
    return acc + (observed - expected) ** 2 / expected;
  }, 0);
}

// Friedman's estimate of the Vigenère key length
export function friedmanEstimate(text: string): number {
  const n = normalizeText(text).length;
  const ic = indexOfCoincidence(text);
  const denominator = (n - 1) * ic - RANDOM_IC * n + ENGLISH_IC;
  if (n < 2 || denominator <= 0) return 0;

  return ((ENGLISH_IC - RANDOM_IC) * n) / denominator;
}

// Integer key lengths around the Friedman estimate, kept within 2..20
export function friedmanTest(text: string): number[] {
  const base = Math.round(friedmanEstimate(text));
  const candidates: number[] = [];
  for (let length = Math.max(2, base - 2); length <= base + 2; length++) {
    if (length >= 2 && length <= 20) candidates.push(length);
  }
  return candidates;
}

// Kasiski examination: most common factors of the distances between repeats
export function kasiskiExamination(text: string, sequenceLength = 3): number[] {
  const repeats = findRepeatedSequences(normalizeText(text), sequenceLength, sequenceLength);
  const factorCounts = new Map<number, number>();

  for (const offsets of repeats.values()) {
    for (let i = 0; i < offsets.length - 1; i++) {
      for (let j = i + 1; j < offsets.length; j++) {
        const distance = offsets[j] - offsets[i];
        for (let factor = 2; factor <= Math.min(20, distance); factor++) {
          if (distance % factor === 0) {
            factorCounts.set(factor, (factorCounts.get(factor) ?? 0) + 1);
          }
        }
      }
    }
  }

  return [...factorCounts.entries()]
    .sort(([factorA, a], [factorB, b]) => b - a || factorA - factorB)
    .slice(0, 5)
    .map(([factor]) => factor);
}

// Detect cipher type
export function detectCipherType(text: string): DetectionResult {
  const ic = indexOfCoincidence(text);
  const keyLengths = [...new Set([...friedmanTest(text), ...kasiskiExamination(text)])];

  let likelyType: LikelyCipherType;
  let confidence: number;

  if (ic >= MONOALPHABETIC_IC) {
    const letters = normalizeText(text).length;
    const chiPerLetter = chiSquared(text) / letters;
    likelyType = chiPerLetter < ENGLISH_CHI_PER_LETTER ? 'transposition' : 'monoalphabetic';
    confidence = Math.min(0.95, ic * 14);
  } else {
    likelyType = 'polyalphabetic';
    confidence = Math.min(0.95, Math.max(0.05, (ENGLISH_IC - ic) * 20));
  }

  return { likelyType, ic, keyLengths, confidence };
}

function confidenceFor(score: number, letters: number): number {
  return Math.min(0.99, Math.max(0.01, 1 - score / (letters * 2)));
}

// Caesar solver: every shift, ranked by chi-squared
export function solveCaesar(ciphertext: string, limit = 3): SolverResult[] {
  const normalized = normalizeText(ciphertext);
  if (normalized.length === 0) return [];

  const results: SolverResult[] = [];
  for (let shift = 0; shift < ALPHABET_SIZE; shift++) {
    const plaintext = caesarDecrypt(normalized, shift);
    const score = chiSquared(plaintext);
    results.push({
      type: 'caesar',
      key: ALPHABET[shift],
      shift,
      plaintext,
      score,
      confidence: confidenceFor(score, normalized.length),
      formula: 'E(x) = (x + k) mod 26',
    });
  }

  return results.sort((a, b) => a.score - b.score).slice(0, limit);
}

// Vigenère solver: each column of every candidate key length solved as a Caesar shift
export function solveVigenere(ciphertext: string, keyLengths: number[], limit = 3): SolverResult[] {
  const normalized = normalizeText(ciphertext);
  if (normalized.length === 0) return [];

  const results: SolverResult[] = [];
  for (const keyLength of new Set(keyLengths)) {
    if (!Number.isInteger(keyLength) || keyLength < 1 || keyLength > normalized.length) continue;

    const columns = new Array<string>(keyLength).fill('');
    for (let i = 0; i < normalized.length; i++) {
      columns[i % keyLength] += normalized[i];
    }

    const key = columns
      .map((column) => solveCaesar(column, 1)[0]?.key ?? 'A')
      .join('');
    const plaintext = vigenereDecrypt(normalized, key);
    const score = chiSquared(plaintext);

    results.push({
      type: 'vigenere',
      key,
      plaintext,
      score,
      confidence: confidenceFor(score, normalized.length),
      formula: 'E(x_i) = (x_i + k_i) mod 26',
    });
  }

  return results.sort((a, b) => a.score - b.score).slice(0, limit);
}
