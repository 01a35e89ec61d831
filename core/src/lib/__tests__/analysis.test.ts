import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import {
  chiSquared,
  detectCipherType,
  findRepeatedSequences,
  frequencyAnalysis,
  friedmanTest,
  indexOfCoincidence,
  kasiskiExamination,
  ngrams,
  solveCaesar,
  solveVigenere,
} from '../analysis.js';
import { normalizeText } from '../alphabet.js';
import { DomainError } from '../errors.js';
import { caesarEncrypt, vigenereEncrypt } from '../substitution.js';

const SAMPLE = readFileSync(new URL('./fixtures/english-sample.txt', import.meta.url), 'utf8');

describe('ngrams', () => {
  it('slides over every character of the uppercased text', () => {
    expect(ngrams('abcd', 2)).toEqual(['AB', 'BC', 'CD']);
    expect(ngrams('ab c', 2)).toEqual(['AB', 'B ', ' C']);
    expect(ngrams('ab', 3)).toEqual([]);
  });

  it('joins lowercased words in word mode', () => {
    expect(ngrams('The cat, the hat.', 2, true)).toEqual(['the cat', 'cat the', 'the hat']);
    expect(ngrams('café au lait', 1, true)).toEqual(['caf', 'au', 'lait']);
  });

  it('rejects n below 1', () => {
    expect(() => ngrams('abc', 0)).toThrow(DomainError);
  });
});

describe('frequencyAnalysis', () => {
  it('gives percentages ordered by count', () => {
    expect([...frequencyAnalysis('AABC')]).toEqual([
      ['A', 50],
      ['B', 25],
      ['C', 25],
    ]);
  });

  it('counts words in word mode', () => {
    const frequencies = [...frequencyAnalysis('to be or not to be', 1, true)];
    expect(frequencies.map(([word]) => word)).toEqual(['to', 'be', 'or', 'not']);
    expect(frequencies[0][1]).toBeCloseTo(33.333, 3);
    expect(frequencies[3][1]).toBeCloseTo(16.667, 3);
  });

  it('is empty for text shorter than n', () => {
    expect(frequencyAnalysis('', 1).size).toBe(0);
  });
});

describe('findRepeatedSequences', () => {
  it('lists offsets of sequences seen more than once', () => {
    expect(findRepeatedSequences('ABCXABCYABC', 3, 3)).toEqual(new Map([['ABC', [0, 4, 8]]]));
  });

  it('covers every length in the range, shortest first', () => {
    expect([...findRepeatedSequences('abcxabcyabc', 2, 3).keys()]).toEqual(['AB', 'BC', 'ABC']);
  });

  it('skips windows containing non-letters', () => {
    expect(findRepeatedSequences('AB AB', 2, 2)).toEqual(new Map([['AB', [0, 3]]]));
  });

  it('stops at the text length when maxLength is larger', () => {
    expect(findRepeatedSequences('ABCABC', 3, 300_000_000)).toEqual(new Map([['ABC', [0, 3]]]));
  });

  it('rejects a minimum length below 1', () => {
    expect(() => findRepeatedSequences('ABAB', 0, 2)).toThrow(DomainError);
  });
});

describe('indexOfCoincidence', () => {
  it('counts matching letter pairs', () => {
    expect(indexOfCoincidence('AABB')).toBeCloseTo(1 / 3, 10);
    expect(indexOfCoincidence('aa, bb')).toBeCloseTo(1 / 3, 10);
    expect(indexOfCoincidence('A')).toBe(0);
  });

  it('puts English prose nearer 0.066 than 1/26', () => {
    const ic = indexOfCoincidence(SAMPLE);
    expect(Math.abs(ic - 0.066)).toBeLessThan(Math.abs(ic - 1 / 26));
  });
});

describe('key length estimation', () => {
  it('finds common factors of repeat distances', () => {
    // ABC at 0, 6 and 12: distances 6, 12 and 6
    expect(kasiskiExamination('ABCXYZABCQQQABC')).toEqual([2, 3, 6, 4, 12]);
  });

  it('falls back to the smallest candidate for tiny texts', () => {
    expect(friedmanTest('A')).toEqual([2]);
  });

  it('points at the keyword length of a Vigenère ciphertext', () => {
    const ciphertext = vigenereEncrypt(SAMPLE, 'LEMON');
    expect(friedmanTest(ciphertext)).toContain(5);
    expect(kasiskiExamination(ciphertext)[0]).toBe(5);
  });
});

describe('detectCipherType', () => {
  it('reads untouched English letter frequencies as a transposition', () => {
    expect(detectCipherType(SAMPLE).likelyType).toBe('transposition');
  });

  it('recognizes a shifted single alphabet', () => {
    expect(detectCipherType(caesarEncrypt(SAMPLE, 7)).likelyType).toBe('monoalphabetic');
  });

  it('recognizes several alphabets and suggests key lengths', () => {
    const detection = detectCipherType(vigenereEncrypt(SAMPLE, 'LEMON'));
    expect(detection.likelyType).toBe('polyalphabetic');
    expect(detection.keyLengths).toContain(5);
  });
});

describe('solvers', () => {
  it('recovers a Caesar shift', () => {
    const [best] = solveCaesar(caesarEncrypt(SAMPLE, 7));
    expect(best.shift).toBe(7);
    expect(best.plaintext).toBe(normalizeText(SAMPLE));
  });

  it('recovers a Vigenère keyword for a known length', () => {
    const [best] = solveVigenere(vigenereEncrypt(SAMPLE, 'LEMON'), [5]);
    expect(best.key).toBe('LEMON');
    expect(best.plaintext).toBe(normalizeText(SAMPLE));
  });

  it('returns nothing for text without letters', () => {
    expect(solveCaesar('123 !')).toEqual([]);
    expect(chiSquared('')).toBe(Number.POSITIVE_INFINITY);
  });
});
