import { describe, expect, it } from 'vitest';
import {
  contentTokens,
  editSimilarity,
  isClaimSupported,
  isRefusal,
  levenshtein,
  normalizeText,
  round4,
  splitClaims,
  termCosine,
  tokenize,
} from '../runtime/text.metrics.js';

describe('text metrics', () => {
  it('normalizes case and whitespace', () => {
    expect(normalizeText('  Hello \n  World ')).toBe('hello world');
  });

  it('tokenizes on alphanumerics', () => {
    expect(tokenize("Don't stop, 24/7!")).toEqual(['don', 't', 'stop', '24', '7']);
  });

  it('drops short tokens and stopwords from content tokens', () => {
    expect(contentTokens('The refund is for all orders')).toEqual(['refund', 'orders']);
  });

  it('computes edit distance and similarity', () => {
    expect(levenshtein('kitten', 'sitting')).toBe(3);
    expect(levenshtein('', 'abc')).toBe(3);
    expect(round4(editSimilarity('kitten', 'sitting'))).toBe(0.5714);
    expect(editSimilarity('Same  Text', 'same text')).toBe(1);
    expect(editSimilarity('', '')).toBe(1);
  });

  it('computes term-frequency cosine', () => {
    expect(termCosine('open monday', 'monday open')).toBe(1);
    expect(termCosine('open', 'closed')).toBe(0);
    expect(termCosine('', '')).toBe(1);
    expect(termCosine('open', '')).toBe(0);
    expect(round4(termCosine('a a b', 'a b'))).toBe(0.9487);
  });

  it('detects refusals', () => {
    expect(isRefusal("Sorry, I can't help with that")).toBe(true);
    expect(isRefusal('Please ESCALATE this ticket')).toBe(true);
    expect(isRefusal('Returns take 30 days.')).toBe(false);
  });

  it('splits sentences into claims', () => {
    expect(splitClaims('Returns take 30 days. Call us! ...')).toEqual(['Returns take 30 days.', 'Call us!']);
  });

  it('checks claim coverage against source tokens', () => {
    const source = new Set(['refunds', 'need', 'manager']);
    expect(isClaimSupported('Refunds need manager approval.', source)).toBe(true);
    expect(isClaimSupported('Refunds need manager approval.', new Set(['refunds']))).toBe(false);
    expect(isClaimSupported('It is so.', new Set())).toBe(true);
  });
});
