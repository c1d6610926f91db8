import { describe, expect, it } from 'vitest';
import { stemKeyword, stemText, tokenizeWords } from '@/services/scoring/stemmer';

describe('stemKeyword', () => {
  it('strips plural and inflectional suffixes down to a shared stem', () => {
    expect(stemKeyword('prices')).toBe('pric');
    expect(stemKeyword('pricing')).toBe('pric');
    expect(stemKeyword('plans')).toBe('plan');
    expect(stemKeyword('running')).toBe('runn');
    expect(stemKeyword('configuration')).toBe('configura');
    expect(stemKeyword('monthly')).toBe('month');
  });

  it('leaves short words alone', () => {
    expect(stemKeyword('cats')).toBe('cats');
    expect(stemKeyword('api')).toBe('api');
  });

  it('respects the exception suffixes', () => {
    expect(stemKeyword('class')).toBe('class');
    expect(stemKeyword('agreed')).toBe('agreed');
    expect(stemKeyword('tree')).toBe('tree');
  });

  it('lowercases its input', () => {
    expect(stemKeyword('Plans')).toBe('plan');
  });
});

describe('tokenizeWords', () => {
  it('splits on anything that is not a letter, digit or underscore', () => {
    expect(tokenizeWords('Hello, World! foo_bar 42')).toEqual(['hello', 'world', 'foo_bar', '42']);
  });

  it('keeps non-ASCII letters inside words', () => {
    expect(tokenizeWords('Café prices')).toEqual(['café', 'prices']);
  });
});

describe('stemText', () => {
  it('stems word by word and joins with single spaces', () => {
    expect(stemText('Pricing Plans')).toBe('pric plan');
    expect(stemText('plans renew monthly.')).toBe('plan renew month');
  });
});
