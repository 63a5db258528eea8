import { describe, expect, it } from 'vitest';
import {
  countByKey,
  delinquencyBucketFor,
  isDuplicateKey,
  loanToIncomeRatio,
  normalizeEmail,
  riskCategoryFor,
  tryParseDate,
  tryParseDecimal,
  tryParseInteger
} from '../canon/rules.js';

describe('riskCategoryFor', () => {
  it('returns Unknown for a missing score and Invalid outside 300-850', () => {
    expect(riskCategoryFor(null)).toBe('Unknown');
    expect(riskCategoryFor(299)).toBe('Invalid');
    expect(riskCategoryFor(851)).toBe('Invalid');
    expect(riskCategoryFor(-10)).toBe('Invalid');
  });

  it('places boundary scores in the documented buckets', () => {
    expect(riskCategoryFor(300)).toBe('Poor');
    expect(riskCategoryFor(649)).toBe('Poor');
    expect(riskCategoryFor(650)).toBe('Fair');
    expect(riskCategoryFor(699)).toBe('Fair');
    expect(riskCategoryFor(700)).toBe('Good');
    expect(riskCategoryFor(749)).toBe('Good');
    expect(riskCategoryFor(750)).toBe('Excellent');
    expect(riskCategoryFor(850)).toBe('Excellent');
  });
});

describe('delinquencyBucketFor', () => {
  it('maps days past due onto buckets at the boundaries', () => {
    expect(delinquencyBucketFor(null)).toBeNull();
    expect(delinquencyBucketFor(0)).toBe('Current');
    expect(delinquencyBucketFor(1)).toBe('Late');
    expect(delinquencyBucketFor(30)).toBe('Late');
    expect(delinquencyBucketFor(31)).toBe('Delinquent');
    expect(delinquencyBucketFor(90)).toBe('Delinquent');
    expect(delinquencyBucketFor(91)).toBe('Default');
  });

  it('lets negative values fall through to Default', () => {
    expect(delinquencyBucketFor(-5)).toBe('Default');
  });
});

describe('best-effort conversions', () => {
  it('parses decimals and rejects anything else', () => {
    expect(tryParseDecimal(' 12.5 ')).toBe(12.5);
    expect(tryParseDecimal('1e3')).toBe(1000);
    expect(tryParseDecimal('-0.75')).toBe(-0.75);
    expect(tryParseDecimal('abc')).toBeNull();
    expect(tryParseDecimal('')).toBeNull();
    expect(tryParseDecimal('0x10')).toBeNull();
    expect(tryParseDecimal('12,5')).toBeNull();
    expect(tryParseDecimal(null)).toBeNull();
  });

  it('parses 32-bit integers', () => {
    expect(tryParseInteger('720')).toBe(720);
    expect(tryParseInteger(' 42 ')).toBe(42);
    expect(tryParseInteger('-3')).toBe(-3);
    expect(tryParseInteger('3000000000')).toBeNull();
    expect(tryParseInteger('n/a')).toBeNull();
  });

  it('rounds decimal and exponent text to the nearest integer, halves away from zero', () => {
    expect(tryParseInteger('720.0')).toBe(720);
    expect(tryParseInteger('720.6')).toBe(721);
    expect(tryParseInteger('12.5')).toBe(13);
    expect(tryParseInteger('-12.5')).toBe(-13);
    expect(tryParseInteger('1e3')).toBe(1000);
    expect(tryParseInteger('-0.2')).toBe(0);
  });

  it('parses calendar dates into yyyy-MM-dd', () => {
    expect(tryParseDate('2024-01-15')).toBe('2024-01-15');
    expect(tryParseDate('2024-1-5')).toBe('2024-01-05');
    expect(tryParseDate(' 2024-03-09 ')).toBe('2024-03-09');
    expect(tryParseDate('2024-02-30')).toBeNull();
    expect(tryParseDate('15/01/2024')).toBeNull();
    expect(tryParseDate(null)).toBeNull();
  });

  it('accepts slash or dot separators and drops a time of day', () => {
    expect(tryParseDate('2024/01/15')).toBe('2024-01-15');
    expect(tryParseDate('2024.1.5')).toBe('2024-01-05');
    expect(tryParseDate('2024-01-15 10:00:00')).toBe('2024-01-15');
    expect(tryParseDate('2024-01-15T10:00:00.250Z')).toBe('2024-01-15');
    expect(tryParseDate('2024/01-15')).toBeNull();
    expect(tryParseDate('2024-01-15 noon')).toBeNull();
  });
});

describe('normalizeEmail', () => {
  it('lowercases and strips every whitespace character', () => {
    expect(normalizeEmail(' Jane.Doe @Example.COM ')).toBe('jane.doe@example.com');
    expect(normalizeEmail(null)).toBeNull();
  });
});

describe('loanToIncomeRatio', () => {
  it('divides loan amount by income without rounding', () => {
    expect(loanToIncomeRatio(20000, 50000)).toBe(0.4);
    expect(loanToIncomeRatio(10000, 30000)).toBe(10000 / 30000);
  });

  it('is null when either side is missing or not positive', () => {
    expect(loanToIncomeRatio(20000, 0)).toBeNull();
    expect(loanToIncomeRatio(20000, null)).toBeNull();
    expect(loanToIncomeRatio(0, 50000)).toBeNull();
    expect(loanToIncomeRatio(null, 50000)).toBeNull();
  });
});

describe('countByKey', () => {
  it('counts keys and skips nulls', () => {
    const counts = countByKey(['a', 'b', 'a', null, null], (value) => value);

    expect(counts.get('a')).toBe(2);
    expect(counts.get('b')).toBe(1);
    expect(counts.size).toBe(2);
    expect(isDuplicateKey(counts, 'a')).toBe(true);
    expect(isDuplicateKey(counts, 'b')).toBe(false);
    expect(isDuplicateKey(counts, null)).toBe(false);
  });
});
