import { describe, expect, it } from 'vitest';
import { findAmountTokens, formatAmount, parseAmount, sumAmounts } from '../../src/utils/amount.js';

describe('parseAmount', () => {
  it('reads comma-grouped amounts', () => {
    expect(parseAmount('1,234.50')).toBe('1234.50');
  });

  it('reads dot-grouped amounts with decimal comma', () => {
    expect(parseAmount('1.234,50')).toBe('1234.50');
  });

  it('reads no-break space grouping', () => {
    expect(parseAmount('1\u00A0234,50')).toBe('1234.50');
  });

  it('treats parentheses as negative', () => {
    expect(parseAmount('(45.00)')).toBe('-45.00');
  });

  it('reads Dr/Cr markers', () => {
    expect(parseAmount('120.00 Dr')).toBe('-120.00');
    expect(parseAmount('120.00 Cr')).toBe('120.00');
  });

  it('reads a sign after the currency symbol', () => {
    expect(parseAmount('$-12.30')).toBe('-12.30');
  });

  it('rejects text', () => {
    expect(parseAmount('COFFEE')).toBeNull();
  });

  it('round-trips through formatAmount', () => {
    expect(formatAmount(parseAmount('-4.50') ?? '')).toBe('-4.50');
  });
});

describe('findAmountTokens', () => {
  it('skips dotted dates', () => {
    const tokens = findAmountTokens('04.01.2024 POS 12.00 100.00');
    expect(tokens.map((t) => t.value)).toEqual(['12.00', '100.00']);
  });

  it('reports positions', () => {
    const [token] = findAmountTokens('FEE -4.50');
    expect(token).toMatchObject({ raw: '-4.50', index: 4, end: 9, value: '-4.50' });
  });
});

describe('decimal helpers', () => {
  it('pads fractions', () => {
    expect(formatAmount('-4.5')).toBe('-4.50');
  });

  it('never yields negative zero', () => {
    expect(parseAmount('-0.00')).toBe('0.00');
    expect(parseAmount('(0.00)')).toBe('0.00');
  });

  it('sums exactly', () => {
    expect(sumAmounts(['-4.50', '2500.00', '0.05'])).toBe('2495.55');
    expect(sumAmounts(['0.10', '0.20'])).toBe('0.30');
  });
});
