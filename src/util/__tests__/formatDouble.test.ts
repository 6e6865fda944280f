import { doubleToJson, formatFixed, nonFiniteName } from '../formatDouble';

describe('formatFixed', () => {
  it('prints six decimals like %f', () => {
    expect(formatFixed(123.123, 6)).toBe('123.123000');
    expect(formatFixed(-0.5, 6)).toBe('-0.500000');
  });

  it('stays in fixed notation for large magnitudes', () => {
    expect(formatFixed(1e21, 6)).toBe('1000000000000000000000.000000');
    expect(formatFixed(-1e21, 2)).toBe('-1000000000000000000000.00');
    expect(formatFixed(1e21, 0)).toBe('1000000000000000000000');
  });

  it('names non-finite values', () => {
    expect(formatFixed(Infinity, 6)).toBe('inf');
    expect(formatFixed(-Infinity, 6)).toBe('-inf');
    expect(formatFixed(NaN, 6)).toBe('nan');
  });
});

describe('doubleToJson', () => {
  it('keeps finite numbers and names the rest', () => {
    expect(doubleToJson(2.5)).toBe(2.5);
    expect(doubleToJson(Infinity)).toBe('inf');
    expect(doubleToJson(NaN)).toBe('nan');
    expect(nonFiniteName(0)).toBeUndefined();
  });
});
