import { describe, it, expect } from 'vitest';
import {
  formatAxisCurrency,
  formatCurrency,
  formatDate,
  formatDecimal,
  formatInteger,
  formatPercent,
} from './format';

describe('format', () => {
  it('should format currency with grouping and two decimals', () => {
    expect(formatCurrency(1234567.891)).toBe('$1,234,567.89');
    expect(formatCurrency(0)).toBe('$0.00');
  });

  it('should format the margin as a percentage', () => {
    expect(formatPercent(23.333333)).toBe('23.33%');
  });

  it('should format whole quantities with grouping', () => {
    expect(formatInteger(12345)).toBe('12,345');
  });

  it('should format averages with two decimals and no grouping', () => {
    expect(formatDecimal(2.5)).toBe('2.50');
    expect(formatDecimal(1234.5)).toBe('1234.50');
  });

  it('should format dates as ISO calendar days', () => {
    expect(formatDate(Date.parse('2024-03-01T00:00:00.000Z'))).toBe(
      '2024-03-01',
    );
  });

  it('should abbreviate axis values', () => {
    expect(formatAxisCurrency(950)).toBe('$950');
    expect(formatAxisCurrency(1500)).toBe('$1.5k');
    expect(formatAxisCurrency(2_000_000)).toBe('$2.0M');
  });
});
