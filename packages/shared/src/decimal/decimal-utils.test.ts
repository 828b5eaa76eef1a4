import { describe, it, expect } from 'vitest';
import {
  isNegative,
  isValidDecimalAmount,
  isZero,
  negate,
  stripTrailingZeros,
} from './decimal-utils.js';

describe('stripTrailingZeros', () => {
  it('should drop fractional zeroes and the decimal point', () => {
    expect(stripTrailingZeros('100.00')).toBe('100');
    expect(stripTrailingZeros('19.50')).toBe('19.5');
    expect(stripTrailingZeros('0.125')).toBe('0.125');
  });

  it('should keep integer zeroes', () => {
    expect(stripTrailingZeros('100')).toBe('100');
    expect(stripTrailingZeros('2500')).toBe('2500');
  });

  it('should normalize signs and leading zeroes', () => {
    expect(stripTrailingZeros('-5.10')).toBe('-5.1');
    expect(stripTrailingZeros('+7.0')).toBe('7');
    expect(stripTrailingZeros('007.50')).toBe('7.5');
    expect(stripTrailingZeros('.5')).toBe('0.5');
    expect(stripTrailingZeros('-0.000')).toBe('0');
  });

  it('should reject non-decimal input', () => {
    expect(() => stripTrailingZeros('1,5')).toThrow('Invalid decimal format');
    expect(() => stripTrailingZeros('')).toThrow('Invalid decimal format');
  });
});

describe('sign helpers', () => {
  it('should detect negative values', () => {
    expect(isNegative('-0.01')).toBe(true);
    expect(isNegative('-0.00')).toBe(false);
    expect(isNegative('3')).toBe(false);
  });

  it('should detect zero in any scale', () => {
    expect(isZero('0')).toBe(true);
    expect(isZero('-0.000')).toBe(true);
    expect(isZero('0.001')).toBe(false);
  });

  it('should negate keeping the scale', () => {
    expect(negate('10.50')).toBe('-10.50');
    expect(negate('-5')).toBe('5');
    expect(negate('0.00')).toBe('0.00');
  });
});

describe('isValidDecimalAmount', () => {
  it('should accept the xs:decimal lexical space', () => {
    expect(isValidDecimalAmount('12')).toBe(true);
    expect(isValidDecimalAmount('-12.')).toBe(true);
    expect(isValidDecimalAmount(' 0.5 ')).toBe(true);
  });

  it('should reject other formats', () => {
    expect(isValidDecimalAmount('1e3')).toBe(false);
    expect(isValidDecimalAmount('12,50')).toBe(false);
    expect(isValidDecimalAmount('abc')).toBe(false);
  });
});
