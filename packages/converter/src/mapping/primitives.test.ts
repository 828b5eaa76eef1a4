import { describe, it, expect } from 'vitest';
import { copyAmount, copyCode, copyIdentifier, copyQuantity, copyText, valueOf } from './primitives.js';

describe('copyIdentifier', () => {
  it('should copy the value with all scheme metadata', () => {
    const id = { value: '4000001123452', schemeId: '0088', schemeAgencyId: '9' };

    const copy = copyIdentifier(id);

    expect(copy).toEqual({ value: '4000001123452', schemeId: '0088', schemeAgencyId: '9' });
    expect(copy).not.toBe(id);
  });

  it('should treat empty values as absent', () => {
    expect(copyIdentifier(undefined)).toBeUndefined();
    expect(copyIdentifier({ value: '', schemeId: '0088' })).toBeUndefined();
    expect(copyIdentifier({ value: '   ' })).toBeUndefined();
  });
});

describe('copyText and copyCode', () => {
  it('should keep language and list metadata', () => {
    expect(copyText({ value: 'Hallo', languageId: 'de' })).toEqual({ value: 'Hallo', languageId: 'de' });
    expect(copyCode({ value: 'S', listId: 'UNCL5305' })).toEqual({ value: 'S', listId: 'UNCL5305' });
  });

  it('should drop empty values', () => {
    expect(copyText({ value: '' })).toBeUndefined();
    expect(copyCode({ value: '' })).toBeUndefined();
  });
});

describe('copyQuantity', () => {
  it('should strip trailing zeroes and keep the unit', () => {
    expect(copyQuantity({ value: '5.000', unitCode: 'C62' })).toEqual({ value: '5', unitCode: 'C62' });
  });

  it('should drop empty and non-decimal values', () => {
    expect(copyQuantity({ value: '' })).toBeUndefined();
    expect(copyQuantity({ value: 'five' })).toBeUndefined();
  });
});

describe('copyAmount', () => {
  it('should use the default currency when the source has none', () => {
    expect(copyAmount({ value: '100.00' }, 'EUR')).toEqual({ value: '100', currencyId: 'EUR' });
  });

  it('should keep an explicit currency regardless of the default', () => {
    expect(copyAmount({ value: '19.50', currencyId: 'USD' }, 'EUR')).toEqual({ value: '19.5', currencyId: 'USD' });
  });

  it('should give the same result when copied twice', () => {
    const once = copyAmount({ value: '7.10', currencyId: 'CHF' }, 'EUR');

    expect(copyAmount(once, 'EUR')).toEqual(once);
  });

  it('should leave the currency out without any default', () => {
    expect(copyAmount({ value: '1.0' }, undefined)).toEqual({ value: '1' });
  });

  it('should keep the currency list version', () => {
    expect(copyAmount({ value: '3', currencyId: 'EUR', currencyCodeListVersionId: '2001' }, undefined)).toEqual({
      value: '3',
      currencyId: 'EUR',
      currencyCodeListVersionId: '2001',
    });
  });
});

describe('valueOf', () => {
  it('should return content only', () => {
    expect(valueOf({ value: 'REF-1' })).toBe('REF-1');
    expect(valueOf({ value: ' ' })).toBeUndefined();
    expect(valueOf(undefined)).toBeUndefined();
  });
});
