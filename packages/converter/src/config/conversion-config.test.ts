import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@invoice-bridge/shared';
import { DEFAULT_CONVERSION_CONFIG, resolveConversionConfig } from './conversion-config.js';
import { getVersionCapabilities } from './version-capabilities.js';

describe('resolveConversionConfig', () => {
  it('should return the defaults without input', () => {
    const config = resolveConversionConfig();

    expect(config).toEqual(DEFAULT_CONVERSION_CONFIG);
    expect(config.creationMode).toBe('automatic');
    expect(config.ublVersion).toBe('2.3');
    expect(config.vatScheme).toBe('VAT');
    expect(config.defaultOrderReferenceId).toBe('NA');
  });

  it('should merge overrides over the defaults', () => {
    const config = resolveConversionConfig({ ublVersion: '2.1', swapPriceSignIfNeeded: false });

    expect(config.ublVersion).toBe('2.1');
    expect(config.swapPriceSignIfNeeded).toBe(false);
    expect(config.swapQuantitySignIfNeeded).toBe(true);
  });

  it('should return a frozen value', () => {
    const config = resolveConversionConfig({ vatScheme: 'GST' });

    expect(Object.isFrozen(config)).toBe(true);
    expect(DEFAULT_CONVERSION_CONFIG.vatScheme).toBe('VAT');
  });

  it('should accept empty customization and profile ids', () => {
    const config = resolveConversionConfig({ customizationId: '', profileId: '' });

    expect(config.customizationId).toBe('');
    expect(config.profileId).toBe('');
  });

  it('should reject an empty VAT scheme', () => {
    expect(() => resolveConversionConfig({ vatScheme: ' ' })).toThrow(ConfigurationError);
  });

  it('should reject unknown enumeration values', () => {
    expect(() => resolveConversionConfig({ creationMode: 'invoice' })).toThrow(
      "Invalid value 'invoice' for 'creationMode'",
    );
    expect(() => resolveConversionConfig({ ublVersion: '3.0' })).toThrow(ConfigurationError);
  });

  it('should reject unknown options', () => {
    expect(() => resolveConversionConfig({ vatSchema: 'VAT' })).toThrow("Unknown configuration option 'vatSchema'");
  });

  it('should validate untyped input', () => {
    const fromJson: unknown = JSON.parse('{"ublVersion":"2.2","swapQuantitySignIfNeeded":"no"}');
    const input = typeof fromJson === 'object' && fromJson !== null ? { ...fromJson } : {};

    expect(() => resolveConversionConfig(input)).toThrow("'swapQuantitySignIfNeeded' must be a boolean");
  });

  it('should reject an empty card network id', () => {
    expect(() => resolveConversionConfig({ cardAccountNetworkId: '' })).toThrow(
      "'cardAccountNetworkId' must not be empty",
    );
  });
});

describe('getVersionCapabilities', () => {
  it('should drop credit transfers without account only on 2.3 and later', () => {
    expect(getVersionCapabilities('2.1').creditTransferRequiresAccount).toBe(false);
    expect(getVersionCapabilities('2.2').creditTransferRequiresAccount).toBe(false);
    expect(getVersionCapabilities('2.3').creditTransferRequiresAccount).toBe(true);
    expect(getVersionCapabilities('2.4').creditTransferRequiresAccount).toBe(true);
  });

  it('should place the credit note due date in the header only on 2.2', () => {
    expect(getVersionCapabilities('2.2').creditNoteDueDate).toBe('header');
    expect(getVersionCapabilities('2.3').creditNoteDueDate).toBe('payment-means');
  });
});
