import type { ConversionConfig, Diagnostic, Result } from '@invoice-bridge/contracts';
import type { DiagnosticSink } from '@invoice-bridge/shared';
import { getVersionCapabilities, type VersionCapabilities } from '../config/version-capabilities.js';

export const CONVERTER_SOURCE = 'converter';

/**
 * Per-call state handed to every mapping function
 */
export interface MappingContext {
  readonly config: Readonly<ConversionConfig>;
  readonly capabilities: Readonly<VersionCapabilities>;
  readonly sink: DiagnosticSink;
  /**
   * InvoiceCurrencyCode of the header settlement; substituted for amounts without currency
   */
  readonly defaultCurrency?: string;
}

export function createMappingContext(
  config: Readonly<ConversionConfig>,
  sink: DiagnosticSink,
  defaultCurrency?: string,
): MappingContext {
  const capabilities = getVersionCapabilities(config.ublVersion);
  return defaultCurrency === undefined
    ? { config, capabilities, sink }
    : { config, capabilities, sink, defaultCurrency };
}

/**
 * Element paths used in diagnostics, outermost element first
 */
export const PATHS = {
  transaction: ['CrossIndustryInvoice', 'SupplyChainTradeTransaction'],
  headerSettlement: ['CrossIndustryInvoice', 'SupplyChainTradeTransaction', 'ApplicableHeaderTradeSettlement'],
  lineItem: ['CrossIndustryInvoice', 'SupplyChainTradeTransaction', 'IncludedSupplyChainTradeLineItem'],
} as const;

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: Diagnostic): Result<T> {
  return { ok: false, error };
}
