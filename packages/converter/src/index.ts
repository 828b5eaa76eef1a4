/**
 * @invoice-bridge/converter
 *
 * Maps a CII invoice to a UBL 2.1 - 2.4 Invoice or CreditNote.
 *
 * @example
 * ```typescript
 * import { convertCiiXmlToUbl } from '@invoice-bridge/converter';
 * import { writeUblXml } from '@invoice-bridge/ubl-writer';
 *
 * const result = convertCiiXmlToUbl(xml, { config: { ublVersion: '2.1' } });
 * if (result.document) {
 *   const ubl = writeUblXml(result.document);
 * }
 * ```
 *
 * @packageDocumentation
 */

// Entry points
export { convertCiiToUbl, convertCiiXmlToUbl, convertCiiFileToUbl, type ConversionOptions } from './converter.js';

// Configuration
export { DEFAULT_CONVERSION_CONFIG, resolveConversionConfig } from './config/conversion-config.js';
export {
  VERSION_CAPABILITIES,
  getVersionCapabilities,
  type VersionCapabilities,
  type CreditNoteDueDatePlacement,
} from './config/version-capabilities.js';

// Mapping building blocks
export { CONVERTER_SOURCE, createMappingContext, type MappingContext } from './mapping/context.js';
export { DEFAULT_DATE_FORMAT, getDatePattern, parseDate, parseDateTime } from './mapping/dates.js';
export {
  INVOICE_TYPE_CODES,
  CREDIT_NOTE_TYPE_CODES,
  classifyDocumentType,
  resolveDocumentType,
  type DocumentClassification,
  type DocumentTypeBasis,
  type DocumentTypeDecision,
} from './mapping/document-type.js';
export { resolveIndicator, classifyAllowanceCharge, type AllowanceChargeKind } from './mapping/indicator.js';
export { firstPartyId, allPartyIds } from './mapping/party-identity.js';
export {
  SEPA_CREDITOR_SCHEME,
  classifyPaymentMeansCode,
  convertPaymentMeans,
  type PaymentMeansClass,
  type PaymentMeansConversion,
  type PaymentMeansEffect,
} from './mapping/payment-means.js';
export { copyAmount, copyCode, copyIdentifier, copyQuantity, copyText } from './mapping/primitives.js';
export {
  normalizeQuantityAndPriceSigns,
  type LineSigns,
  type NormalizedLineSigns,
} from './mapping/sign-normalizer.js';
export { buildMonetaryTotal, buildTaxTotals, toTaxCategory } from './mapping/tax-totals.js';
export { assembleDocument } from './assembler/assemble-document.js';

// External validation
export {
  VALIDATION_SOURCE,
  validateConversionResult,
  validationMessagesToDiagnostics,
} from './validation/validate-result.js';
