/**
 * Invoice or CreditNote?
 */

import type { CiiDocument, ConversionConfig, UblDocumentType } from '@invoice-bridge/contracts';
import { isNegative, type DiagnosticSink } from '@invoice-bridge/shared';
import { canonicalDecimal } from './primitives.js';

export type DocumentClassification = UblDocumentType | 'Undetermined';

/**
 * How the document type was chosen
 * - 'forced': creation mode named the type
 * - 'type-code' / 'due-payable': automatic classification
 * - 'default': classification undetermined, the configured default applied
 */
export type DocumentTypeBasis = 'forced' | 'type-code' | 'due-payable' | 'default';

export interface DocumentTypeDecision {
  documentType: UblDocumentType;
  basis: DocumentTypeBasis;
}

// UNTDID 1001 subsets used by the EN 16931 validation artefacts, plus 875-877 (XRechnung)
export const INVOICE_TYPE_CODES: ReadonlySet<string> = new Set(
  '80 82 84 130 202 203 204 211 295 325 326 380 383 384 385 386 387 388 389 390 393 394 395 456 457 527 575 623 633 751 780 935 875 876 877'.split(
    ' ',
  ),
);

export const CREDIT_NOTE_TYPE_CODES: ReadonlySet<string> = new Set(
  '81 83 261 262 296 308 381 396 420 458 532'.split(' '),
);

function classifyByTypeCode(source: CiiDocument): DocumentClassification {
  const typeCode = source.exchangedDocument?.typeCode?.value.trim();
  if (typeCode === undefined) {
    return 'Undetermined';
  }
  if (INVOICE_TYPE_CODES.has(typeCode)) {
    return 'Invoice';
  }
  if (CREDIT_NOTE_TYPE_CODES.has(typeCode)) {
    return 'CreditNote';
  }
  return 'Undetermined';
}

function classifyByDuePayable(source: CiiDocument): DocumentClassification {
  const duePayable = canonicalDecimal(
    source.transaction?.settlement?.monetarySummation?.duePayableAmounts[0]?.value,
  );
  if (duePayable === undefined) {
    return 'Undetermined';
  }
  return isNegative(duePayable) ? 'CreditNote' : 'Invoice';
}

/**
 * Header type code first, then the sign of the first due payable amount
 */
export function classifyDocumentType(source: CiiDocument): DocumentClassification {
  const byTypeCode = classifyByTypeCode(source);
  return byTypeCode === 'Undetermined' ? classifyByDuePayable(source) : byTypeCode;
}

/**
 * Apply the creation mode. An undetermined classification records a warning
 * and falls back to the configured default.
 */
export function resolveDocumentType(
  source: CiiDocument,
  config: Pick<ConversionConfig, 'creationMode' | 'undeterminedDocumentType'>,
  sink: DiagnosticSink,
): DocumentTypeDecision {
  if (config.creationMode === 'force-invoice') {
    return { documentType: 'Invoice', basis: 'forced' };
  }
  if (config.creationMode === 'force-credit-note') {
    return { documentType: 'CreditNote', basis: 'forced' };
  }

  const byTypeCode = classifyByTypeCode(source);
  if (byTypeCode !== 'Undetermined') {
    return { documentType: byTypeCode, basis: 'type-code' };
  }
  const byDuePayable = classifyByDuePayable(source);
  if (byDuePayable !== 'Undetermined') {
    return { documentType: byDuePayable, basis: 'due-payable' };
  }

  sink.warning(
    'DOCUMENT-TYPE-UNDETERMINED',
    `Could not determine if the document is an Invoice or a CreditNote; converting to ${config.undeterminedDocumentType}`,
    'ambiguity',
    {
      path: ['CrossIndustryInvoice', 'ExchangedDocument', 'TypeCode'],
      context: { typeCode: source.exchangedDocument?.typeCode?.value },
    },
  );
  return { documentType: config.undeterminedDocumentType, basis: 'default' };
}
