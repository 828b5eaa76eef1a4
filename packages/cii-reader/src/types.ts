/**
 * Types for the CII reader
 */

import type { CiiDocument, Diagnostic } from '@invoice-bridge/contracts';

/**
 * XML namespaces of the CII D16B syntax
 */
export const CII_NAMESPACES = {
  RSM: 'urn:un:unece:uncefact:data:standard:CrossIndustryInvoice:100',
  RAM: 'urn:un:unece:uncefact:data:standard:ReusableAggregateBusinessInformationEntity:100',
  UDT: 'urn:un:unece:uncefact:data:standard:UnqualifiedDataType:100',
  QDT: 'urn:un:unece:uncefact:data:standard:QualifiedDataType:100',
} as const;

/**
 * Result of CII detection
 */
export interface CiiDetectionResult {
  /**
   * Whether the root element is rsm:CrossIndustryInvoice
   */
  isCii: boolean;

  /**
   * Root element name as written (with prefix)
   */
  rootElement?: string;

  /**
   * CrossIndustryInvoice namespace when declared
   */
  namespace?: string;

  /**
   * GuidelineSpecifiedDocumentContextParameter/ID (BT-24)
   */
  guidelineId?: string;

  /**
   * Problems found during detection
   */
  diagnostics: Diagnostic[];
}

/**
 * Result of reading a CII document
 */
export interface CiiReadResult {
  /**
   * Source model; absent when the input is not readable CII
   */
  document?: CiiDocument;

  diagnostics: Diagnostic[];
}
