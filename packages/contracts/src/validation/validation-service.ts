import type { UblVersion } from '../conversion/config.js';
import type { UblDocumentType } from '../ubl/ubl-document.js';

/**
 * Message reported by an external validator (XSD or Schematron)
 */
export interface ValidationMessage {
  severity: 'error' | 'warning' | 'info';
  message: string;
  /**
   * Rule identifier, e.g. 'BR-CO-10' or 'PEPPOL-EN16931-R001'
   */
  ruleId?: string;
  /**
   * XPath of the offending element
   */
  location?: string;
}

export interface ValidationReport {
  valid: boolean;
  messages: ValidationMessage[];
  /**
   * Validator identification, e.g. rule set name and version
   */
  validator?: string;
}

export interface ValidationRequest {
  documentType: UblDocumentType;
  ublVersion: UblVersion;
}

/**
 * External conformance validation of a serialized UBL document.
 * Implementations wrap XSD/Schematron engines; none ships with this project.
 */
export interface ValidationService {
  validate(xml: string, request: ValidationRequest): Promise<ValidationReport>;
}
