import type { Diagnostic } from '../core/diagnostic.js';
import type { UblDocument, UblDocumentType } from '../ubl/ubl-document.js';
import type { UblVersion } from './config.js';

/**
 * Outcome of a single conversion call
 */
export interface ConversionResult {
  /**
   * Converted document; absent when a mandatory source block is missing
   * or the input could not be read
   */
  document?: UblDocument;

  /**
   * Document type that was chosen (after creation mode and fallbacks)
   */
  documentType?: UblDocumentType;

  ublVersion: UblVersion;

  /**
   * All diagnostics in traversal order
   */
  diagnostics: Diagnostic[];
}
