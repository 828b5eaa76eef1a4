/**
 * @invoice-bridge/cii-reader
 *
 * Reads UN/CEFACT Cross Industry Invoice (CII D16B) XML into the CII source model.
 *
 * @packageDocumentation
 */

export { detectCiiDocument, READER_SOURCE } from './detect-cii.js';
export { readCiiXml, readCiiDocument } from './read-cii.js';

export type { CiiDetectionResult, CiiReadResult } from './types.js';
export { CII_NAMESPACES } from './types.js';
