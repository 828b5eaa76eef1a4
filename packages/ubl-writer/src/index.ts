/**
 * @invoice-bridge/ubl-writer
 *
 * Serializes the UBL Invoice and CreditNote model to UBL 2.x XML.
 *
 * @packageDocumentation
 */

export { writeUblXml, UBL_NAMESPACES } from './write-ubl.js';
export type { UblWriteOptions } from './write-ubl.js';
