/**
 * Decimal amounts are carried as strings to avoid floating-point precision issues.
 * Format: optional minus sign, digits, optional fraction ("100.50", "-5", "0.125")
 */
export type DecimalAmount = string;

/**
 * ISO 4217 currency code (e.g. 'EUR')
 */
export type CurrencyCode = string;

/**
 * ISO 8601 calendar date (YYYY-MM-DD)
 */
export type ISODate = string;

/**
 * Identifier with its scheme metadata
 */
export interface Identifier {
  value: string;
  schemeId?: string;
  schemeName?: string;
  schemeAgencyId?: string;
  schemeAgencyName?: string;
  schemeVersionId?: string;
  schemeDataUri?: string;
  schemeUri?: string;
}

/**
 * Free text with optional language metadata
 */
export interface Text {
  value: string;
  languageId?: string;
  languageLocaleId?: string;
}

/**
 * Coded value with its code list metadata
 */
export interface Code {
  value: string;
  listId?: string;
  listAgencyId?: string;
  listAgencyName?: string;
  listName?: string;
  listVersionId?: string;
  name?: string;
  languageId?: string;
  listUri?: string;
  listSchemeUri?: string;
}

export interface Quantity {
  value: DecimalAmount;
  unitCode?: string;
  unitCodeListId?: string;
  unitCodeListAgencyId?: string;
  unitCodeListAgencyName?: string;
}

export interface Amount {
  value: DecimalAmount;
  currencyId?: CurrencyCode;
  currencyCodeListVersionId?: string;
}

/**
 * Binary attachment (base64 content)
 */
export interface BinaryObject {
  value: string;
  mimeCode?: string;
  filename?: string;
}
