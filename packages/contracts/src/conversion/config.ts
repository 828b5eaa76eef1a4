/**
 * How the target document type is chosen.
 * - 'automatic': classify from the source type code, falling back to the due payable amount sign
 * - 'force-invoice' / 'force-credit-note': skip classification
 */
export type CreationMode = 'automatic' | 'force-invoice' | 'force-credit-note';

export type UblVersion = '2.1' | '2.2' | '2.3' | '2.4';

/**
 * Effective conversion configuration.
 * Passed explicitly to every conversion call and never mutated during one.
 */
export interface ConversionConfig {
  creationMode: CreationMode;

  /**
   * Document type used in automatic mode when classification is undetermined
   */
  undeterminedDocumentType: 'Invoice' | 'CreditNote';

  ublVersion: UblVersion;

  /**
   * Tax scheme identifier written to every TaxScheme/ID (e.g. 'VAT')
   */
  vatScheme: string;

  /**
   * Overrides the source guideline id when non-empty
   */
  customizationId: string;

  /**
   * Overrides the source business process id when non-empty
   */
  profileId: string;

  /**
   * CardAccount/NetworkID; CII has no equivalent field
   */
  cardAccountNetworkId: string;

  /**
   * OrderReference/ID used when only a seller order reference exists
   */
  defaultOrderReferenceId: string;

  swapQuantitySignIfNeeded: boolean;

  swapPriceSignIfNeeded: boolean;
}

/**
 * Caller-supplied overrides, merged over the defaults
 */
export type ConversionConfigInput = Partial<ConversionConfig>;
