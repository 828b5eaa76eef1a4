/**
 * CII (UN/CEFACT Cross Industry Invoice D16B) source model.
 *
 * Only the parts of the CII structure that take part in the EN 16931 mapping are modelled.
 * Element names follow the CII schema so the mapping rules can be read against it.
 * Repeating elements are always arrays (possibly empty); optional single elements are optional
 * properties. Decimal values are kept as strings exactly as they appear in the XML.
 */

import type { Amount, BinaryObject, Code, Identifier, Quantity, Text } from '../core/values.js';

/**
 * udt:DateTimeString / udt:DateString / qdt:DateTimeString with its format attribute
 */
export interface CiiDateTime {
  value: string;
  /** UNTDID 2379 format code, e.g. '102' */
  format?: string;
}

/**
 * udt:IndicatorType: a choice between a boolean and a free string form
 */
export interface CiiIndicator {
  indicator?: boolean;
  indicatorString?: string;
}

export interface CiiNote {
  contents: Text[];
  subjectCode?: Code;
}

export interface CiiExchangedDocumentContext {
  /** BusinessProcessSpecifiedDocumentContextParameter/ID (BT-23) */
  businessProcessIds: Identifier[];
  /** GuidelineSpecifiedDocumentContextParameter/ID (BT-24) */
  guidelineIds: Identifier[];
}

export interface CiiExchangedDocument {
  id?: Identifier;
  typeCode?: Code;
  issueDateTime?: CiiDateTime;
  notes: CiiNote[];
}

export interface CiiTradeAddress {
  postcode?: Code;
  lineOne?: Text;
  lineTwo?: Text;
  lineThree?: Text;
  cityName?: Text;
  countryId?: Code;
  countrySubDivisionNames: Text[];
}

export interface CiiTradeContact {
  personName?: Text;
  departmentName?: Text;
  /** TelephoneUniversalCommunication/CompleteNumber */
  telephone?: Text;
  /** EmailURIUniversalCommunication/URIID */
  email?: Identifier;
}

export interface CiiLegalOrganization {
  id?: Identifier;
  tradingBusinessName?: Text;
}

export interface CiiTaxRegistration {
  /** schemeID 'VA' (VAT) or 'FC' (fiscal number) */
  id?: Identifier;
}

export interface CiiTradeParty {
  ids: Identifier[];
  globalIds: Identifier[];
  name?: Text;
  descriptions: Text[];
  legalOrganization?: CiiLegalOrganization;
  contacts: CiiTradeContact[];
  postalAddress?: CiiTradeAddress;
  /** URIUniversalCommunication/URIID (electronic address, BT-34/BT-49) */
  uriCommunications: Identifier[];
  taxRegistrations: CiiTaxRegistration[];
}

export interface CiiReferencedDocument {
  issuerAssignedId?: Identifier;
  uriId?: Identifier;
  lineId?: Identifier;
  typeCode?: Code;
  names: Text[];
  attachmentBinaryObjects: BinaryObject[];
  referenceTypeCode?: Code;
  formattedIssueDateTime?: CiiDateTime;
}

export interface CiiProcuringProject {
  id?: Identifier;
  name?: Text;
}

export interface CiiHeaderTradeAgreement {
  buyerReference?: Text;
  seller?: CiiTradeParty;
  buyer?: CiiTradeParty;
  sellerTaxRepresentative?: CiiTradeParty;
  sellerOrder?: CiiReferencedDocument;
  buyerOrder?: CiiReferencedDocument;
  contract?: CiiReferencedDocument;
  additionalReferencedDocuments: CiiReferencedDocument[];
  procuringProject?: CiiProcuringProject;
}

export interface CiiHeaderTradeDelivery {
  shipTo?: CiiTradeParty;
  /** ActualDeliverySupplyChainEvent/OccurrenceDateTime */
  actualDeliveryDateTime?: CiiDateTime;
  despatchAdvice?: CiiReferencedDocument;
  receivingAdvice?: CiiReferencedDocument;
}

export interface CiiFinancialCard {
  id?: Identifier;
  cardholderName?: Text;
}

export interface CiiCreditorFinancialAccount {
  ibanId?: Identifier;
  accountName?: Text;
  proprietaryId?: Identifier;
}

export interface CiiDebtorFinancialAccount {
  ibanId?: Identifier;
}

export interface CiiFinancialInstitution {
  bicId?: Identifier;
}

export interface CiiPaymentMeans {
  typeCode?: Code;
  information: Text[];
  financialCard?: CiiFinancialCard;
  payerAccount?: CiiDebtorFinancialAccount;
  payerInstitution?: CiiFinancialInstitution;
  payeeAccount?: CiiCreditorFinancialAccount;
  payeeInstitution?: CiiFinancialInstitution;
}

export interface CiiTradeTax {
  calculatedAmounts: Amount[];
  typeCode?: Code;
  exemptionReason?: Text;
  basisAmounts: Amount[];
  categoryCode?: Code;
  exemptionReasonCode?: Code;
  taxPointDate?: CiiDateTime;
  dueDateTypeCode?: Code;
  rateApplicablePercent?: string;
}

export interface CiiPeriod {
  startDateTime?: CiiDateTime;
  endDateTime?: CiiDateTime;
}

export interface CiiAllowanceCharge {
  chargeIndicator?: CiiIndicator;
  calculationPercent?: string;
  basisAmount?: Amount;
  actualAmounts: Amount[];
  reasonCode?: Code;
  reason?: Text;
  categoryTradeTaxes: CiiTradeTax[];
}

export interface CiiPaymentTerms {
  descriptions: Text[];
  dueDateTime?: CiiDateTime;
  directDebitMandateIds: Identifier[];
}

export interface CiiHeaderMonetarySummation {
  lineTotalAmounts: Amount[];
  chargeTotalAmounts: Amount[];
  allowanceTotalAmounts: Amount[];
  taxBasisTotalAmounts: Amount[];
  taxTotalAmounts: Amount[];
  roundingAmounts: Amount[];
  grandTotalAmounts: Amount[];
  totalPrepaidAmounts: Amount[];
  duePayableAmounts: Amount[];
}

export interface CiiAccountingAccount {
  id?: Identifier;
}

export interface CiiHeaderTradeSettlement {
  creditorReferenceId?: Identifier;
  paymentReferences: Text[];
  taxCurrencyCode?: Code;
  invoiceCurrencyCode?: Code;
  payee?: CiiTradeParty;
  paymentMeans: CiiPaymentMeans[];
  tradeTaxes: CiiTradeTax[];
  billingPeriod?: CiiPeriod;
  allowanceCharges: CiiAllowanceCharge[];
  paymentTerms: CiiPaymentTerms[];
  monetarySummation?: CiiHeaderMonetarySummation;
  invoiceReferencedDocument?: CiiReferencedDocument;
  receivableAccountingAccounts: CiiAccountingAccount[];
}

export interface CiiProductCharacteristic {
  descriptions: Text[];
  values: Text[];
}

export interface CiiProductClassification {
  classCode?: Code;
}

export interface CiiOriginCountry {
  id?: Code;
  names: Text[];
}

export interface CiiTradeProduct {
  globalId?: Identifier;
  sellerAssignedId?: Identifier;
  buyerAssignedId?: Identifier;
  names: Text[];
  description?: Text;
  characteristics: CiiProductCharacteristic[];
  classifications: CiiProductClassification[];
  originCountry?: CiiOriginCountry;
}

export interface CiiTradePrice {
  chargeAmounts: Amount[];
  basisQuantity?: Quantity;
  appliedAllowanceCharges: CiiAllowanceCharge[];
}

export interface CiiLineTradeAgreement {
  buyerOrder?: CiiReferencedDocument;
  grossPrice?: CiiTradePrice;
  netPrice?: CiiTradePrice;
}

export interface CiiLineTradeDelivery {
  billedQuantity?: Quantity;
}

export interface CiiLineMonetarySummation {
  lineTotalAmounts: Amount[];
}

export interface CiiLineTradeSettlement {
  tradeTaxes: CiiTradeTax[];
  billingPeriod?: CiiPeriod;
  allowanceCharges: CiiAllowanceCharge[];
  monetarySummation?: CiiLineMonetarySummation;
  additionalReferencedDocuments: CiiReferencedDocument[];
  receivableAccountingAccounts: CiiAccountingAccount[];
}

export interface CiiDocumentLine {
  lineId?: Identifier;
  notes: CiiNote[];
}

export interface CiiLineItem {
  documentLine?: CiiDocumentLine;
  product?: CiiTradeProduct;
  agreement?: CiiLineTradeAgreement;
  delivery?: CiiLineTradeDelivery;
  settlement?: CiiLineTradeSettlement;
}

export interface CiiTradeTransaction {
  lineItems: CiiLineItem[];
  agreement?: CiiHeaderTradeAgreement;
  delivery?: CiiHeaderTradeDelivery;
  settlement?: CiiHeaderTradeSettlement;
}

/**
 * rsm:CrossIndustryInvoice
 */
export interface CiiDocument {
  context?: CiiExchangedDocumentContext;
  exchangedDocument?: CiiExchangedDocument;
  transaction?: CiiTradeTransaction;
}
