/**
 * UBL 2.x Invoice / CreditNote target model.
 *
 * Property names follow the UBL element names (camel-cased). Repeating elements are arrays,
 * optional single elements are optional properties. The model is version neutral; elements
 * that only exist in some UBL versions are filled or left out by the converter.
 */

import type { Amount, BinaryObject, Code, DecimalAmount, Identifier, ISODate, Quantity, Text } from '../core/values.js';

export type UblDocumentType = 'Invoice' | 'CreditNote';

export interface UblAttachment {
  embeddedDocumentBinaryObject?: BinaryObject;
  externalReferenceUri?: string;
}

export interface UblDocumentReference {
  id: Identifier;
  issueDate?: ISODate;
  documentTypeCode?: string;
  documentDescriptions: Text[];
  attachment?: UblAttachment;
}

export interface UblOrderReference {
  id: string;
  salesOrderId?: string;
}

export interface UblBillingReference {
  invoiceDocumentReference: UblDocumentReference;
}

export interface UblPeriod {
  startDate?: ISODate;
  endDate?: ISODate;
  descriptionCodes: string[];
}

export interface UblCountry {
  identificationCode?: string;
  name?: Text;
}

export interface UblAddress {
  streetName?: string;
  additionalStreetName?: string;
  cityName?: string;
  postalZone?: string;
  countrySubentity?: string;
  addressLines: string[];
  country?: UblCountry;
}

export interface UblTaxScheme {
  id: string;
}

export interface UblPartyTaxScheme {
  companyId: string;
  taxScheme: UblTaxScheme;
}

export interface UblPartyLegalEntity {
  registrationName?: string;
  companyId?: Identifier;
  companyLegalForms: string[];
}

export interface UblContact {
  name?: Text;
  telephone?: string;
  electronicMail?: string;
}

export interface UblParty {
  endpointId?: Identifier;
  partyIdentifications: Identifier[];
  partyNames: Text[];
  postalAddress?: UblAddress;
  partyTaxSchemes: UblPartyTaxScheme[];
  partyLegalEntities: UblPartyLegalEntity[];
  contact?: UblContact;
}

/**
 * AccountingSupplierParty / AccountingCustomerParty wrapper. Always present in the output;
 * the inner party is absent when the source has none.
 */
export interface UblPartyRole {
  party?: UblParty;
}

export interface UblLocation {
  id?: Identifier;
  address?: UblAddress;
}

export interface UblDelivery {
  actualDeliveryDate?: ISODate;
  deliveryLocation?: UblLocation;
  deliveryParty?: UblParty;
}

export interface UblFinancialAccount {
  id?: Identifier;
  name?: Text;
  financialInstitutionBranchId?: Identifier;
}

export interface UblCardAccount {
  primaryAccountNumberId: Identifier;
  networkId: string;
  holderName?: string;
}

export interface UblPaymentMandate {
  id?: Identifier;
  payerFinancialAccount?: UblFinancialAccount;
}

export interface UblPaymentMeansCode {
  value: string;
  name?: string;
}

export interface UblPaymentMeans {
  paymentMeansCode: UblPaymentMeansCode;
  paymentDueDate?: ISODate;
  paymentIds: string[];
  cardAccount?: UblCardAccount;
  payeeFinancialAccount?: UblFinancialAccount;
  paymentMandate?: UblPaymentMandate;
}

export interface UblPaymentTerms {
  notes: Text[];
}

export interface UblTaxCategory {
  id?: string;
  percent?: DecimalAmount;
  taxExemptionReasonCode?: string;
  taxExemptionReasons: Text[];
  taxScheme: UblTaxScheme;
}

export interface UblAllowanceCharge {
  chargeIndicator: boolean;
  allowanceChargeReasonCode?: string;
  allowanceChargeReasons: string[];
  multiplierFactorNumeric?: DecimalAmount;
  amount?: Amount;
  baseAmount?: Amount;
  taxCategories: UblTaxCategory[];
}

export interface UblTaxSubtotal {
  taxableAmount?: Amount;
  taxAmount?: Amount;
  taxCategory: UblTaxCategory;
}

export interface UblTaxTotal {
  taxAmount: Amount;
  taxSubtotals: UblTaxSubtotal[];
}

export interface UblMonetaryTotal {
  lineExtensionAmount?: Amount;
  taxExclusiveAmount?: Amount;
  taxInclusiveAmount?: Amount;
  allowanceTotalAmount?: Amount;
  chargeTotalAmount?: Amount;
  prepaidAmount?: Amount;
  payableRoundingAmount?: Amount;
  payableAmount?: Amount;
}

export interface UblItemProperty {
  name: Text;
  value?: string;
}

export interface UblItem {
  descriptions: Text[];
  name?: Text;
  buyersItemId?: Identifier;
  sellersItemId?: Identifier;
  standardItemId?: Identifier;
  originCountry?: UblCountry;
  commodityClassifications: Code[];
  classifiedTaxCategories: UblTaxCategory[];
  additionalItemProperties: UblItemProperty[];
}

export interface UblPrice {
  priceAmount: Amount;
  baseQuantity?: Quantity;
  allowanceCharge?: UblAllowanceCharge;
}

export interface UblOrderLineReference {
  lineId: Identifier;
}

interface UblLineBase {
  id?: Identifier;
  notes: Text[];
  lineExtensionAmount?: Amount;
  accountingCost?: string;
  invoicePeriods: UblPeriod[];
  orderLineReferences: UblOrderLineReference[];
  documentReferences: UblDocumentReference[];
  allowanceCharges: UblAllowanceCharge[];
  item: UblItem;
  price?: UblPrice;
}

export interface UblInvoiceLine extends UblLineBase {
  invoicedQuantity?: Quantity;
}

export interface UblCreditNoteLine extends UblLineBase {
  creditedQuantity?: Quantity;
}

interface UblDocumentBase {
  customizationId?: string;
  profileId?: string;
  id?: string;
  issueDate?: ISODate;
  dueDate?: ISODate;
  notes: Text[];
  taxPointDate?: ISODate;
  documentCurrencyCode?: string;
  taxCurrencyCode?: string;
  accountingCost?: string;
  buyerReference?: string;
  invoicePeriods: UblPeriod[];
  orderReference?: UblOrderReference;
  billingReferences: UblBillingReference[];
  despatchDocumentReferences: UblDocumentReference[];
  receiptDocumentReferences: UblDocumentReference[];
  originatorDocumentReferences: UblDocumentReference[];
  contractDocumentReferences: UblDocumentReference[];
  additionalDocumentReferences: UblDocumentReference[];
  projectReferences: string[];
  accountingSupplierParty: UblPartyRole;
  accountingCustomerParty: UblPartyRole;
  payeeParty?: UblParty;
  taxRepresentativeParty?: UblParty;
  deliveries: UblDelivery[];
  paymentMeans: UblPaymentMeans[];
  paymentTerms: UblPaymentTerms[];
  allowanceCharges: UblAllowanceCharge[];
  taxTotals: UblTaxTotal[];
  legalMonetaryTotal: UblMonetaryTotal;
}

export interface UblInvoice extends UblDocumentBase {
  kind: 'Invoice';
  invoiceTypeCode?: string;
  invoiceLines: UblInvoiceLine[];
}

export interface UblCreditNote extends UblDocumentBase {
  kind: 'CreditNote';
  creditNoteTypeCode?: string;
  creditNoteLines: UblCreditNoteLine[];
}

export type UblDocument = UblInvoice | UblCreditNote;
