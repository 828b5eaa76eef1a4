/**
 * UBL XML writer
 *
 * Serializes a UblDocument to UBL 2.x Invoice or CreditNote XML.
 * Elements are written in schema sequence order; absent values and empty
 * collections produce no element.
 */

import { XMLBuilder } from 'fast-xml-parser';
import type {
  UblCreditNote,
  UblCreditNoteLine,
  UblDocument,
  UblInvoice,
  UblInvoiceLine,
} from '@invoice-bridge/contracts';
import {
  ATTRIBUTE_PREFIX,
  TEXT_KEY,
  allowanceCharge,
  amount,
  delivery,
  documentReference,
  identifier,
  item,
  list,
  monetaryTotal,
  party,
  paymentMeans,
  paymentTerms,
  period,
  price,
  put,
  quantity,
  taxTotal,
  text,
  type XmlElement,
} from './ubl-elements.js';

export const UBL_NAMESPACES = {
  INVOICE: 'urn:oasis:names:specification:ubl:schema:xsd:Invoice-2',
  CREDIT_NOTE: 'urn:oasis:names:specification:ubl:schema:xsd:CreditNote-2',
  CAC: 'urn:oasis:names:specification:ubl:schema:xsd:CommonAggregateComponents-2',
  CBC: 'urn:oasis:names:specification:ubl:schema:xsd:CommonBasicComponents-2',
} as const;

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export interface UblWriteOptions {
  /**
   * Indent nested elements (default: true)
   */
  pretty?: boolean;
}

/**
 * Serialize a UBL document.
 *
 * @example
 * const xml = writeUblXml(result.document, { pretty: false });
 */
export function writeUblXml(document: UblDocument, options: UblWriteOptions = {}): string {
  const pretty = options.pretty ?? true;
  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    textNodeName: TEXT_KEY,
    format: pretty,
    indentBy: '  ',
    suppressEmptyNode: false,
  });

  const root =
    document.kind === 'Invoice'
      ? { Invoice: buildInvoice(document) }
      : { CreditNote: buildCreditNote(document) };

  const body: unknown = builder.build(root);
  if (typeof body !== 'string') {
    throw new TypeError('XML builder did not return a string');
  }
  return `${XML_DECLARATION}${pretty ? '\n' : ''}${body}`;
}

function rootElement(namespace: string): XmlElement {
  return {
    [`${ATTRIBUTE_PREFIX}xmlns`]: namespace,
    [`${ATTRIBUTE_PREFIX}xmlns:cac`]: UBL_NAMESPACES.CAC,
    [`${ATTRIBUTE_PREFIX}xmlns:cbc`]: UBL_NAMESPACES.CBC,
  };
}

function textList(values: UblDocument['notes']): XmlElement[] {
  return list(values, text);
}

/**
 * Header elements from CustomizationID to IssueDate, shared by both document kinds
 */
function putIdentification(element: XmlElement, document: UblDocument): void {
  put(element, 'cbc:CustomizationID', document.customizationId);
  put(element, 'cbc:ProfileID', document.profileId);
  put(element, 'cbc:ID', document.id);
  put(element, 'cbc:IssueDate', document.issueDate);
}

/**
 * Header elements from DocumentCurrencyCode to InvoicePeriod
 */
function putCurrenciesAndPeriods(element: XmlElement, document: UblDocument): void {
  put(element, 'cbc:DocumentCurrencyCode', document.documentCurrencyCode);
  put(element, 'cbc:TaxCurrencyCode', document.taxCurrencyCode);
  put(element, 'cbc:AccountingCost', document.accountingCost);
  put(element, 'cbc:BuyerReference', document.buyerReference);
  put(element, 'cac:InvoicePeriod', document.invoicePeriods.map(period));
}

function putOrderAndBilling(element: XmlElement, document: UblDocument): void {
  if (document.orderReference) {
    const orderReference: XmlElement = { 'cbc:ID': document.orderReference.id };
    put(orderReference, 'cbc:SalesOrderID', document.orderReference.salesOrderId);
    element['cac:OrderReference'] = orderReference;
  }
  put(
    element,
    'cac:BillingReference',
    document.billingReferences.map((reference) => ({
      'cac:InvoiceDocumentReference': documentReference(reference.invoiceDocumentReference),
    })),
  );
  put(element, 'cac:DespatchDocumentReference', document.despatchDocumentReferences.map(documentReference));
  put(element, 'cac:ReceiptDocumentReference', document.receiptDocumentReferences.map(documentReference));
}

/**
 * Everything from AccountingSupplierParty to LegalMonetaryTotal
 */
function putPartiesAndTotals(element: XmlElement, document: UblDocument): void {
  put(
    element,
    'cac:ProjectReference',
    document.projectReferences.map((id) => ({ 'cbc:ID': id })),
  );
  element['cac:AccountingSupplierParty'] = document.accountingSupplierParty.party
    ? { 'cac:Party': party(document.accountingSupplierParty.party) }
    : {};
  element['cac:AccountingCustomerParty'] = document.accountingCustomerParty.party
    ? { 'cac:Party': party(document.accountingCustomerParty.party) }
    : {};
  if (document.payeeParty) {
    element['cac:PayeeParty'] = party(document.payeeParty);
  }
  if (document.taxRepresentativeParty) {
    element['cac:TaxRepresentativeParty'] = party(document.taxRepresentativeParty);
  }
  put(element, 'cac:Delivery', document.deliveries.map(delivery));
  put(element, 'cac:PaymentMeans', document.paymentMeans.map(paymentMeans));
  put(element, 'cac:PaymentTerms', document.paymentTerms.map(paymentTerms));
  put(element, 'cac:AllowanceCharge', document.allowanceCharges.map(allowanceCharge));
  put(element, 'cac:TaxTotal', document.taxTotals.map(taxTotal));
  element['cac:LegalMonetaryTotal'] = monetaryTotal(document.legalMonetaryTotal);
}

function buildInvoice(document: UblInvoice): XmlElement {
  const element = rootElement(UBL_NAMESPACES.INVOICE);
  putIdentification(element, document);
  put(element, 'cbc:DueDate', document.dueDate);
  put(element, 'cbc:InvoiceTypeCode', document.invoiceTypeCode);
  put(element, 'cbc:Note', textList(document.notes));
  put(element, 'cbc:TaxPointDate', document.taxPointDate);
  putCurrenciesAndPeriods(element, document);
  putOrderAndBilling(element, document);
  put(element, 'cac:OriginatorDocumentReference', document.originatorDocumentReferences.map(documentReference));
  put(element, 'cac:ContractDocumentReference', document.contractDocumentReferences.map(documentReference));
  put(element, 'cac:AdditionalDocumentReference', document.additionalDocumentReferences.map(documentReference));
  putPartiesAndTotals(element, document);
  put(
    element,
    'cac:InvoiceLine',
    document.invoiceLines.map((line) => {
      const lineElement: XmlElement = {};
      put(lineElement, 'cbc:ID', identifier(line.id));
      put(lineElement, 'cbc:Note', textList(line.notes));
      put(lineElement, 'cbc:InvoicedQuantity', quantity(line.invoicedQuantity));
      putLineBody(lineElement, line);
      return lineElement;
    }),
  );
  return element;
}

function buildCreditNote(document: UblCreditNote): XmlElement {
  const element = rootElement(UBL_NAMESPACES.CREDIT_NOTE);
  putIdentification(element, document);
  put(element, 'cbc:DueDate', document.dueDate);
  put(element, 'cbc:TaxPointDate', document.taxPointDate);
  put(element, 'cbc:CreditNoteTypeCode', document.creditNoteTypeCode);
  put(element, 'cbc:Note', textList(document.notes));
  putCurrenciesAndPeriods(element, document);
  putOrderAndBilling(element, document);
  // CreditNote places ContractDocumentReference and AdditionalDocumentReference before the originator
  put(element, 'cac:ContractDocumentReference', document.contractDocumentReferences.map(documentReference));
  put(element, 'cac:AdditionalDocumentReference', document.additionalDocumentReferences.map(documentReference));
  put(element, 'cac:OriginatorDocumentReference', document.originatorDocumentReferences.map(documentReference));
  putPartiesAndTotals(element, document);
  put(
    element,
    'cac:CreditNoteLine',
    document.creditNoteLines.map((line) => {
      const lineElement: XmlElement = {};
      put(lineElement, 'cbc:ID', identifier(line.id));
      put(lineElement, 'cbc:Note', textList(line.notes));
      put(lineElement, 'cbc:CreditedQuantity', quantity(line.creditedQuantity));
      putLineBody(lineElement, line);
      return lineElement;
    }),
  );
  return element;
}

/**
 * Line elements after the quantity, identical for both line kinds
 */
function putLineBody(element: XmlElement, line: UblInvoiceLine | UblCreditNoteLine): void {
  put(element, 'cbc:LineExtensionAmount', amount(line.lineExtensionAmount));
  put(element, 'cbc:AccountingCost', line.accountingCost);
  put(element, 'cac:InvoicePeriod', line.invoicePeriods.map(period));
  put(
    element,
    'cac:OrderLineReference',
    line.orderLineReferences.map((reference) => ({
      'cbc:LineID': identifier(reference.lineId) ?? reference.lineId.value,
    })),
  );
  put(element, 'cac:DocumentReference', line.documentReferences.map(documentReference));
  put(element, 'cac:AllowanceCharge', line.allowanceCharges.map(allowanceCharge));
  element['cac:Item'] = item(line.item);
  put(element, 'cac:Price', price(line.price));
}
