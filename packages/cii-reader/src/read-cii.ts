/**
 * CII XML reader
 *
 * Parses rsm:CrossIndustryInvoice XML into the CiiDocument source model.
 * Numeric values are kept as strings; nothing is converted to floating point.
 * Reading is tolerant: missing elements become absent properties or empty
 * arrays, and only unreadable input yields no document.
 *
 * IMPORTANT: No invoice content is logged during reading.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type {
  CiiDocument,
  CiiExchangedDocument,
  CiiExchangedDocumentContext,
  CiiHeaderMonetarySummation,
  CiiHeaderTradeAgreement,
  CiiHeaderTradeDelivery,
  CiiHeaderTradeSettlement,
  CiiLineItem,
  CiiLineTradeAgreement,
  CiiLineTradeSettlement,
  CiiPaymentMeans,
  CiiPaymentTerms,
  CiiTradePrice,
  CiiTradeProduct,
  CiiTradeTransaction,
  Identifier,
} from '@invoice-bridge/contracts';
import { DiagnosticSink, assignDefined } from '@invoice-bridge/shared';
import { READER_SOURCE, detectCiiDocument } from './detect-cii.js';
import {
  readAccountingAccounts,
  readAllowanceCharges,
  readNotes,
  readPeriod,
  readReferencedDocument,
  readReferencedDocuments,
  readTradeParty,
  readTradeTaxes,
} from './read-common.js';
import {
  readAmounts,
  readCode,
  readDateTime,
  readIdentifier,
  readIdentifiers,
  readQuantity,
  readText,
  readTexts,
  type ReadContext,
} from './read-values.js';
import { ATTRIBUTE_PREFIX, TEXT_KEY, child, children, descend, type XmlNode } from './xml-node.js';
import type { CiiReadResult } from './types.js';

function createParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    textNodeName: TEXT_KEY,
    removeNSPrefix: true, // CII prefixes (rsm, ram, udt, qdt) vary between producers
    parseTagValue: false, // Keep decimals and codes exactly as written
    parseAttributeValue: false,
    trimValues: true,
  });
}

/**
 * Read CII XML content into the source model.
 *
 * @param xml - Raw XML content
 * @returns The document (if readable) and all reader diagnostics
 */
export function readCiiXml(xml: string): CiiReadResult {
  const detection = detectCiiDocument(xml);
  if (!detection.isCii) {
    return { diagnostics: detection.diagnostics };
  }

  const sink = new DiagnosticSink(READER_SOURCE);
  sink.addAll(detection.diagnostics);

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    sink.error('CII-XML-MALFORMED', `Malformed XML: ${validation.err.msg}`, 'format', {
      context: { line: validation.err.line, column: validation.err.col },
    });
    return { diagnostics: sink.toArray() };
  }

  const parsed: unknown = createParser().parse(xml);
  const root = isXmlNode(parsed) ? child(parsed, 'CrossIndustryInvoice') : undefined;
  if (!root) {
    sink.error('CII-UNSUPPORTED-ROOT', 'No CrossIndustryInvoice root element found', 'format');
    return { diagnostics: sink.toArray() };
  }

  const document = readCiiDocument(root, { sink });
  return { document, diagnostics: sink.toArray() };
}

function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a parsed rsm:CrossIndustryInvoice element
 */
export function readCiiDocument(root: XmlNode, ctx: ReadContext): CiiDocument {
  const document: CiiDocument = {};
  assignDefined(document, 'context', readDocumentContext(child(root, 'ExchangedDocumentContext')));
  assignDefined(document, 'exchangedDocument', readExchangedDocument(child(root, 'ExchangedDocument')));
  assignDefined(document, 'transaction', readTransaction(child(root, 'SupplyChainTradeTransaction'), ctx));
  return document;
}

function readParameterIds(parent: XmlNode, element: string): Identifier[] {
  return children(parent, element)
    .map((parameter) => readIdentifier(child(parameter, 'ID')))
    .filter((id): id is Identifier => id !== undefined);
}

function readDocumentContext(node: XmlNode | undefined): CiiExchangedDocumentContext | undefined {
  if (!node) {
    return undefined;
  }
  return {
    businessProcessIds: readParameterIds(node, 'BusinessProcessSpecifiedDocumentContextParameter'),
    guidelineIds: readParameterIds(node, 'GuidelineSpecifiedDocumentContextParameter'),
  };
}

function readExchangedDocument(node: XmlNode | undefined): CiiExchangedDocument | undefined {
  if (!node) {
    return undefined;
  }
  const exchangedDocument: CiiExchangedDocument = { notes: readNotes(node) };
  assignDefined(exchangedDocument, 'id', readIdentifier(child(node, 'ID')));
  assignDefined(exchangedDocument, 'typeCode', readCode(child(node, 'TypeCode')));
  assignDefined(exchangedDocument, 'issueDateTime', readDateTime(child(node, 'IssueDateTime')));
  return exchangedDocument;
}

function readTransaction(node: XmlNode | undefined, ctx: ReadContext): CiiTradeTransaction | undefined {
  if (!node) {
    return undefined;
  }
  const transaction: CiiTradeTransaction = {
    lineItems: children(node, 'IncludedSupplyChainTradeLineItem').map((line) => readLineItem(line, ctx)),
  };
  assignDefined(transaction, 'agreement', readHeaderAgreement(child(node, 'ApplicableHeaderTradeAgreement')));
  assignDefined(transaction, 'delivery', readHeaderDelivery(child(node, 'ApplicableHeaderTradeDelivery')));
  assignDefined(transaction, 'settlement', readHeaderSettlement(child(node, 'ApplicableHeaderTradeSettlement'), ctx));
  return transaction;
}

function readHeaderAgreement(node: XmlNode | undefined): CiiHeaderTradeAgreement | undefined {
  if (!node) {
    return undefined;
  }
  const agreement: CiiHeaderTradeAgreement = {
    additionalReferencedDocuments: readReferencedDocuments(node, 'AdditionalReferencedDocument'),
  };
  assignDefined(agreement, 'buyerReference', readText(child(node, 'BuyerReference')));
  assignDefined(agreement, 'seller', readTradeParty(child(node, 'SellerTradeParty')));
  assignDefined(agreement, 'buyer', readTradeParty(child(node, 'BuyerTradeParty')));
  assignDefined(
    agreement,
    'sellerTaxRepresentative',
    readTradeParty(child(node, 'SellerTaxRepresentativeTradeParty')),
  );
  assignDefined(agreement, 'sellerOrder', readReferencedDocument(child(node, 'SellerOrderReferencedDocument')));
  assignDefined(agreement, 'buyerOrder', readReferencedDocument(child(node, 'BuyerOrderReferencedDocument')));
  assignDefined(agreement, 'contract', readReferencedDocument(child(node, 'ContractReferencedDocument')));

  const project = child(node, 'SpecifiedProcuringProject');
  if (project) {
    agreement.procuringProject = {};
    assignDefined(agreement.procuringProject, 'id', readIdentifier(child(project, 'ID')));
    assignDefined(agreement.procuringProject, 'name', readText(child(project, 'Name')));
  }
  return agreement;
}

function readHeaderDelivery(node: XmlNode | undefined): CiiHeaderTradeDelivery | undefined {
  if (!node) {
    return undefined;
  }
  const delivery: CiiHeaderTradeDelivery = {};
  assignDefined(delivery, 'shipTo', readTradeParty(child(node, 'ShipToTradeParty')));
  assignDefined(
    delivery,
    'actualDeliveryDateTime',
    readDateTime(descend(node, 'ActualDeliverySupplyChainEvent', 'OccurrenceDateTime')),
  );
  assignDefined(
    delivery,
    'despatchAdvice',
    readReferencedDocument(child(node, 'DespatchAdviceReferencedDocument')),
  );
  assignDefined(
    delivery,
    'receivingAdvice',
    readReferencedDocument(child(node, 'ReceivingAdviceReferencedDocument')),
  );
  return delivery;
}

function readPaymentMeans(node: XmlNode): CiiPaymentMeans {
  const paymentMeans: CiiPaymentMeans = { information: readTexts(node, 'Information') };
  assignDefined(paymentMeans, 'typeCode', readCode(child(node, 'TypeCode')));

  const card = child(node, 'ApplicableTradeSettlementFinancialCard');
  if (card) {
    paymentMeans.financialCard = {};
    assignDefined(paymentMeans.financialCard, 'id', readIdentifier(child(card, 'ID')));
    assignDefined(paymentMeans.financialCard, 'cardholderName', readText(child(card, 'CardholderName')));
  }

  const payerAccount = child(node, 'PayerPartyDebtorFinancialAccount');
  if (payerAccount) {
    paymentMeans.payerAccount = {};
    assignDefined(paymentMeans.payerAccount, 'ibanId', readIdentifier(child(payerAccount, 'IBANID')));
  }

  const payerInstitution = child(node, 'PayerSpecifiedDebtorFinancialInstitution');
  if (payerInstitution) {
    paymentMeans.payerInstitution = {};
    assignDefined(paymentMeans.payerInstitution, 'bicId', readIdentifier(child(payerInstitution, 'BICID')));
  }

  const payeeAccount = child(node, 'PayeePartyCreditorFinancialAccount');
  if (payeeAccount) {
    paymentMeans.payeeAccount = {};
    assignDefined(paymentMeans.payeeAccount, 'ibanId', readIdentifier(child(payeeAccount, 'IBANID')));
    assignDefined(paymentMeans.payeeAccount, 'accountName', readText(child(payeeAccount, 'AccountName')));
    assignDefined(paymentMeans.payeeAccount, 'proprietaryId', readIdentifier(child(payeeAccount, 'ProprietaryID')));
  }

  const payeeInstitution = child(node, 'PayeeSpecifiedCreditorFinancialInstitution');
  if (payeeInstitution) {
    paymentMeans.payeeInstitution = {};
    assignDefined(paymentMeans.payeeInstitution, 'bicId', readIdentifier(child(payeeInstitution, 'BICID')));
  }

  return paymentMeans;
}

function readPaymentTerms(node: XmlNode): CiiPaymentTerms {
  const terms: CiiPaymentTerms = {
    descriptions: readTexts(node, 'Description'),
    directDebitMandateIds: readIdentifiers(node, 'DirectDebitMandateID'),
  };
  assignDefined(terms, 'dueDateTime', readDateTime(child(node, 'DueDateDateTime')));
  return terms;
}

function readHeaderSummation(node: XmlNode | undefined, ctx: ReadContext): CiiHeaderMonetarySummation | undefined {
  if (!node) {
    return undefined;
  }
  return {
    lineTotalAmounts: readAmounts(node, 'LineTotalAmount', ctx),
    chargeTotalAmounts: readAmounts(node, 'ChargeTotalAmount', ctx),
    allowanceTotalAmounts: readAmounts(node, 'AllowanceTotalAmount', ctx),
    taxBasisTotalAmounts: readAmounts(node, 'TaxBasisTotalAmount', ctx),
    taxTotalAmounts: readAmounts(node, 'TaxTotalAmount', ctx),
    roundingAmounts: readAmounts(node, 'RoundingAmount', ctx),
    grandTotalAmounts: readAmounts(node, 'GrandTotalAmount', ctx),
    totalPrepaidAmounts: readAmounts(node, 'TotalPrepaidAmount', ctx),
    duePayableAmounts: readAmounts(node, 'DuePayableAmount', ctx),
  };
}

function readHeaderSettlement(node: XmlNode | undefined, ctx: ReadContext): CiiHeaderTradeSettlement | undefined {
  if (!node) {
    return undefined;
  }
  const settlement: CiiHeaderTradeSettlement = {
    paymentReferences: readTexts(node, 'PaymentReference'),
    paymentMeans: children(node, 'SpecifiedTradeSettlementPaymentMeans').map(readPaymentMeans),
    tradeTaxes: readTradeTaxes(node, 'ApplicableTradeTax', ctx),
    allowanceCharges: readAllowanceCharges(node, 'SpecifiedTradeAllowanceCharge', ctx),
    paymentTerms: children(node, 'SpecifiedTradePaymentTerms').map(readPaymentTerms),
    receivableAccountingAccounts: readAccountingAccounts(node),
  };
  assignDefined(settlement, 'creditorReferenceId', readIdentifier(child(node, 'CreditorReferenceID')));
  assignDefined(settlement, 'taxCurrencyCode', readCode(child(node, 'TaxCurrencyCode')));
  assignDefined(settlement, 'invoiceCurrencyCode', readCode(child(node, 'InvoiceCurrencyCode')));
  assignDefined(settlement, 'payee', readTradeParty(child(node, 'PayeeTradeParty')));
  assignDefined(settlement, 'billingPeriod', readPeriod(child(node, 'BillingSpecifiedPeriod')));
  assignDefined(
    settlement,
    'monetarySummation',
    readHeaderSummation(child(node, 'SpecifiedTradeSettlementHeaderMonetarySummation'), ctx),
  );
  assignDefined(
    settlement,
    'invoiceReferencedDocument',
    readReferencedDocument(child(node, 'InvoiceReferencedDocument')),
  );
  return settlement;
}

function readProduct(node: XmlNode | undefined): CiiTradeProduct | undefined {
  if (!node) {
    return undefined;
  }
  const product: CiiTradeProduct = {
    names: readTexts(node, 'Name'),
    characteristics: children(node, 'ApplicableProductCharacteristic').map((characteristic) => ({
      descriptions: readTexts(characteristic, 'Description'),
      values: readTexts(characteristic, 'Value'),
    })),
    classifications: children(node, 'DesignatedProductClassification').map((classification) => {
      const classCode = readCode(child(classification, 'ClassCode'));
      return classCode ? { classCode } : {};
    }),
  };
  assignDefined(product, 'globalId', readIdentifier(child(node, 'GlobalID')));
  assignDefined(product, 'sellerAssignedId', readIdentifier(child(node, 'SellerAssignedID')));
  assignDefined(product, 'buyerAssignedId', readIdentifier(child(node, 'BuyerAssignedID')));
  assignDefined(product, 'description', readText(child(node, 'Description')));

  const originCountry = child(node, 'OriginTradeCountry');
  if (originCountry) {
    product.originCountry = { names: readTexts(originCountry, 'Name') };
    assignDefined(product.originCountry, 'id', readCode(child(originCountry, 'ID')));
  }
  return product;
}

function readTradePrice(node: XmlNode | undefined, element: string, ctx: ReadContext): CiiTradePrice | undefined {
  if (!node) {
    return undefined;
  }
  const price: CiiTradePrice = {
    chargeAmounts: readAmounts(node, 'ChargeAmount', ctx),
    appliedAllowanceCharges: readAllowanceCharges(node, 'AppliedTradeAllowanceCharge', ctx),
  };
  assignDefined(price, 'basisQuantity', readQuantity(child(node, 'BasisQuantity'), `${element}/BasisQuantity`, ctx));
  return price;
}

function readLineAgreement(node: XmlNode | undefined, ctx: ReadContext): CiiLineTradeAgreement | undefined {
  if (!node) {
    return undefined;
  }
  const agreement: CiiLineTradeAgreement = {};
  assignDefined(agreement, 'buyerOrder', readReferencedDocument(child(node, 'BuyerOrderReferencedDocument')));
  assignDefined(
    agreement,
    'grossPrice',
    readTradePrice(child(node, 'GrossPriceProductTradePrice'), 'GrossPriceProductTradePrice', ctx),
  );
  assignDefined(
    agreement,
    'netPrice',
    readTradePrice(child(node, 'NetPriceProductTradePrice'), 'NetPriceProductTradePrice', ctx),
  );
  return agreement;
}

function readLineSettlement(node: XmlNode | undefined, ctx: ReadContext): CiiLineTradeSettlement | undefined {
  if (!node) {
    return undefined;
  }
  const settlement: CiiLineTradeSettlement = {
    tradeTaxes: readTradeTaxes(node, 'ApplicableTradeTax', ctx),
    allowanceCharges: readAllowanceCharges(node, 'SpecifiedTradeAllowanceCharge', ctx),
    additionalReferencedDocuments: readReferencedDocuments(node, 'AdditionalReferencedDocument'),
    receivableAccountingAccounts: readAccountingAccounts(node),
  };
  assignDefined(settlement, 'billingPeriod', readPeriod(child(node, 'BillingSpecifiedPeriod')));

  const summation = child(node, 'SpecifiedTradeSettlementLineMonetarySummation');
  if (summation) {
    settlement.monetarySummation = { lineTotalAmounts: readAmounts(summation, 'LineTotalAmount', ctx) };
  }
  return settlement;
}

function readLineItem(node: XmlNode, ctx: ReadContext): CiiLineItem {
  const lineItem: CiiLineItem = {};

  const documentLine = child(node, 'AssociatedDocumentLineDocument');
  if (documentLine) {
    lineItem.documentLine = { notes: readNotes(documentLine) };
    assignDefined(lineItem.documentLine, 'lineId', readIdentifier(child(documentLine, 'LineID')));
  }

  assignDefined(lineItem, 'product', readProduct(child(node, 'SpecifiedTradeProduct')));
  assignDefined(lineItem, 'agreement', readLineAgreement(child(node, 'SpecifiedLineTradeAgreement'), ctx));

  const delivery = child(node, 'SpecifiedLineTradeDelivery');
  if (delivery) {
    lineItem.delivery = {};
    assignDefined(
      lineItem.delivery,
      'billedQuantity',
      readQuantity(child(delivery, 'BilledQuantity'), 'BilledQuantity', ctx),
    );
  }

  assignDefined(lineItem, 'settlement', readLineSettlement(child(node, 'SpecifiedLineTradeSettlement'), ctx));
  return lineItem;
}
