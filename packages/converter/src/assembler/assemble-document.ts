/**
 * Document assembly
 *
 * Walks the CII transaction in a fixed order and fills one UBL Invoice or
 * CreditNote. Everything below the mandatory blocks is best effort: a field
 * that cannot be mapped is left out and explained by a diagnostic.
 */

import type {
  CiiDocument,
  CiiHeaderTradeAgreement,
  CiiHeaderTradeDelivery,
  CiiHeaderTradeSettlement,
  UblDocument,
  UblDocumentType,
  UblPaymentMeans,
} from '@invoice-bridge/contracts';
import { assignDefined, hasText } from '@invoice-bridge/shared';
import { PATHS, type MappingContext } from '../mapping/context.js';
import { parseDateTime } from '../mapping/dates.js';
import { addDeduplicatedId } from '../mapping/party-identity.js';
import { convertPaymentMeans, type PaymentMeansEffect } from '../mapping/payment-means.js';
import { valueOf } from '../mapping/primitives.js';
import { buildMonetaryTotal, buildTaxTotals } from '../mapping/tax-totals.js';
import { convertAllowanceCharges } from './allowance-charge.js';
import {
  convertDelivery,
  convertDueDate,
  convertInvoicePeriod,
  convertPaymentTerms,
  convertTaxPointDate,
} from './header.js';
import { convertLine } from './lines.js';
import { convertNotes, firstAccountingCost } from './notes.js';
import { convertParty } from './parties.js';
import { convertDocumentReferences } from './references.js';

const AGREEMENT_PATH = [...PATHS.transaction, 'ApplicableHeaderTradeAgreement'];
const DELIVERY_PATH = [...PATHS.transaction, 'ApplicableHeaderTradeDelivery'];
const SETTLEMENT_PATH = [...PATHS.headerSettlement];

interface TransactionBlocks {
  agreement: CiiHeaderTradeAgreement;
  delivery: CiiHeaderTradeDelivery;
  settlement: CiiHeaderTradeSettlement;
}

function requireTransactionBlocks(source: CiiDocument, ctx: MappingContext): TransactionBlocks | undefined {
  const transaction = source.transaction;
  if (!transaction) {
    reportMissing('SupplyChainTradeTransaction', [...PATHS.transaction], ctx);
    return undefined;
  }
  const { agreement, delivery, settlement } = transaction;
  if (!agreement) {
    reportMissing('ApplicableHeaderTradeAgreement', AGREEMENT_PATH, ctx);
  }
  if (!delivery) {
    reportMissing('ApplicableHeaderTradeDelivery', DELIVERY_PATH, ctx);
  }
  if (!settlement) {
    reportMissing('ApplicableHeaderTradeSettlement', SETTLEMENT_PATH, ctx);
  }
  if (!agreement || !delivery || !settlement) {
    return undefined;
  }
  return { agreement, delivery, settlement };
}

function reportMissing(element: string, path: readonly string[], ctx: MappingContext): void {
  ctx.sink.error('STRUCTURE-MISSING', `The mandatory element '${element}' is missing`, 'structure', { path });
}

/**
 * Configured ids win when non-empty; otherwise the source document context is used
 */
function resolveProfileIds(source: CiiDocument, ctx: MappingContext): { customizationId?: string; profileId?: string } {
  const ids: { customizationId?: string; profileId?: string } = {};
  assignDefined(
    ids,
    'customizationId',
    hasText(ctx.config.customizationId) ? ctx.config.customizationId : valueOf(source.context?.guidelineIds[0]),
  );
  assignDefined(
    ids,
    'profileId',
    hasText(ctx.config.profileId) ? ctx.config.profileId : valueOf(source.context?.businessProcessIds[0]),
  );
  return ids;
}

function applyPaymentMeansEffects(document: UblDocument, effects: readonly PaymentMeansEffect[]): void {
  const seller = document.accountingSupplierParty.party;
  if (!seller) {
    return;
  }
  for (const effect of effects) {
    switch (effect.type) {
      case 'add-seller-identifier':
        addDeduplicatedId(seller.partyIdentifications, effect.identifier);
        break;
    }
  }
}

/**
 * Build the target document, or return undefined (with a STRUCTURE-MISSING
 * error per missing block) when the transaction lacks a mandatory block.
 */
export function assembleDocument(
  kind: UblDocumentType,
  source: CiiDocument,
  ctx: MappingContext,
): UblDocument | undefined {
  const blocks = requireTransactionBlocks(source, ctx);
  if (!blocks) {
    return undefined;
  }
  const { agreement, delivery, settlement } = blocks;
  const exchanged = source.exchangedDocument;

  const references = convertDocumentReferences(source, agreement, ctx, {
    agreement: AGREEMENT_PATH,
    delivery: DELIVERY_PATH,
    settlement: SETTLEMENT_PATH,
  });

  const base = {
    ...resolveProfileIds(source, ctx),
    notes: convertNotes(exchanged?.notes ?? []),
    invoicePeriods: [],
    billingReferences: references.billingReferences,
    despatchDocumentReferences: references.despatchDocumentReferences,
    receiptDocumentReferences: references.receiptDocumentReferences,
    originatorDocumentReferences: references.originatorDocumentReferences,
    contractDocumentReferences: references.contractDocumentReferences,
    additionalDocumentReferences: references.additionalDocumentReferences,
    projectReferences:
      kind === 'Invoice' || ctx.capabilities.creditNoteProjectReference ? references.projectReferences : [],
    accountingSupplierParty: {},
    accountingCustomerParty: {},
    deliveries: [],
    paymentMeans: [],
    paymentTerms: convertPaymentTerms(settlement),
    allowanceCharges: [],
    taxTotals: [],
    legalMonetaryTotal: {},
  };
  const document: UblDocument =
    kind === 'Invoice'
      ? { kind: 'Invoice', ...base, invoiceLines: [] }
      : { kind: 'CreditNote', ...base, creditNoteLines: [] };

  assignDefined(document, 'id', valueOf(exchanged?.id));
  assignDefined(
    document,
    'issueDate',
    parseDateTime(exchanged?.issueDateTime, ctx.sink, ['CrossIndustryInvoice', 'ExchangedDocument', 'IssueDateTime']),
  );
  const dueDate = convertDueDate(settlement, ctx, SETTLEMENT_PATH);
  const dueDateOnHeader = kind === 'Invoice' || ctx.capabilities.creditNoteDueDate === 'header';
  if (dueDateOnHeader) {
    assignDefined(document, 'dueDate', dueDate);
  }
  const typeCode = valueOf(exchanged?.typeCode)?.trim();
  if (document.kind === 'Invoice') {
    assignDefined(document, 'invoiceTypeCode', typeCode);
  } else {
    assignDefined(document, 'creditNoteTypeCode', typeCode);
  }

  assignDefined(document, 'taxPointDate', convertTaxPointDate(settlement, ctx, SETTLEMENT_PATH));
  assignDefined(document, 'documentCurrencyCode', valueOf(settlement.invoiceCurrencyCode));
  assignDefined(document, 'taxCurrencyCode', valueOf(settlement.taxCurrencyCode));
  assignDefined(document, 'accountingCost', firstAccountingCost(settlement.receivableAccountingAccounts));
  assignDefined(document, 'buyerReference', valueOf(agreement.buyerReference));

  const invoicePeriod = convertInvoicePeriod(settlement, ctx, SETTLEMENT_PATH);
  if (invoicePeriod) {
    document.invoicePeriods.push(invoicePeriod);
  }
  assignDefined(document, 'orderReference', references.orderReference);

  if (agreement.seller) {
    document.accountingSupplierParty.party = convertParty(agreement.seller, 'seller', ctx);
  }
  if (agreement.buyer) {
    document.accountingCustomerParty.party = convertParty(agreement.buyer, 'buyer', ctx);
  }
  if (settlement.payee) {
    document.payeeParty = convertParty(settlement.payee, 'payee', ctx);
  }
  if (agreement.sellerTaxRepresentative) {
    document.taxRepresentativeParty = convertParty(agreement.sellerTaxRepresentative, 'tax-representative', ctx);
  }

  const deliveryInformation = convertDelivery(delivery, ctx, DELIVERY_PATH);
  if (deliveryInformation) {
    document.deliveries.push(deliveryInformation);
  }

  const effects: PaymentMeansEffect[] = [];
  const paymentMeansPath = [...SETTLEMENT_PATH, 'SpecifiedTradeSettlementPaymentMeans'];
  for (const means of settlement.paymentMeans) {
    const converted = convertPaymentMeans(means, settlement, ctx, paymentMeansPath);
    effects.push(...converted.effects);
    if (converted.paymentMeans) {
      document.paymentMeans.push(withDueDate(converted.paymentMeans, dueDateOnHeader ? undefined : dueDate));
    }
  }
  applyPaymentMeansEffects(document, effects);

  document.allowanceCharges = convertAllowanceCharges(settlement.allowanceCharges, ctx, [
    ...SETTLEMENT_PATH,
    'SpecifiedTradeAllowanceCharge',
  ]);
  document.taxTotals = buildTaxTotals(settlement, ctx);
  document.legalMonetaryTotal = buildMonetaryTotal(settlement.monetarySummation, ctx);

  const lineItems = source.transaction?.lineItems ?? [];
  lineItems.forEach((lineItem, index) => {
    const { line, quantity } = convertLine(lineItem, index, ctx);
    if (document.kind === 'Invoice') {
      document.invoiceLines.push(quantity ? { ...line, invoicedQuantity: quantity } : line);
    } else {
      document.creditNoteLines.push(quantity ? { ...line, creditedQuantity: quantity } : line);
    }
  });

  return document;
}

/**
 * CreditNote on UBL versions without a header due date carries it per payment means
 */
function withDueDate(paymentMeans: UblPaymentMeans, dueDate: string | undefined): UblPaymentMeans {
  return dueDate === undefined ? paymentMeans : { ...paymentMeans, paymentDueDate: dueDate };
}
