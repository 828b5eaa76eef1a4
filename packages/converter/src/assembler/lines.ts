/**
 * Invoice / credit note lines (BG-25)
 */

import type {
  Amount,
  CiiLineItem,
  CiiLineTradeAgreement,
  CiiTradeProduct,
  CiiTradeTax,
  Code,
  Quantity,
  UblAllowanceCharge,
  UblDocumentReference,
  UblInvoiceLine,
  UblItem,
  UblItemProperty,
  UblPeriod,
  UblPrice,
} from '@invoice-bridge/contracts';
import { assignDefined, hasText, isNegative } from '@invoice-bridge/shared';
import { PATHS, type MappingContext } from '../mapping/context.js';
import { parseDateTime } from '../mapping/dates.js';
import { copyAmount, copyCode, copyIdentifier, copyQuantity, copyText, valueOf } from '../mapping/primitives.js';
import { normalizeQuantityAndPriceSigns } from '../mapping/sign-normalizer.js';
import { toTaxCategory } from '../mapping/tax-totals.js';
import { convertAllowanceCharges } from './allowance-charge.js';
import { convertNotes, firstAccountingCost } from './notes.js';
import { convertDocumentReference } from './references.js';

/**
 * A line without its quantity; the assembler adds it as InvoicedQuantity or
 * CreditedQuantity depending on the document type.
 */
export type LineContent = Omit<UblInvoiceLine, 'invoicedQuantity'>;

export interface ConvertedLine {
  line: LineContent;
  quantity?: Quantity;
}

export function convertItem(
  product: CiiTradeProduct | undefined,
  taxes: readonly CiiTradeTax[],
  ctx: MappingContext,
): UblItem {
  const item: UblItem = {
    descriptions: [],
    commodityClassifications: [],
    classifiedTaxCategories: taxes.map((tax) => toTaxCategory(tax, ctx.config.vatScheme)),
    additionalItemProperties: [],
  };
  if (!product) {
    return item;
  }

  const description = copyText(product.description);
  if (description) {
    item.descriptions.push(description);
  }
  assignDefined(item, 'name', copyText(product.names[0]));
  assignDefined(item, 'buyersItemId', copyIdentifier(product.buyerAssignedId));
  assignDefined(item, 'sellersItemId', copyIdentifier(product.sellerAssignedId));
  assignDefined(item, 'standardItemId', copyIdentifier(product.globalId));

  const origin = product.originCountry;
  if (origin) {
    const identificationCode = valueOf(origin.id);
    const name = copyText(origin.names[0]);
    if (identificationCode !== undefined || name) {
      item.originCountry = {};
      assignDefined(item.originCountry, 'identificationCode', identificationCode);
      assignDefined(item.originCountry, 'name', name);
    }
  }

  item.commodityClassifications = product.classifications
    .map((classification) => copyCode(classification.classCode))
    .filter((code): code is Code => code !== undefined);

  for (const characteristic of product.characteristics) {
    const name = copyText(characteristic.descriptions[0]);
    if (!name) {
      continue;
    }
    const property: UblItemProperty = { name };
    assignDefined(property, 'value', valueOf(characteristic.values[0]));
    item.additionalItemProperties.push(property);
  }
  return item;
}

/**
 * Net price with base quantity and the gross price discount (BG-29).
 * Absent when there is no net price amount.
 */
export function convertPrice(agreement: CiiLineTradeAgreement | undefined, ctx: MappingContext): UblPrice | undefined {
  const net = agreement?.netPrice;
  const gross = agreement?.grossPrice;
  const priceAmount = copyAmount(net?.chargeAmounts[0], ctx.defaultCurrency);
  if (!net || !priceAmount) {
    return undefined;
  }
  const price: UblPrice = { priceAmount };

  // The gross price quantity wins; the unit code is only ever taken from the gross price
  const grossUnit = gross?.basisQuantity?.unitCode;
  const baseQuantity = copyQuantity(gross?.basisQuantity ?? net.basisQuantity);
  if (baseQuantity) {
    if (hasText(grossUnit)) {
      baseQuantity.unitCode = grossUnit.trim();
    } else {
      delete baseQuantity.unitCode;
    }
    price.baseQuantity = baseQuantity;
  }

  const discount = copyAmount(gross?.appliedAllowanceCharges[0]?.actualAmounts[0], ctx.defaultCurrency);
  const grossBase = copyAmount(gross?.chargeAmounts[0], ctx.defaultCurrency);
  if (discount || grossBase) {
    const allowance: UblAllowanceCharge = {
      chargeIndicator: false,
      allowanceChargeReasons: [],
      amount: discount ?? zeroAmount(ctx.defaultCurrency),
      taxCategories: [],
    };
    assignDefined(allowance, 'baseAmount', grossBase);
    price.allowanceCharge = allowance;
  }
  return price;
}

function zeroAmount(currency: string | undefined): Amount {
  const amount: Amount = { value: '0' };
  assignDefined(amount, 'currencyId', currency);
  return amount;
}

export function convertLine(source: CiiLineItem, index: number, ctx: MappingContext): ConvertedLine {
  const path = [...PATHS.transaction, `IncludedSupplyChainTradeLineItem[${index + 1}]`];
  const settlementPath = [...path, 'SpecifiedLineTradeSettlement'];
  const settlement = source.settlement;

  const documentReferences: UblDocumentReference[] = [];
  for (const document of settlement?.additionalReferencedDocuments ?? []) {
    const reference = convertDocumentReference(document, ctx, [...settlementPath, 'AdditionalReferencedDocument']);
    if (reference) {
      documentReferences.push(reference);
    }
  }

  const line: LineContent = {
    notes: convertNotes(source.documentLine?.notes ?? []),
    invoicePeriods: [],
    orderLineReferences: [],
    documentReferences,
    allowanceCharges: convertAllowanceCharges(settlement?.allowanceCharges ?? [], ctx, [
      ...settlementPath,
      'SpecifiedTradeAllowanceCharge',
    ]),
    item: convertItem(source.product, settlement?.tradeTaxes ?? [], ctx),
  };
  assignDefined(line, 'id', copyIdentifier(source.documentLine?.lineId));

  const lineExtensionAmount = copyAmount(settlement?.monetarySummation?.lineTotalAmounts[0], ctx.defaultCurrency);
  assignDefined(line, 'lineExtensionAmount', lineExtensionAmount);
  assignDefined(line, 'accountingCost', firstAccountingCost(settlement?.receivableAccountingAccounts ?? []));

  const period = settlement?.billingPeriod;
  if (period) {
    const invoicePeriod: UblPeriod = { descriptionCodes: [] };
    const periodPath = [...settlementPath, 'BillingSpecifiedPeriod'];
    assignDefined(invoicePeriod, 'startDate', parseDateTime(period.startDateTime, ctx.sink, [...periodPath, 'StartDateTime']));
    assignDefined(invoicePeriod, 'endDate', parseDateTime(period.endDateTime, ctx.sink, [...periodPath, 'EndDateTime']));
    if (invoicePeriod.startDate !== undefined || invoicePeriod.endDate !== undefined) {
      line.invoicePeriods.push(invoicePeriod);
    }
  }

  const orderLineId = copyIdentifier(source.agreement?.buyerOrder?.lineId);
  if (orderLineId) {
    line.orderLineReferences.push({ lineId: orderLineId });
  }

  const price = convertPrice(source.agreement, ctx);
  let quantity = copyQuantity(source.delivery?.billedQuantity);
  if (quantity) {
    const lineExtensionNegative = lineExtensionAmount ? isNegative(lineExtensionAmount.value) : false;
    const normalized = normalizeQuantityAndPriceSigns(
      price ? { lineExtensionNegative, quantity, price: price.priceAmount } : { lineExtensionNegative, quantity },
      ctx.config,
      ctx.sink,
      path,
    );
    quantity = normalized.quantity;
    if (price && normalized.price) {
      price.priceAmount = normalized.price;
    }
  }
  assignDefined(line, 'price', price);

  return quantity ? { line, quantity } : { line };
}
