/**
 * Tax totals, tax categories and the legal monetary total
 */

import type {
  CiiHeaderMonetarySummation,
  CiiHeaderTradeSettlement,
  CiiTradeTax,
  UblMonetaryTotal,
  UblTaxCategory,
  UblTaxSubtotal,
  UblTaxTotal,
} from '@invoice-bridge/contracts';
import { assignDefined, isZero } from '@invoice-bridge/shared';
import type { MappingContext } from './context.js';
import { canonicalDecimal, copyAmount, copyText, valueOf } from './primitives.js';

export interface TaxCategoryOptions {
  /**
   * Copy the exemption reason code and text (tax subtotals only)
   */
  withExemption?: boolean;
}

export function toTaxCategory(tax: CiiTradeTax, vatScheme: string, options: TaxCategoryOptions = {}): UblTaxCategory {
  const category: UblTaxCategory = { taxExemptionReasons: [], taxScheme: { id: vatScheme } };
  assignDefined(category, 'id', valueOf(tax.categoryCode));
  assignDefined(category, 'percent', canonicalDecimal(tax.rateApplicablePercent));
  if (options.withExemption) {
    assignDefined(category, 'taxExemptionReasonCode', valueOf(tax.exemptionReasonCode));
    const reason = copyText(tax.exemptionReason);
    if (reason) {
      category.taxExemptionReasons.push(reason);
    }
  }
  return category;
}

/**
 * One tax total per summation tax total amount (one per currency), or a single
 * zero total in the document currency. Subtotals go to the first total.
 */
export function buildTaxTotals(settlement: CiiHeaderTradeSettlement, ctx: MappingContext): UblTaxTotal[] {
  const taxTotals: UblTaxTotal[] = [];
  for (const taxTotalAmount of settlement.monetarySummation?.taxTotalAmounts ?? []) {
    const taxAmount = copyAmount(taxTotalAmount, ctx.defaultCurrency);
    if (taxAmount) {
      taxTotals.push({ taxAmount, taxSubtotals: [] });
    }
  }

  let primary = taxTotals[0];
  if (!primary) {
    // At least one TaxTotal is mandatory
    primary = { taxAmount: { value: '0' }, taxSubtotals: [] };
    assignDefined(primary.taxAmount, 'currencyId', ctx.defaultCurrency);
    taxTotals.push(primary);
  }

  for (const tax of settlement.tradeTaxes) {
    const subtotal: UblTaxSubtotal = {
      taxCategory: toTaxCategory(tax, ctx.config.vatScheme, { withExemption: true }),
    };
    assignDefined(subtotal, 'taxableAmount', copyAmount(tax.basisAmounts[0], ctx.defaultCurrency));
    assignDefined(subtotal, 'taxAmount', copyAmount(tax.calculatedAmounts[0], ctx.defaultCurrency));
    primary.taxSubtotals.push(subtotal);
  }

  return taxTotals;
}

export function buildMonetaryTotal(
  summation: CiiHeaderMonetarySummation | undefined,
  ctx: MappingContext,
): UblMonetaryTotal {
  const total: UblMonetaryTotal = {};
  if (!summation) {
    return total;
  }
  const currency = ctx.defaultCurrency;
  assignDefined(total, 'lineExtensionAmount', copyAmount(summation.lineTotalAmounts[0], currency));
  assignDefined(total, 'taxExclusiveAmount', copyAmount(summation.taxBasisTotalAmounts[0], currency));
  assignDefined(total, 'taxInclusiveAmount', copyAmount(summation.grandTotalAmounts[0], currency));
  assignDefined(total, 'allowanceTotalAmount', copyAmount(summation.allowanceTotalAmounts[0], currency));
  assignDefined(total, 'chargeTotalAmount', copyAmount(summation.chargeTotalAmounts[0], currency));
  assignDefined(total, 'prepaidAmount', copyAmount(summation.totalPrepaidAmounts[0], currency));

  // Compatibility shim: older EN 16931 rule sets reject a zero PayableRoundingAmount
  const rounding = copyAmount(summation.roundingAmounts[0], currency);
  if (rounding && !isZero(rounding.value)) {
    total.payableRoundingAmount = rounding;
  }

  assignDefined(total, 'payableAmount', copyAmount(summation.duePayableAmounts[0], currency));
  return total;
}
