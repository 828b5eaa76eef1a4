import type { CiiAllowanceCharge, UblAllowanceCharge } from '@invoice-bridge/contracts';
import { assignDefined } from '@invoice-bridge/shared';
import type { MappingContext } from '../mapping/context.js';
import { classifyAllowanceCharge } from '../mapping/indicator.js';
import { canonicalDecimal, copyAmount, valueOf } from '../mapping/primitives.js';
import { toTaxCategory } from '../mapping/tax-totals.js';

/**
 * Document or line level allowance/charge (BG-20, BG-21, BG-27, BG-28).
 * Entries whose indicator cannot be resolved are dropped.
 */
export function convertAllowanceCharge(
  source: CiiAllowanceCharge,
  ctx: MappingContext,
  path: readonly string[],
): UblAllowanceCharge | undefined {
  const kind = classifyAllowanceCharge(source, ctx.sink, path);
  if (kind === 'undetermined') {
    return undefined;
  }

  const result: UblAllowanceCharge = {
    chargeIndicator: kind === 'charge',
    allowanceChargeReasons: [],
    taxCategories: source.categoryTradeTaxes.map((tax) => toTaxCategory(tax, ctx.config.vatScheme)),
  };
  assignDefined(result, 'allowanceChargeReasonCode', valueOf(source.reasonCode));
  const reason = valueOf(source.reason);
  if (reason !== undefined) {
    result.allowanceChargeReasons.push(reason);
  }
  assignDefined(result, 'multiplierFactorNumeric', canonicalDecimal(source.calculationPercent));
  assignDefined(result, 'amount', copyAmount(source.actualAmounts[0], ctx.defaultCurrency));
  assignDefined(result, 'baseAmount', copyAmount(source.basisAmount, ctx.defaultCurrency));
  return result;
}

export function convertAllowanceCharges(
  sources: readonly CiiAllowanceCharge[],
  ctx: MappingContext,
  path: readonly string[],
): UblAllowanceCharge[] {
  const results: UblAllowanceCharge[] = [];
  for (const source of sources) {
    const converted = convertAllowanceCharge(source, ctx, path);
    if (converted) {
      results.push(converted);
    }
  }
  return results;
}
