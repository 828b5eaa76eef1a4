/**
 * Indicator resolution (udt:IndicatorType)
 *
 * Every failure is a diagnostic; nothing here throws.
 */

import type { CiiAllowanceCharge, CiiIndicator, Result } from '@invoice-bridge/contracts';
import { createDiagnostic, type DiagnosticSink } from '@invoice-bridge/shared';
import { CONVERTER_SOURCE, fail, ok } from './context.js';

export type AllowanceChargeKind = 'allowance' | 'charge' | 'undetermined';

export function resolveIndicator(indicator: CiiIndicator | undefined): Result<boolean> {
  if (!indicator) {
    return fail(createDiagnostic(CONVERTER_SOURCE, 'error', 'INDICATOR-MISSING', 'The indicator is missing', 'field'));
  }
  if (indicator.indicator !== undefined) {
    return ok(indicator.indicator);
  }
  if (indicator.indicatorString !== undefined) {
    if (indicator.indicatorString === 'true') {
      return ok(true);
    }
    if (indicator.indicatorString === 'false') {
      return ok(false);
    }
    return fail(
      createDiagnostic(
        CONVERTER_SOURCE,
        'error',
        'INDICATOR-INVALID',
        `Failed to parse the indicator value '${indicator.indicatorString}' to a boolean value.`,
        'field',
        { context: { value: indicator.indicatorString } },
      ),
    );
  }
  return fail(
    createDiagnostic(
      CONVERTER_SOURCE,
      'error',
      'INDICATOR-EMPTY',
      'The indicator has neither a boolean nor a string value',
      'field',
    ),
  );
}

/**
 * Decide whether a trade allowance/charge is an allowance or a charge.
 * An undetermined entry gets two diagnostics: the indicator failure and the
 * classification failure.
 */
export function classifyAllowanceCharge(
  allowanceCharge: CiiAllowanceCharge,
  sink: DiagnosticSink,
  path: readonly string[],
): AllowanceChargeKind {
  const isCharge = resolveIndicator(allowanceCharge.chargeIndicator);
  if (isCharge.ok) {
    return isCharge.value ? 'charge' : 'allowance';
  }
  sink.add({ ...isCharge.error, path: [...path, 'ChargeIndicator'] });
  sink.error(
    'ALLOWANCE-CHARGE-UNDETERMINED',
    'Failed to determine if SpecifiedTradeAllowanceCharge is an Allowance or a Charge',
    'field',
    { path },
  );
  return 'undetermined';
}
