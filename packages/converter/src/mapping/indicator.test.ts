import { describe, it, expect } from 'vitest';
import { DiagnosticSink } from '@invoice-bridge/shared';
import { classifyAllowanceCharge, resolveIndicator } from './indicator.js';

describe('resolveIndicator', () => {
  it('should prefer the boolean form', () => {
    expect(resolveIndicator({ indicator: true, indicatorString: 'false' })).toEqual({ ok: true, value: true });
    expect(resolveIndicator({ indicator: false })).toEqual({ ok: true, value: false });
  });

  it('should parse the string form case-sensitively', () => {
    expect(resolveIndicator({ indicatorString: 'true' })).toEqual({ ok: true, value: true });
    expect(resolveIndicator({ indicatorString: 'false' })).toEqual({ ok: true, value: false });

    const result = resolveIndicator({ indicatorString: 'TRUE' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('INDICATOR-INVALID');
      expect(result.error.message).toBe("Failed to parse the indicator value 'TRUE' to a boolean value.");
    }
  });

  it('should fail for an empty container instead of throwing', () => {
    const result = resolveIndicator({});

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('INDICATOR-EMPTY');
    }
  });

  it('should fail for a missing indicator', () => {
    const result = resolveIndicator(undefined);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('INDICATOR-MISSING');
    }
  });
});

describe('classifyAllowanceCharge', () => {
  const path = ['CrossIndustryInvoice', 'SupplyChainTradeTransaction', 'ApplicableHeaderTradeSettlement', 'SpecifiedTradeAllowanceCharge'];
  const base = { actualAmounts: [], categoryTradeTaxes: [] };

  it('should classify allowances and charges', () => {
    const sink = new DiagnosticSink('converter');

    expect(classifyAllowanceCharge({ ...base, chargeIndicator: { indicator: true } }, sink, path)).toBe('charge');
    expect(classifyAllowanceCharge({ ...base, chargeIndicator: { indicatorString: 'false' } }, sink, path)).toBe(
      'allowance',
    );
    expect(sink.diagnostics).toHaveLength(0);
  });

  it('should record the indicator failure and the classification failure', () => {
    const sink = new DiagnosticSink('converter');

    expect(classifyAllowanceCharge({ ...base, chargeIndicator: { indicatorString: 'yes' } }, sink, path)).toBe(
      'undetermined',
    );

    expect(sink.diagnostics.map((d) => d.code)).toEqual(['INDICATOR-INVALID', 'ALLOWANCE-CHARGE-UNDETERMINED']);
    expect(sink.diagnostics[0]?.path).toEqual([...path, 'ChargeIndicator']);
    expect(sink.diagnostics[1]).toMatchObject({
      message: 'Failed to determine if SpecifiedTradeAllowanceCharge is an Allowance or a Charge',
      path,
    });
  });

  it('should treat a missing indicator as undetermined', () => {
    const sink = new DiagnosticSink('converter');

    expect(classifyAllowanceCharge(base, sink, path)).toBe('undetermined');
    expect(sink.diagnostics.map((d) => d.code)).toEqual(['INDICATOR-MISSING', 'ALLOWANCE-CHARGE-UNDETERMINED']);
  });
});
