import { describe, it, expect } from 'vitest';
import type { CiiHeaderTradeSettlement, CiiPaymentMeans, ConversionConfigInput } from '@invoice-bridge/contracts';
import { DiagnosticSink } from '@invoice-bridge/shared';
import { resolveConversionConfig } from '../config/conversion-config.js';
import { CONVERTER_SOURCE, createMappingContext, type MappingContext } from './context.js';
import { classifyPaymentMeansCode, convertPaymentMeans } from './payment-means.js';

const PATH = ['CrossIndustryInvoice', 'SupplyChainTradeTransaction', 'ApplicableHeaderTradeSettlement', 'SpecifiedTradeSettlementPaymentMeans'];

function context(overrides: ConversionConfigInput = {}): MappingContext {
  return createMappingContext(resolveConversionConfig(overrides), new DiagnosticSink(CONVERTER_SOURCE), 'EUR');
}

function settlement(overrides: Partial<CiiHeaderTradeSettlement> = {}): CiiHeaderTradeSettlement {
  return {
    paymentReferences: [],
    paymentMeans: [],
    tradeTaxes: [],
    allowanceCharges: [],
    paymentTerms: [],
    receivableAccountingAccounts: [],
    ...overrides,
  };
}

function means(typeCode: string | undefined, overrides: Partial<CiiPaymentMeans> = {}): CiiPaymentMeans {
  const result: CiiPaymentMeans = { information: [], ...overrides };
  if (typeCode !== undefined) {
    result.typeCode = { value: typeCode };
  }
  return result;
}

describe('classifyPaymentMeansCode', () => {
  it.each([
    ['30', 'credit-transfer'],
    ['42', 'credit-transfer'],
    ['58', 'credit-transfer'],
    ['48', 'card'],
    ['49', 'direct-debit'],
    ['59', 'direct-debit'],
    ['57', 'other'],
    ['10', 'other'],
    ['ZZZ', 'other'],
  ])('should classify %s as %s', (code, expected) => {
    expect(classifyPaymentMeansCode(code)).toEqual({ ok: true, value: expected });
  });

  it('should reject a missing code', () => {
    const result = classifyPaymentMeansCode('');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('PAYMENT-MEANS-CODE-MISSING');
    }
  });
});

describe('convertPaymentMeans', () => {
  it('should build a credit transfer with IBAN, account name and BIC', () => {
    const ctx = context();
    const source = means('58', {
      information: [{ value: 'SEPA transfer' }],
      payeeAccount: { ibanId: { value: 'DE00000000000000000000' }, accountName: { value: 'Test Account' } },
      payeeInstitution: { bicId: { value: 'TESTDEFFXXX' } },
    });

    const result = convertPaymentMeans(source, settlement({ paymentReferences: [{ value: 'REF-1' }] }), ctx, PATH);

    expect(result.effects).toEqual([]);
    expect(result.paymentMeans).toEqual({
      paymentMeansCode: { value: '58', name: 'SEPA transfer' },
      paymentIds: ['REF-1'],
      payeeFinancialAccount: {
        id: { value: 'DE00000000000000000000' },
        name: { value: 'Test Account' },
        financialInstitutionBranchId: { value: 'TESTDEFFXXX' },
      },
    });
    expect(ctx.sink.diagnostics).toHaveLength(0);
  });

  it('should fall back to the proprietary account id', () => {
    const source = means('30', { payeeAccount: { proprietaryId: { value: 'ACC-77' } } });

    const result = convertPaymentMeans(source, settlement(), context(), PATH);

    expect(result.paymentMeans?.payeeFinancialAccount).toEqual({ id: { value: 'ACC-77' } });
  });

  it('should drop a credit transfer without account on UBL 2.3', () => {
    const ctx = context({ ublVersion: '2.3' });

    const result = convertPaymentMeans(means('30'), settlement(), ctx, PATH);

    expect(result.paymentMeans).toBeUndefined();
    expect(ctx.sink.diagnostics).toHaveLength(1);
    expect(ctx.sink.diagnostics[0]).toMatchObject({
      code: 'PAYMENT-MEANS-ACCOUNT-MISSING',
      severity: 'error',
      path: [...PATH, 'PayeePartyCreditorFinancialAccount'],
    });
  });

  it('should keep a credit transfer without the account on UBL 2.1', () => {
    const ctx = context({ ublVersion: '2.1' });

    const result = convertPaymentMeans(means('30'), settlement(), ctx, PATH);

    expect(result.paymentMeans).toEqual({ paymentMeansCode: { value: '30' }, paymentIds: [] });
    expect(ctx.sink.diagnostics.map((d) => d.code)).toEqual(['PAYMENT-MEANS-ACCOUNT-MISSING']);
  });

  it('should build a card account with the configured network id', () => {
    const ctx = context({ cardAccountNetworkId: 'TESTNET' });
    const source = means('48', { financialCard: { id: { value: '1234' }, cardholderName: { value: 'Card Holder' } } });

    const result = convertPaymentMeans(source, settlement(), ctx, PATH);

    expect(result.paymentMeans?.cardAccount).toEqual({
      primaryAccountNumberId: { value: '1234' },
      networkId: 'TESTNET',
      holderName: 'Card Holder',
    });
  });

  it('should drop a card payment without card block or number', () => {
    const ctx = context();

    expect(convertPaymentMeans(means('48'), settlement(), ctx, PATH).paymentMeans).toBeUndefined();
    expect(
      convertPaymentMeans(means('48', { financialCard: { id: { value: '' } } }), settlement(), ctx, PATH).paymentMeans,
    ).toBeUndefined();

    expect(ctx.sink.diagnostics.map((d) => d.message)).toEqual([
      "The element 'ApplicableTradeSettlementFinancialCard' is missing for Payment Card Information",
      'The Payment card primary account number is missing',
    ]);
  });

  it('should build a direct debit mandate and return the creditor reference as effect', () => {
    const source = means('59', {
      payerAccount: { ibanId: { value: 'DE11111111111111111111' } },
      payerInstitution: { bicId: { value: 'PAYERBIC' } },
    });
    const header = settlement({
      creditorReferenceId: { value: 'DE98ZZZ09999999999' },
      paymentTerms: [
        { descriptions: [], directDebitMandateIds: [] },
        { descriptions: [], directDebitMandateIds: [{ value: 'MANDATE-1' }] },
        { descriptions: [], directDebitMandateIds: [{ value: 'MANDATE-2' }] },
      ],
    });

    const result = convertPaymentMeans(source, header, context(), PATH);

    expect(result.paymentMeans?.paymentMandate).toEqual({
      id: { value: 'MANDATE-1' },
      payerFinancialAccount: {
        id: { value: 'DE11111111111111111111' },
        financialInstitutionBranchId: { value: 'PAYERBIC' },
      },
    });
    expect(result.effects).toEqual([
      { type: 'add-seller-identifier', identifier: { value: 'DE98ZZZ09999999999', schemeId: 'SEPA' } },
    ]);
  });

  it('should leave out the payer account when neither IBAN nor BIC exist', () => {
    const result = convertPaymentMeans(means('49'), settlement(), context(), PATH);

    expect(result.paymentMeans?.paymentMandate).toEqual({});
    expect(result.effects).toEqual([]);
  });

  it('should accept other codes as they are', () => {
    const ctx = context();

    const result = convertPaymentMeans(means('57'), settlement(), ctx, PATH);

    expect(result.paymentMeans).toEqual({ paymentMeansCode: { value: '57' }, paymentIds: [] });
    expect(ctx.sink.diagnostics).toHaveLength(0);
  });

  it('should drop an entry without type code', () => {
    const ctx = context();

    const result = convertPaymentMeans(means(undefined), settlement(), ctx, PATH);

    expect(result).toEqual({ effects: [] });
    expect(ctx.sink.diagnostics[0]).toMatchObject({ code: 'PAYMENT-MEANS-CODE-MISSING', path: PATH });
  });
});
