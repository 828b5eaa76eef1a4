/**
 * Payment means classification (BG-16 to BG-19)
 *
 * Each CII payment means entry becomes zero or one UBL payment means. The
 * conversion is pure: changes that belong to other parts of the document
 * (the SEPA creditor reference on the seller) come back as effects for the
 * assembler to apply.
 */

import type {
  CiiHeaderTradeSettlement,
  CiiPaymentMeans,
  Identifier,
  Result,
  UblFinancialAccount,
  UblPaymentMandate,
  UblPaymentMeans,
} from '@invoice-bridge/contracts';
import { assignDefined, createDiagnostic, hasText } from '@invoice-bridge/shared';
import { CONVERTER_SOURCE, fail, ok, type MappingContext } from './context.js';
import { copyIdentifier, copyText, valueOf } from './primitives.js';

export type PaymentMeansClass = 'credit-transfer' | 'card' | 'direct-debit' | 'other';

export const SEPA_CREDITOR_SCHEME = 'SEPA';

export type PaymentMeansEffect = { type: 'add-seller-identifier'; identifier: Identifier };

export interface PaymentMeansConversion {
  paymentMeans?: UblPaymentMeans;
  effects: PaymentMeansEffect[];
}

// 30 credit transfer, 42 payment to bank account, 58 SEPA credit transfer
const CREDIT_TRANSFER_CODES: ReadonlySet<string> = new Set(['30', '42', '58']);
// 48 bank card
const CARD_CODES: ReadonlySet<string> = new Set(['48']);
// 49 direct debit, 59 SEPA direct debit
const DIRECT_DEBIT_CODES: ReadonlySet<string> = new Set(['49', '59']);

/**
 * Any non-empty code outside the known groups is accepted as 'other'.
 */
export function classifyPaymentMeansCode(code: string | undefined): Result<PaymentMeansClass> {
  if (!hasText(code)) {
    return fail(
      createDiagnostic(CONVERTER_SOURCE, 'error', 'PAYMENT-MEANS-CODE-MISSING', 'The payment means type code is missing', 'field'),
    );
  }
  const trimmed = code.trim();
  if (CREDIT_TRANSFER_CODES.has(trimmed)) {
    return ok('credit-transfer');
  }
  if (CARD_CODES.has(trimmed)) {
    return ok('card');
  }
  if (DIRECT_DEBIT_CODES.has(trimmed)) {
    return ok('direct-debit');
  }
  return ok('other');
}

export function convertPaymentMeans(
  means: CiiPaymentMeans,
  settlement: CiiHeaderTradeSettlement,
  ctx: MappingContext,
  path: readonly string[],
): PaymentMeansConversion {
  const classification = classifyPaymentMeansCode(means.typeCode?.value);
  if (!classification.ok) {
    ctx.sink.add({ ...classification.error, path });
    return { effects: [] };
  }

  const code = (means.typeCode?.value ?? '').trim();
  const paymentMeans: UblPaymentMeans = {
    paymentMeansCode: { value: code },
    paymentIds: settlement.paymentReferences
      .map(valueOf)
      .filter((id): id is string => id !== undefined),
  };
  assignDefined(paymentMeans.paymentMeansCode, 'name', valueOf(means.information[0]));

  switch (classification.value) {
    case 'credit-transfer':
      return convertCreditTransfer(paymentMeans, means, ctx, path);
    case 'card':
      return convertCard(paymentMeans, means, ctx, path);
    case 'direct-debit':
      return convertDirectDebit(paymentMeans, means, settlement);
    case 'other':
      return { paymentMeans, effects: [] };
  }
}

function convertCreditTransfer(
  paymentMeans: UblPaymentMeans,
  means: CiiPaymentMeans,
  ctx: MappingContext,
  path: readonly string[],
): PaymentMeansConversion {
  const accountId = copyIdentifier(means.payeeAccount?.ibanId) ?? copyIdentifier(means.payeeAccount?.proprietaryId);
  if (!accountId) {
    ctx.sink.error(
      'PAYMENT-MEANS-ACCOUNT-MISSING',
      `The payee financial account is missing for credit transfer payment means '${paymentMeans.paymentMeansCode.value}'`,
      'field',
      { path: [...path, 'PayeePartyCreditorFinancialAccount'], context: { typeCode: paymentMeans.paymentMeansCode.value } },
    );
    if (ctx.capabilities.creditTransferRequiresAccount) {
      return { effects: [] };
    }
    return { paymentMeans, effects: [] };
  }

  const account: UblFinancialAccount = { id: accountId };
  assignDefined(account, 'name', copyText(means.payeeAccount?.accountName));
  assignDefined(account, 'financialInstitutionBranchId', copyIdentifier(means.payeeInstitution?.bicId));
  paymentMeans.payeeFinancialAccount = account;
  return { paymentMeans, effects: [] };
}

function convertCard(
  paymentMeans: UblPaymentMeans,
  means: CiiPaymentMeans,
  ctx: MappingContext,
  path: readonly string[],
): PaymentMeansConversion {
  const cardPath = [...path, 'ApplicableTradeSettlementFinancialCard'];
  const card = means.financialCard;
  if (!card) {
    ctx.sink.error(
      'PAYMENT-MEANS-CARD-MISSING',
      "The element 'ApplicableTradeSettlementFinancialCard' is missing for Payment Card Information",
      'field',
      { path },
    );
    return { effects: [] };
  }

  const primaryAccountNumberId = copyIdentifier(card.id);
  if (!primaryAccountNumberId) {
    ctx.sink.error('PAYMENT-MEANS-CARD-NUMBER-MISSING', 'The Payment card primary account number is missing', 'field', {
      path: cardPath,
    });
    return { effects: [] };
  }
  // CII has no network id; it always comes from configuration
  const networkId = ctx.config.cardAccountNetworkId;
  if (!hasText(networkId)) {
    ctx.sink.error('PAYMENT-MEANS-CARD-NETWORK-MISSING', 'The Payment card network ID is missing', 'field', {
      path: cardPath,
    });
    return { effects: [] };
  }

  paymentMeans.cardAccount = { primaryAccountNumberId, networkId };
  assignDefined(paymentMeans.cardAccount, 'holderName', valueOf(card.cardholderName));
  return { paymentMeans, effects: [] };
}

function convertDirectDebit(
  paymentMeans: UblPaymentMeans,
  means: CiiPaymentMeans,
  settlement: CiiHeaderTradeSettlement,
): PaymentMeansConversion {
  const mandate: UblPaymentMandate = {};
  for (const terms of settlement.paymentTerms) {
    const mandateId = copyIdentifier(terms.directDebitMandateIds[0]);
    if (mandateId) {
      mandate.id = mandateId;
      break;
    }
  }

  const payerAccount: UblFinancialAccount = {};
  assignDefined(payerAccount, 'id', copyIdentifier(means.payerAccount?.ibanId));
  assignDefined(payerAccount, 'financialInstitutionBranchId', copyIdentifier(means.payerInstitution?.bicId));
  if (payerAccount.id !== undefined || payerAccount.financialInstitutionBranchId !== undefined) {
    mandate.payerFinancialAccount = payerAccount;
  }
  paymentMeans.paymentMandate = mandate;

  // Direct debit creditor is always taken to be the seller
  const effects: PaymentMeansEffect[] = [];
  const creditorReference = copyIdentifier(settlement.creditorReferenceId);
  if (creditorReference) {
    effects.push({
      type: 'add-seller-identifier',
      identifier: { ...creditorReference, schemeId: SEPA_CREDITOR_SCHEME },
    });
  }
  return { paymentMeans, effects };
}
