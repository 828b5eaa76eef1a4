/**
 * Header level fields that are not parties, references, payment or totals
 */

import type {
  CiiHeaderTradeDelivery,
  CiiHeaderTradeSettlement,
  ISODate,
  Text,
  UblDelivery,
  UblPaymentTerms,
  UblPeriod,
} from '@invoice-bridge/contracts';
import { assignDefined } from '@invoice-bridge/shared';
import type { MappingContext } from '../mapping/context.js';
import { parseDateTime } from '../mapping/dates.js';
import { firstPartyId } from '../mapping/party-identity.js';
import { copyText, valueOf } from '../mapping/primitives.js';
import { convertAddress } from './parties.js';

/**
 * UNTDID 2005 (CII due date type) to UNTDID 2475 (UBL period description):
 * 5 invoice date, 29 delivery date, 72 paid to date
 */
const DUE_DATE_TYPE_TO_DESCRIPTION: Readonly<Record<string, string>> = {
  '5': '3',
  '29': '35',
  '72': '432',
};

export function mapDueDateTypeCode(code: string): string {
  return DUE_DATE_TYPE_TO_DESCRIPTION[code] ?? code;
}

/**
 * BT-9: the first payment terms whose due date parses
 */
export function convertDueDate(
  settlement: CiiHeaderTradeSettlement,
  ctx: MappingContext,
  path: readonly string[],
): ISODate | undefined {
  for (const terms of settlement.paymentTerms) {
    const dueDate = parseDateTime(terms.dueDateTime, ctx.sink, [...path, 'SpecifiedTradePaymentTerms', 'DueDateDateTime']);
    if (dueDate !== undefined) {
      return dueDate;
    }
  }
  return undefined;
}

/**
 * BT-7: the first header trade tax whose tax point date parses
 */
export function convertTaxPointDate(
  settlement: CiiHeaderTradeSettlement,
  ctx: MappingContext,
  path: readonly string[],
): ISODate | undefined {
  for (const tax of settlement.tradeTaxes) {
    const taxPointDate = parseDateTime(tax.taxPointDate, ctx.sink, [...path, 'ApplicableTradeTax', 'TaxPointDate']);
    if (taxPointDate !== undefined) {
      return taxPointDate;
    }
  }
  return undefined;
}

/**
 * BG-14 plus BT-8 (value added tax point date code)
 */
export function convertInvoicePeriod(
  settlement: CiiHeaderTradeSettlement,
  ctx: MappingContext,
  path: readonly string[],
): UblPeriod | undefined {
  const period: UblPeriod = { descriptionCodes: [] };
  const billingPath = [...path, 'BillingSpecifiedPeriod'];
  assignDefined(
    period,
    'startDate',
    parseDateTime(settlement.billingPeriod?.startDateTime, ctx.sink, [...billingPath, 'StartDateTime']),
  );
  assignDefined(
    period,
    'endDate',
    parseDateTime(settlement.billingPeriod?.endDateTime, ctx.sink, [...billingPath, 'EndDateTime']),
  );
  const dueDateTypeCode = valueOf(settlement.tradeTaxes[0]?.dueDateTypeCode);
  if (dueDateTypeCode !== undefined) {
    period.descriptionCodes.push(mapDueDateTypeCode(dueDateTypeCode.trim()));
  }

  if (period.startDate === undefined && period.endDate === undefined && period.descriptionCodes.length === 0) {
    return undefined;
  }
  return period;
}

/**
 * BG-13 delivery information
 */
export function convertDelivery(
  delivery: CiiHeaderTradeDelivery,
  ctx: MappingContext,
  path: readonly string[],
): UblDelivery | undefined {
  const result: UblDelivery = {};
  assignDefined(
    result,
    'actualDeliveryDate',
    parseDateTime(delivery.actualDeliveryDateTime, ctx.sink, [
      ...path,
      'ActualDeliverySupplyChainEvent',
      'OccurrenceDateTime',
    ]),
  );

  const shipTo = delivery.shipTo;
  if (shipTo) {
    const locationId = firstPartyId(shipTo);
    const address = convertAddress(shipTo.postalAddress);
    if (locationId || address) {
      result.deliveryLocation = {};
      assignDefined(result.deliveryLocation, 'id', locationId);
      assignDefined(result.deliveryLocation, 'address', address);
    }
    const name = copyText(shipTo.name);
    if (name) {
      result.deliveryParty = {
        partyIdentifications: [],
        partyNames: [name],
        partyTaxSchemes: [],
        partyLegalEntities: [],
      };
    }
  }

  if (
    result.actualDeliveryDate === undefined &&
    result.deliveryLocation === undefined &&
    result.deliveryParty === undefined
  ) {
    return undefined;
  }
  return result;
}

/**
 * BT-20: one PaymentTerms per source terms entry that has a description
 */
export function convertPaymentTerms(settlement: CiiHeaderTradeSettlement): UblPaymentTerms[] {
  const result: UblPaymentTerms[] = [];
  for (const terms of settlement.paymentTerms) {
    const notes = terms.descriptions.map(copyText).filter((text): text is Text => text !== undefined);
    if (notes.length > 0) {
      result.push({ notes });
    }
  }
  return result;
}
