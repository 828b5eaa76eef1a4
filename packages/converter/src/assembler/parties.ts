/**
 * Trade parties (BG-4 seller, BG-7 buyer, BG-10 payee, BG-11 tax representative)
 */

import type {
  CiiTaxRegistration,
  CiiTradeAddress,
  CiiTradeContact,
  CiiTradeParty,
  UblAddress,
  UblContact,
  UblParty,
  UblPartyLegalEntity,
  UblPartyTaxScheme,
} from '@invoice-bridge/contracts';
import { assignDefined, hasText } from '@invoice-bridge/shared';
import type { MappingContext } from '../mapping/context.js';
import { allPartyIds, firstPartyId } from '../mapping/party-identity.js';
import { copyIdentifier, copyText, valueOf } from '../mapping/primitives.js';

export type PartyRole = 'seller' | 'buyer' | 'payee' | 'tax-representative';

const VAT_REGISTRATION_SCHEME = 'VA';

export function convertAddress(address: CiiTradeAddress | undefined): UblAddress | undefined {
  if (!address) {
    return undefined;
  }
  const result: UblAddress = { addressLines: [] };
  assignDefined(result, 'streetName', valueOf(address.lineOne));
  assignDefined(result, 'additionalStreetName', valueOf(address.lineTwo));
  assignDefined(result, 'cityName', valueOf(address.cityName));
  assignDefined(result, 'postalZone', valueOf(address.postcode));
  assignDefined(result, 'countrySubentity', valueOf(address.countrySubDivisionNames[0]));
  const lineThree = valueOf(address.lineThree);
  if (lineThree !== undefined) {
    result.addressLines.push(lineThree);
  }
  const countryCode = valueOf(address.countryId);
  if (countryCode !== undefined) {
    result.country = { identificationCode: countryCode };
  }
  return result;
}

/**
 * First contact only; the department stands in for a missing person name
 */
export function convertContact(contacts: readonly CiiTradeContact[]): UblContact | undefined {
  const contact = contacts[0];
  if (!contact) {
    return undefined;
  }
  const result: UblContact = {};
  assignDefined(result, 'name', copyText(contact.personName) ?? copyText(contact.departmentName));
  assignDefined(result, 'telephone', valueOf(contact.telephone));
  assignDefined(result, 'electronicMail', valueOf(contact.email));
  if (result.name === undefined && result.telephone === undefined && result.electronicMail === undefined) {
    return undefined;
  }
  return result;
}

/**
 * VAT registrations ('VA' or no scheme) use the configured VAT scheme id,
 * other registrations (e.g. 'FC' tax number) keep their scheme.
 */
export function convertTaxSchemes(
  registrations: readonly CiiTaxRegistration[],
  vatScheme: string,
): UblPartyTaxScheme[] {
  const schemes: UblPartyTaxScheme[] = [];
  for (const registration of registrations) {
    const id = copyIdentifier(registration.id);
    if (!id) {
      continue;
    }
    const scheme = id.schemeId?.trim();
    schemes.push({
      companyId: id.value,
      taxScheme: { id: !hasText(scheme) || scheme === VAT_REGISTRATION_SCHEME ? vatScheme : scheme },
    });
  }
  return schemes;
}

function convertLegalEntity(party: CiiTradeParty, ctx: MappingContext): UblPartyLegalEntity | undefined {
  const legalForms = party.descriptions
    .map(valueOf)
    .filter((form): form is string => form !== undefined);
  const entity: UblPartyLegalEntity = {
    companyLegalForms: ctx.capabilities.multipleCompanyLegalForms ? legalForms : legalForms.slice(0, 1),
  };
  assignDefined(entity, 'registrationName', valueOf(party.name));
  assignDefined(entity, 'companyId', copyIdentifier(party.legalOrganization?.id));
  if (entity.registrationName === undefined && entity.companyId === undefined && entity.companyLegalForms.length === 0) {
    return undefined;
  }
  return entity;
}

/**
 * Seller and buyer carry their name as the legal registration name and the
 * trading name as PartyName. Payee and tax representative only have a PartyName.
 */
export function convertParty(party: CiiTradeParty, role: PartyRole, ctx: MappingContext): UblParty {
  const result: UblParty = {
    partyIdentifications: [],
    partyNames: [],
    partyTaxSchemes: convertTaxSchemes(party.taxRegistrations, ctx.config.vatScheme),
    partyLegalEntities: [],
  };
  assignDefined(result, 'endpointId', copyIdentifier(party.uriCommunications[0]));

  if (role === 'seller') {
    result.partyIdentifications.push(...allPartyIds(party));
  } else {
    const id = firstPartyId(party);
    if (id) {
      result.partyIdentifications.push(id);
    }
  }

  if (role === 'seller' || role === 'buyer') {
    const tradingName = copyText(party.legalOrganization?.tradingBusinessName);
    if (tradingName) {
      result.partyNames.push(tradingName);
    }
    const legalEntity = convertLegalEntity(party, ctx);
    if (legalEntity) {
      result.partyLegalEntities.push(legalEntity);
    }
  } else {
    const name = copyText(party.name);
    if (name) {
      result.partyNames.push(name);
    }
  }

  assignDefined(result, 'postalAddress', convertAddress(party.postalAddress));
  assignDefined(result, 'contact', convertContact(party.contacts));
  return result;
}
