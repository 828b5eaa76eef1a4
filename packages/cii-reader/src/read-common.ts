/**
 * Readers for the CII aggregates shared by header and line level:
 * trade parties, referenced documents, trade taxes, allowances/charges and periods.
 */

import type {
  BinaryObject,
  CiiAccountingAccount,
  CiiAllowanceCharge,
  CiiNote,
  CiiPeriod,
  CiiReferencedDocument,
  CiiTaxRegistration,
  CiiTradeAddress,
  CiiTradeContact,
  CiiTradeParty,
  CiiTradeTax,
  Identifier,
} from '@invoice-bridge/contracts';
import { assignDefined } from '@invoice-bridge/shared';
import {
  readAmount,
  readAmounts,
  readBinaryObject,
  readCode,
  readDateTime,
  readDecimal,
  readIdentifier,
  readIdentifiers,
  readIndicator,
  readText,
  readTexts,
  type ReadContext,
} from './read-values.js';
import { child, children, descend, type XmlNode } from './xml-node.js';

export function readNotes(parent: XmlNode | undefined): CiiNote[] {
  return children(parent, 'IncludedNote').map((node) => {
    const note: CiiNote = { contents: readTexts(node, 'Content') };
    assignDefined(note, 'subjectCode', readCode(child(node, 'SubjectCode')));
    return note;
  });
}

function readAddress(node: XmlNode | undefined): CiiTradeAddress | undefined {
  if (!node) {
    return undefined;
  }
  const address: CiiTradeAddress = {
    countrySubDivisionNames: readTexts(node, 'CountrySubDivisionName'),
  };
  assignDefined(address, 'postcode', readCode(child(node, 'PostcodeCode')));
  assignDefined(address, 'lineOne', readText(child(node, 'LineOne')));
  assignDefined(address, 'lineTwo', readText(child(node, 'LineTwo')));
  assignDefined(address, 'lineThree', readText(child(node, 'LineThree')));
  assignDefined(address, 'cityName', readText(child(node, 'CityName')));
  assignDefined(address, 'countryId', readCode(child(node, 'CountryID')));
  return address;
}

function readContact(node: XmlNode): CiiTradeContact {
  const contact: CiiTradeContact = {};
  assignDefined(contact, 'personName', readText(child(node, 'PersonName')));
  assignDefined(contact, 'departmentName', readText(child(node, 'DepartmentName')));
  assignDefined(contact, 'telephone', readText(descend(node, 'TelephoneUniversalCommunication', 'CompleteNumber')));
  assignDefined(contact, 'email', readIdentifier(descend(node, 'EmailURIUniversalCommunication', 'URIID')));
  return contact;
}

export function readTradeParty(node: XmlNode | undefined): CiiTradeParty | undefined {
  if (!node) {
    return undefined;
  }
  const party: CiiTradeParty = {
    ids: readIdentifiers(node, 'ID'),
    globalIds: readIdentifiers(node, 'GlobalID'),
    descriptions: readTexts(node, 'Description'),
    contacts: children(node, 'DefinedTradeContact').map(readContact),
    uriCommunications: children(node, 'URIUniversalCommunication')
      .map((uc) => readIdentifier(child(uc, 'URIID')))
      .filter((id): id is Identifier => id !== undefined),
    taxRegistrations: children(node, 'SpecifiedTaxRegistration').map((registration) => {
      const taxRegistration: CiiTaxRegistration = {};
      assignDefined(taxRegistration, 'id', readIdentifier(child(registration, 'ID')));
      return taxRegistration;
    }),
  };
  assignDefined(party, 'name', readText(child(node, 'Name')));

  const legalOrganization = child(node, 'SpecifiedLegalOrganization');
  if (legalOrganization) {
    party.legalOrganization = {};
    assignDefined(party.legalOrganization, 'id', readIdentifier(child(legalOrganization, 'ID')));
    assignDefined(
      party.legalOrganization,
      'tradingBusinessName',
      readText(child(legalOrganization, 'TradingBusinessName')),
    );
  }

  assignDefined(party, 'postalAddress', readAddress(child(node, 'PostalTradeAddress')));
  return party;
}

export function readReferencedDocument(node: XmlNode | undefined): CiiReferencedDocument | undefined {
  if (!node) {
    return undefined;
  }
  const document: CiiReferencedDocument = {
    names: readTexts(node, 'Name'),
    attachmentBinaryObjects: children(node, 'AttachmentBinaryObject')
      .map(readBinaryObject)
      .filter((binary): binary is BinaryObject => binary !== undefined),
  };
  assignDefined(document, 'issuerAssignedId', readIdentifier(child(node, 'IssuerAssignedID')));
  assignDefined(document, 'uriId', readIdentifier(child(node, 'URIID')));
  assignDefined(document, 'lineId', readIdentifier(child(node, 'LineID')));
  assignDefined(document, 'typeCode', readCode(child(node, 'TypeCode')));
  assignDefined(document, 'referenceTypeCode', readCode(child(node, 'ReferenceTypeCode')));
  assignDefined(document, 'formattedIssueDateTime', readDateTime(child(node, 'FormattedIssueDateTime')));
  return document;
}

export function readReferencedDocuments(parent: XmlNode | undefined, element: string): CiiReferencedDocument[] {
  return children(parent, element)
    .map(readReferencedDocument)
    .filter((document): document is CiiReferencedDocument => document !== undefined);
}

export function readTradeTax(node: XmlNode, ctx: ReadContext): CiiTradeTax {
  const tax: CiiTradeTax = {
    calculatedAmounts: readAmounts(node, 'CalculatedAmount', ctx),
    basisAmounts: readAmounts(node, 'BasisAmount', ctx),
  };
  assignDefined(tax, 'typeCode', readCode(child(node, 'TypeCode')));
  assignDefined(tax, 'exemptionReason', readText(child(node, 'ExemptionReason')));
  assignDefined(tax, 'categoryCode', readCode(child(node, 'CategoryCode')));
  assignDefined(tax, 'exemptionReasonCode', readCode(child(node, 'ExemptionReasonCode')));
  assignDefined(tax, 'taxPointDate', readDateTime(child(node, 'TaxPointDate')));
  assignDefined(tax, 'dueDateTypeCode', readCode(child(node, 'DueDateTypeCode')));
  assignDefined(
    tax,
    'rateApplicablePercent',
    readDecimal(child(node, 'RateApplicablePercent'), 'RateApplicablePercent', ctx),
  );
  return tax;
}

export function readTradeTaxes(parent: XmlNode | undefined, element: string, ctx: ReadContext): CiiTradeTax[] {
  return children(parent, element).map((node) => readTradeTax(node, ctx));
}

export function readAllowanceCharge(node: XmlNode, ctx: ReadContext): CiiAllowanceCharge {
  const allowanceCharge: CiiAllowanceCharge = {
    actualAmounts: readAmounts(node, 'ActualAmount', ctx),
    categoryTradeTaxes: readTradeTaxes(node, 'CategoryTradeTax', ctx),
  };
  assignDefined(allowanceCharge, 'chargeIndicator', readIndicator(child(node, 'ChargeIndicator')));
  assignDefined(
    allowanceCharge,
    'calculationPercent',
    readDecimal(child(node, 'CalculationPercent'), 'CalculationPercent', ctx),
  );
  assignDefined(allowanceCharge, 'basisAmount', readAmount(child(node, 'BasisAmount'), 'BasisAmount', ctx));
  assignDefined(allowanceCharge, 'reasonCode', readCode(child(node, 'ReasonCode')));
  assignDefined(allowanceCharge, 'reason', readText(child(node, 'Reason')));
  return allowanceCharge;
}

export function readAllowanceCharges(
  parent: XmlNode | undefined,
  element: string,
  ctx: ReadContext,
): CiiAllowanceCharge[] {
  return children(parent, element).map((node) => readAllowanceCharge(node, ctx));
}

export function readPeriod(node: XmlNode | undefined): CiiPeriod | undefined {
  if (!node) {
    return undefined;
  }
  const period: CiiPeriod = {};
  assignDefined(period, 'startDateTime', readDateTime(child(node, 'StartDateTime')));
  assignDefined(period, 'endDateTime', readDateTime(child(node, 'EndDateTime')));
  return period;
}

export function readAccountingAccounts(parent: XmlNode | undefined): CiiAccountingAccount[] {
  return children(parent, 'ReceivableSpecifiedTradeAccountingAccount').map((node) => {
    const account: CiiAccountingAccount = {};
    assignDefined(account, 'id', readIdentifier(child(node, 'ID')));
    return account;
  });
}
