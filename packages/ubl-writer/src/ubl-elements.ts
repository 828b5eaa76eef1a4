/**
 * Builders for the UBL aggregate (cac) and basic (cbc) elements.
 *
 * Each builder returns the fast-xml-parser builder representation of one
 * element. Child keys are inserted in UBL schema sequence order; the builder
 * writes them in insertion order.
 */

import type {
  Amount,
  BinaryObject,
  Code,
  Identifier,
  Quantity,
  Text,
  UblAddress,
  UblAllowanceCharge,
  UblCountry,
  UblDelivery,
  UblDocumentReference,
  UblFinancialAccount,
  UblItem,
  UblParty,
  UblPaymentMeans,
  UblPaymentTerms,
  UblPeriod,
  UblPrice,
  UblTaxCategory,
  UblTaxTotal,
  UblMonetaryTotal,
} from '@invoice-bridge/contracts';

export const TEXT_KEY = '#text';
export const ATTRIBUTE_PREFIX = '@_';

/**
 * Builder representation of an element: attributes under '@_name',
 * text under '#text', children under their qualified names
 */
export type XmlElement = { [name: string]: XmlContent };
export type XmlContent = string | XmlElement | XmlElement[] | string[];

/**
 * Set a child when it has content; empty arrays are skipped
 */
export function put(element: XmlElement, name: string, value: XmlContent | undefined): void {
  if (value === undefined) {
    return;
  }
  if (Array.isArray(value) && value.length === 0) {
    return;
  }
  element[name] = value;
}

function withAttributes(value: string, attributes: Record<string, string | undefined>): XmlElement | string {
  const element: XmlElement = {};
  for (const [name, attributeValue] of Object.entries(attributes)) {
    if (attributeValue !== undefined) {
      element[`${ATTRIBUTE_PREFIX}${name}`] = attributeValue;
    }
  }
  if (Object.keys(element).length === 0) {
    return value;
  }
  element[TEXT_KEY] = value;
  return element;
}

export function identifier(id: Identifier | undefined): XmlElement | string | undefined {
  if (!id) {
    return undefined;
  }
  return withAttributes(id.value, {
    schemeID: id.schemeId,
    schemeName: id.schemeName,
    schemeAgencyID: id.schemeAgencyId,
    schemeAgencyName: id.schemeAgencyName,
    schemeVersionID: id.schemeVersionId,
    schemeDataURI: id.schemeDataUri,
    schemeURI: id.schemeUri,
  });
}

export function text(value: Text | undefined): XmlElement | string | undefined {
  if (!value) {
    return undefined;
  }
  return withAttributes(value.value, {
    languageID: value.languageId,
    languageLocaleID: value.languageLocaleId,
  });
}

export function code(value: Code | undefined): XmlElement | string | undefined {
  if (!value) {
    return undefined;
  }
  return withAttributes(value.value, {
    listID: value.listId,
    listAgencyID: value.listAgencyId,
    listAgencyName: value.listAgencyName,
    listName: value.listName,
    listVersionID: value.listVersionId,
    name: value.name,
    languageID: value.languageId,
    listURI: value.listUri,
    listSchemeURI: value.listSchemeUri,
  });
}

export function amount(value: Amount | undefined): XmlElement | string | undefined {
  if (!value) {
    return undefined;
  }
  return withAttributes(value.value, {
    currencyID: value.currencyId,
    currencyCodeListVersionID: value.currencyCodeListVersionId,
  });
}

export function quantity(value: Quantity | undefined): XmlElement | string | undefined {
  if (!value) {
    return undefined;
  }
  return withAttributes(value.value, {
    unitCode: value.unitCode,
    unitCodeListID: value.unitCodeListId,
    unitCodeListAgencyID: value.unitCodeListAgencyId,
    unitCodeListAgencyName: value.unitCodeListAgencyName,
  });
}

function binaryObject(value: BinaryObject | undefined): XmlElement | string | undefined {
  if (!value) {
    return undefined;
  }
  return withAttributes(value.value, { mimeCode: value.mimeCode, filename: value.filename });
}

/**
 * Repeated simple elements; text-only and attributed values may be mixed
 */
export function list<T>(values: readonly T[], build: (value: T) => XmlElement | string | undefined): XmlElement[] {
  const elements: XmlElement[] = [];
  for (const value of values) {
    const built = build(value);
    if (built !== undefined) {
      elements.push(typeof built === 'string' ? { [TEXT_KEY]: built } : built);
    }
  }
  return elements;
}

function ids(value: Identifier | undefined): XmlElement | undefined {
  const id = identifier(value);
  if (id === undefined) {
    return undefined;
  }
  return { 'cbc:ID': id };
}

export function period(value: UblPeriod): XmlElement {
  const element: XmlElement = {};
  put(element, 'cbc:StartDate', value.startDate);
  put(element, 'cbc:EndDate', value.endDate);
  put(element, 'cbc:DescriptionCode', value.descriptionCodes);
  return element;
}

export function documentReference(value: UblDocumentReference): XmlElement {
  const element: XmlElement = {};
  put(element, 'cbc:ID', identifier(value.id));
  put(element, 'cbc:IssueDate', value.issueDate);
  put(element, 'cbc:DocumentTypeCode', value.documentTypeCode);
  put(element, 'cbc:DocumentDescription', list(value.documentDescriptions, text));
  if (value.attachment) {
    const attachment: XmlElement = {};
    put(attachment, 'cbc:EmbeddedDocumentBinaryObject', binaryObject(value.attachment.embeddedDocumentBinaryObject));
    if (value.attachment.externalReferenceUri !== undefined) {
      attachment['cac:ExternalReference'] = { 'cbc:URI': value.attachment.externalReferenceUri };
    }
    element['cac:Attachment'] = attachment;
  }
  return element;
}

function country(value: UblCountry | undefined): XmlElement | undefined {
  if (!value) {
    return undefined;
  }
  const element: XmlElement = {};
  put(element, 'cbc:IdentificationCode', value.identificationCode);
  put(element, 'cbc:Name', text(value.name));
  return element;
}

export function address(value: UblAddress | undefined): XmlElement | undefined {
  if (!value) {
    return undefined;
  }
  const element: XmlElement = {};
  put(element, 'cbc:StreetName', value.streetName);
  put(element, 'cbc:AdditionalStreetName', value.additionalStreetName);
  put(element, 'cbc:CityName', value.cityName);
  put(element, 'cbc:PostalZone', value.postalZone);
  put(element, 'cbc:CountrySubentity', value.countrySubentity);
  put(
    element,
    'cac:AddressLine',
    value.addressLines.map((line) => ({ 'cbc:Line': line })),
  );
  put(element, 'cac:Country', country(value.country));
  return element;
}

export function party(value: UblParty): XmlElement {
  const element: XmlElement = {};
  put(element, 'cbc:EndpointID', identifier(value.endpointId));
  put(
    element,
    'cac:PartyIdentification',
    value.partyIdentifications.map((id) => ({ 'cbc:ID': identifier(id) ?? id.value })),
  );
  put(
    element,
    'cac:PartyName',
    value.partyNames.map((name) => ({ 'cbc:Name': text(name) ?? name.value })),
  );
  put(element, 'cac:PostalAddress', address(value.postalAddress));
  put(
    element,
    'cac:PartyTaxScheme',
    value.partyTaxSchemes.map((taxScheme) => ({
      'cbc:CompanyID': taxScheme.companyId,
      'cac:TaxScheme': { 'cbc:ID': taxScheme.taxScheme.id },
    })),
  );
  put(
    element,
    'cac:PartyLegalEntity',
    value.partyLegalEntities.map((legalEntity) => {
      const legalEntityElement: XmlElement = {};
      put(legalEntityElement, 'cbc:RegistrationName', legalEntity.registrationName);
      put(legalEntityElement, 'cbc:CompanyID', identifier(legalEntity.companyId));
      put(legalEntityElement, 'cbc:CompanyLegalForm', legalEntity.companyLegalForms);
      return legalEntityElement;
    }),
  );
  if (value.contact) {
    const contact: XmlElement = {};
    put(contact, 'cbc:Name', text(value.contact.name));
    put(contact, 'cbc:Telephone', value.contact.telephone);
    put(contact, 'cbc:ElectronicMail', value.contact.electronicMail);
    element['cac:Contact'] = contact;
  }
  return element;
}

export function delivery(value: UblDelivery): XmlElement {
  const element: XmlElement = {};
  put(element, 'cbc:ActualDeliveryDate', value.actualDeliveryDate);
  if (value.deliveryLocation) {
    const location: XmlElement = {};
    put(location, 'cbc:ID', identifier(value.deliveryLocation.id));
    put(location, 'cac:Address', address(value.deliveryLocation.address));
    element['cac:DeliveryLocation'] = location;
  }
  if (value.deliveryParty) {
    element['cac:DeliveryParty'] = party(value.deliveryParty);
  }
  return element;
}

function financialAccount(value: UblFinancialAccount | undefined): XmlElement | undefined {
  if (!value) {
    return undefined;
  }
  const element: XmlElement = {};
  put(element, 'cbc:ID', identifier(value.id));
  put(element, 'cbc:Name', text(value.name));
  put(element, 'cac:FinancialInstitutionBranch', ids(value.financialInstitutionBranchId));
  return element;
}

export function paymentMeans(value: UblPaymentMeans): XmlElement {
  const element: XmlElement = {};
  element['cbc:PaymentMeansCode'] = withAttributes(value.paymentMeansCode.value, {
    name: value.paymentMeansCode.name,
  });
  put(element, 'cbc:PaymentDueDate', value.paymentDueDate);
  put(element, 'cbc:PaymentID', value.paymentIds);
  if (value.cardAccount) {
    const card: XmlElement = {};
    put(card, 'cbc:PrimaryAccountNumberID', identifier(value.cardAccount.primaryAccountNumberId));
    put(card, 'cbc:NetworkID', value.cardAccount.networkId);
    put(card, 'cbc:HolderName', value.cardAccount.holderName);
    element['cac:CardAccount'] = card;
  }
  put(element, 'cac:PayeeFinancialAccount', financialAccount(value.payeeFinancialAccount));
  if (value.paymentMandate) {
    const mandate: XmlElement = {};
    put(mandate, 'cbc:ID', identifier(value.paymentMandate.id));
    put(mandate, 'cac:PayerFinancialAccount', financialAccount(value.paymentMandate.payerFinancialAccount));
    element['cac:PaymentMandate'] = mandate;
  }
  return element;
}

export function paymentTerms(value: UblPaymentTerms): XmlElement {
  const element: XmlElement = {};
  put(element, 'cbc:Note', list(value.notes, text));
  return element;
}

export function taxCategory(value: UblTaxCategory): XmlElement {
  const element: XmlElement = {};
  put(element, 'cbc:ID', value.id);
  put(element, 'cbc:Percent', value.percent);
  put(element, 'cbc:TaxExemptionReasonCode', value.taxExemptionReasonCode);
  put(element, 'cbc:TaxExemptionReason', list(value.taxExemptionReasons, text));
  element['cac:TaxScheme'] = { 'cbc:ID': value.taxScheme.id };
  return element;
}

export function allowanceCharge(value: UblAllowanceCharge): XmlElement {
  const element: XmlElement = {};
  element['cbc:ChargeIndicator'] = value.chargeIndicator ? 'true' : 'false';
  put(element, 'cbc:AllowanceChargeReasonCode', value.allowanceChargeReasonCode);
  put(element, 'cbc:AllowanceChargeReason', value.allowanceChargeReasons);
  put(element, 'cbc:MultiplierFactorNumeric', value.multiplierFactorNumeric);
  put(element, 'cbc:Amount', amount(value.amount));
  put(element, 'cbc:BaseAmount', amount(value.baseAmount));
  put(element, 'cac:TaxCategory', value.taxCategories.map(taxCategory));
  return element;
}

export function taxTotal(value: UblTaxTotal): XmlElement {
  const element: XmlElement = {};
  put(element, 'cbc:TaxAmount', amount(value.taxAmount));
  put(
    element,
    'cac:TaxSubtotal',
    value.taxSubtotals.map((subtotal) => {
      const subtotalElement: XmlElement = {};
      put(subtotalElement, 'cbc:TaxableAmount', amount(subtotal.taxableAmount));
      put(subtotalElement, 'cbc:TaxAmount', amount(subtotal.taxAmount));
      subtotalElement['cac:TaxCategory'] = taxCategory(subtotal.taxCategory);
      return subtotalElement;
    }),
  );
  return element;
}

export function monetaryTotal(value: UblMonetaryTotal): XmlElement {
  const element: XmlElement = {};
  put(element, 'cbc:LineExtensionAmount', amount(value.lineExtensionAmount));
  put(element, 'cbc:TaxExclusiveAmount', amount(value.taxExclusiveAmount));
  put(element, 'cbc:TaxInclusiveAmount', amount(value.taxInclusiveAmount));
  put(element, 'cbc:AllowanceTotalAmount', amount(value.allowanceTotalAmount));
  put(element, 'cbc:ChargeTotalAmount', amount(value.chargeTotalAmount));
  put(element, 'cbc:PrepaidAmount', amount(value.prepaidAmount));
  put(element, 'cbc:PayableRoundingAmount', amount(value.payableRoundingAmount));
  put(element, 'cbc:PayableAmount', amount(value.payableAmount));
  return element;
}

export function item(value: UblItem): XmlElement {
  const element: XmlElement = {};
  put(element, 'cbc:Description', list(value.descriptions, text));
  put(element, 'cbc:Name', text(value.name));
  put(element, 'cac:BuyersItemIdentification', ids(value.buyersItemId));
  put(element, 'cac:SellersItemIdentification', ids(value.sellersItemId));
  put(element, 'cac:StandardItemIdentification', ids(value.standardItemId));
  put(element, 'cac:OriginCountry', country(value.originCountry));
  put(
    element,
    'cac:CommodityClassification',
    value.commodityClassifications.map((classification) => ({
      'cbc:ItemClassificationCode': code(classification) ?? classification.value,
    })),
  );
  put(element, 'cac:ClassifiedTaxCategory', value.classifiedTaxCategories.map(taxCategory));
  put(
    element,
    'cac:AdditionalItemProperty',
    value.additionalItemProperties.map((property) => {
      const propertyElement: XmlElement = {};
      put(propertyElement, 'cbc:Name', text(property.name));
      put(propertyElement, 'cbc:Value', property.value);
      return propertyElement;
    }),
  );
  return element;
}

export function price(value: UblPrice | undefined): XmlElement | undefined {
  if (!value) {
    return undefined;
  }
  const element: XmlElement = {};
  put(element, 'cbc:PriceAmount', amount(value.priceAmount));
  put(element, 'cbc:BaseQuantity', quantity(value.baseQuantity));
  if (value.allowanceCharge) {
    element['cac:AllowanceCharge'] = allowanceCharge(value.allowanceCharge);
  }
  return element;
}
