/**
 * Tests for UBL serialization
 */

import { describe, it, expect } from 'vitest';
import { XMLParser } from 'fast-xml-parser';
import type { UblCreditNote, UblInvoice, UblInvoiceLine } from '@invoice-bridge/contracts';
import { writeUblXml, UBL_NAMESPACES } from './write-ubl.js';

function createInvoice(overrides: Partial<UblInvoice> = {}): UblInvoice {
  return {
    kind: 'Invoice',
    id: 'INV-1',
    issueDate: '2024-01-15',
    invoiceTypeCode: '380',
    documentCurrencyCode: 'EUR',
    notes: [],
    invoicePeriods: [],
    billingReferences: [],
    despatchDocumentReferences: [],
    receiptDocumentReferences: [],
    originatorDocumentReferences: [],
    contractDocumentReferences: [],
    additionalDocumentReferences: [],
    projectReferences: [],
    accountingSupplierParty: {},
    accountingCustomerParty: {},
    deliveries: [],
    paymentMeans: [],
    paymentTerms: [],
    allowanceCharges: [],
    taxTotals: [],
    legalMonetaryTotal: { payableAmount: { value: '0.00', currencyId: 'EUR' } },
    invoiceLines: [],
    ...overrides,
  };
}

function createCreditNote(overrides: Partial<UblCreditNote> = {}): UblCreditNote {
  const { kind: _kind, invoiceTypeCode: _typeCode, invoiceLines: _lines, ...base } = createInvoice();
  return {
    ...base,
    kind: 'CreditNote',
    creditNoteTypeCode: '381',
    creditNoteLines: [],
    ...overrides,
  };
}

function createLine(): UblInvoiceLine {
  return {
    id: { value: '1' },
    notes: [],
    invoicedQuantity: { value: '5', unitCode: 'C62' },
    lineExtensionAmount: { value: '50.00', currencyId: 'EUR' },
    invoicePeriods: [],
    orderLineReferences: [{ lineId: { value: '10' } }],
    documentReferences: [],
    allowanceCharges: [],
    item: {
      descriptions: [],
      name: { value: 'Widget' },
      commodityClassifications: [{ value: '12345', listId: 'STI' }],
      classifiedTaxCategories: [
        { id: 'S', percent: '19', taxExemptionReasons: [], taxScheme: { id: 'VAT' } },
      ],
      additionalItemProperties: [{ name: { value: 'Colour' }, value: 'Blue' }],
    },
    price: { priceAmount: { value: '10.00', currencyId: 'EUR' } },
  };
}

function parse(xml: string): Record<string, unknown> {
  const parser = new XMLParser({ ignoreAttributes: false, removeNSPrefix: true, parseTagValue: false });
  const parsed: unknown = parser.parse(xml);
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error('Unparseable output');
  }
  return { ...parsed };
}

describe('writeUblXml', () => {
  it('should write the XML declaration and the Invoice namespaces', () => {
    const xml = writeUblXml(createInvoice(), { pretty: false });

    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?><Invoice ')).toBe(true);
    expect(xml).toContain(`xmlns="${UBL_NAMESPACES.INVOICE}"`);
    expect(xml).toContain(`xmlns:cac="${UBL_NAMESPACES.CAC}"`);
    expect(xml).toContain(`xmlns:cbc="${UBL_NAMESPACES.CBC}"`);
  });

  it('should write header values with their attributes', () => {
    const xml = writeUblXml(
      createInvoice({ notes: [{ value: 'Hello', languageId: 'en' }], dueDate: '2024-02-14' }),
      { pretty: false },
    );

    expect(xml).toContain('<cbc:ID>INV-1</cbc:ID>');
    expect(xml).toContain('<cbc:Note languageID="en">Hello</cbc:Note>');
    expect(xml).toContain('<cbc:PayableAmount currencyID="EUR">0.00</cbc:PayableAmount>');
  });

  it('should write Invoice header elements in schema order', () => {
    const xml = writeUblXml(
      createInvoice({
        customizationId: 'urn:example:customization',
        dueDate: '2024-02-14',
        notes: [{ value: 'Note' }],
        taxPointDate: '2024-01-10',
        buyerReference: 'BR-1',
      }),
      { pretty: false },
    );

    const order = [
      '<cbc:CustomizationID>',
      '<cbc:ID>',
      '<cbc:IssueDate>',
      '<cbc:DueDate>',
      '<cbc:InvoiceTypeCode>',
      '<cbc:Note>',
      '<cbc:TaxPointDate>',
      '<cbc:DocumentCurrencyCode>',
      '<cbc:BuyerReference>',
      '<cac:AccountingSupplierParty',
      '<cac:LegalMonetaryTotal>',
    ].map((tag) => xml.indexOf(tag));

    expect(order.every((position) => position >= 0)).toBe(true);
    expect([...order].sort((a, b) => a - b)).toEqual(order);
  });

  it('should write CreditNote header elements in schema order', () => {
    const xml = writeUblXml(
      createCreditNote({
        taxPointDate: '2024-01-10',
        notes: [{ value: 'Note' }],
        originatorDocumentReferences: [{ id: { value: 'TENDER-1' }, documentDescriptions: [] }],
        additionalDocumentReferences: [{ id: { value: 'DOC-1' }, documentDescriptions: [] }],
      }),
      { pretty: false },
    );

    expect(xml.startsWith(`<?xml version="1.0" encoding="UTF-8"?><CreditNote xmlns="${UBL_NAMESPACES.CREDIT_NOTE}"`)).toBe(
      true,
    );
    expect(xml.indexOf('<cbc:TaxPointDate>')).toBeLessThan(xml.indexOf('<cbc:CreditNoteTypeCode>'));
    expect(xml.indexOf('<cbc:CreditNoteTypeCode>')).toBeLessThan(xml.indexOf('<cbc:Note>'));
    expect(xml.indexOf('<cac:AdditionalDocumentReference>')).toBeLessThan(
      xml.indexOf('<cac:OriginatorDocumentReference>'),
    );
    expect(xml).not.toContain('InvoiceTypeCode');
  });

  it('should omit absent values and empty collections', () => {
    const xml = writeUblXml(createInvoice(), { pretty: false });

    expect(xml).not.toContain('cbc:DueDate');
    expect(xml).not.toContain('cac:InvoicePeriod');
    expect(xml).not.toContain('cac:PaymentMeans');
    expect(xml).not.toContain('cac:InvoiceLine');
  });

  it('should keep the party wrappers when there is no party', () => {
    const parsed = parse(writeUblXml(createInvoice(), { pretty: false }));
    const invoice = parsed['Invoice'];

    expect(invoice).toMatchObject({ AccountingSupplierParty: '', AccountingCustomerParty: '' });
  });

  it('should escape markup characters in text', () => {
    const xml = writeUblXml(createInvoice({ notes: [{ value: 'Terms & <conditions>' }] }), { pretty: false });

    expect(xml).toContain('<cbc:Note>Terms &amp; &lt;conditions&gt;</cbc:Note>');
  });

  it('should write parties', () => {
    const xml = writeUblXml(
      createInvoice({
        accountingSupplierParty: {
          party: {
            endpointId: { value: 'invoices@seller.example', schemeId: 'EM' },
            partyIdentifications: [{ value: 'SUP-1' }],
            partyNames: [{ value: 'Seller Trading' }],
            postalAddress: { cityName: 'Berlin', addressLines: [], country: { identificationCode: 'DE' } },
            partyTaxSchemes: [{ companyId: 'DE123456789', taxScheme: { id: 'VAT' } }],
            partyLegalEntities: [{ registrationName: 'Seller Corp', companyLegalForms: [] }],
            contact: { name: { value: 'Jane Doe' }, electronicMail: 'sales@seller.example' },
          },
        },
      }),
      { pretty: false },
    );

    expect(xml).toContain(
      '<cac:AccountingSupplierParty><cac:Party>' +
        '<cbc:EndpointID schemeID="EM">invoices@seller.example</cbc:EndpointID>' +
        '<cac:PartyIdentification><cbc:ID>SUP-1</cbc:ID></cac:PartyIdentification>' +
        '<cac:PartyName><cbc:Name>Seller Trading</cbc:Name></cac:PartyName>' +
        '<cac:PostalAddress><cbc:CityName>Berlin</cbc:CityName>' +
        '<cac:Country><cbc:IdentificationCode>DE</cbc:IdentificationCode></cac:Country></cac:PostalAddress>' +
        '<cac:PartyTaxScheme><cbc:CompanyID>DE123456789</cbc:CompanyID>' +
        '<cac:TaxScheme><cbc:ID>VAT</cbc:ID></cac:TaxScheme></cac:PartyTaxScheme>' +
        '<cac:PartyLegalEntity><cbc:RegistrationName>Seller Corp</cbc:RegistrationName></cac:PartyLegalEntity>' +
        '<cac:Contact><cbc:Name>Jane Doe</cbc:Name><cbc:ElectronicMail>sales@seller.example</cbc:ElectronicMail></cac:Contact>' +
        '</cac:Party></cac:AccountingSupplierParty>',
    );
  });

  it('should write payment means', () => {
    const xml = writeUblXml(
      createInvoice({
        paymentMeans: [
          {
            paymentMeansCode: { value: '58', name: 'SEPA transfer' },
            paymentIds: ['REF-1'],
            payeeFinancialAccount: {
              id: { value: 'DE00000000000000000000' },
              financialInstitutionBranchId: { value: 'TESTDEFFXXX' },
            },
          },
        ],
      }),
      { pretty: false },
    );

    expect(xml).toContain(
      '<cac:PaymentMeans><cbc:PaymentMeansCode name="SEPA transfer">58</cbc:PaymentMeansCode>' +
        '<cbc:PaymentID>REF-1</cbc:PaymentID>' +
        '<cac:PayeeFinancialAccount><cbc:ID>DE00000000000000000000</cbc:ID>' +
        '<cac:FinancialInstitutionBranch><cbc:ID>TESTDEFFXXX</cbc:ID></cac:FinancialInstitutionBranch>' +
        '</cac:PayeeFinancialAccount></cac:PaymentMeans>',
    );
  });

  it('should write allowances and charges with a boolean indicator', () => {
    const xml = writeUblXml(
      createInvoice({
        allowanceCharges: [
          {
            chargeIndicator: false,
            allowanceChargeReasonCode: '95',
            allowanceChargeReasons: ['Discount'],
            amount: { value: '5.00', currencyId: 'EUR' },
            taxCategories: [{ id: 'S', percent: '19', taxExemptionReasons: [], taxScheme: { id: 'VAT' } }],
          },
        ],
      }),
      { pretty: false },
    );

    expect(xml).toContain(
      '<cac:AllowanceCharge><cbc:ChargeIndicator>false</cbc:ChargeIndicator>' +
        '<cbc:AllowanceChargeReasonCode>95</cbc:AllowanceChargeReasonCode>' +
        '<cbc:AllowanceChargeReason>Discount</cbc:AllowanceChargeReason>' +
        '<cbc:Amount currencyID="EUR">5.00</cbc:Amount>' +
        '<cac:TaxCategory><cbc:ID>S</cbc:ID><cbc:Percent>19</cbc:Percent>' +
        '<cac:TaxScheme><cbc:ID>VAT</cbc:ID></cac:TaxScheme></cac:TaxCategory></cac:AllowanceCharge>',
    );
  });

  it('should write invoice lines', () => {
    const xml = writeUblXml(createInvoice({ invoiceLines: [createLine()] }), { pretty: false });

    expect(xml).toContain(
      '<cac:InvoiceLine><cbc:ID>1</cbc:ID>' +
        '<cbc:InvoicedQuantity unitCode="C62">5</cbc:InvoicedQuantity>' +
        '<cbc:LineExtensionAmount currencyID="EUR">50.00</cbc:LineExtensionAmount>' +
        '<cac:OrderLineReference><cbc:LineID>10</cbc:LineID></cac:OrderLineReference>' +
        '<cac:Item><cbc:Name>Widget</cbc:Name>' +
        '<cac:CommodityClassification><cbc:ItemClassificationCode listID="STI">12345</cbc:ItemClassificationCode></cac:CommodityClassification>' +
        '<cac:ClassifiedTaxCategory><cbc:ID>S</cbc:ID><cbc:Percent>19</cbc:Percent>' +
        '<cac:TaxScheme><cbc:ID>VAT</cbc:ID></cac:TaxScheme></cac:ClassifiedTaxCategory>' +
        '<cac:AdditionalItemProperty><cbc:Name>Colour</cbc:Name><cbc:Value>Blue</cbc:Value></cac:AdditionalItemProperty>' +
        '</cac:Item>' +
        '<cac:Price><cbc:PriceAmount currencyID="EUR">10.00</cbc:PriceAmount></cac:Price>' +
        '</cac:InvoiceLine>',
    );
  });

  it('should write credit note lines with a credited quantity', () => {
    const { invoicedQuantity: _quantity, ...line } = createLine();
    const xml = writeUblXml(
      createCreditNote({ creditNoteLines: [{ ...line, creditedQuantity: { value: '2', unitCode: 'C62' } }] }),
      { pretty: false },
    );

    expect(xml).toContain('<cac:CreditNoteLine><cbc:ID>1</cbc:ID><cbc:CreditedQuantity unitCode="C62">2</cbc:CreditedQuantity>');
  });

  it('should produce indented output that parses back', () => {
    const xml = writeUblXml(createInvoice({ invoiceLines: [createLine()] }));
    const parsed = parse(xml);

    expect(xml).toContain('\n');
    expect(parsed['Invoice']).toMatchObject({
      ID: 'INV-1',
      InvoiceLine: { Item: { Name: 'Widget' } },
    });
  });
});
