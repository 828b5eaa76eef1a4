/**
 * Tests for CII detection
 */

import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { detectCiiDocument } from './detect-cii.js';
import { CII_NAMESPACES } from './types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixturesDir = join(__dirname, '..', 'fixtures');

describe('detectCiiDocument', () => {
  it('should detect a CII invoice and its guideline', () => {
    const xml = readFileSync(join(fixturesDir, 'cii-invoice-full.xml'), 'utf-8');
    const result = detectCiiDocument(xml);

    expect(result.isCii).toBe(true);
    expect(result.rootElement).toBe('rsm:CrossIndustryInvoice');
    expect(result.namespace).toBe(CII_NAMESPACES.RSM);
    expect(result.guidelineId).toBe('urn:cen.eu:en16931:2017#compliant#urn:xeinkauf.de:kosit:xrechnung_3.0');
    expect(result.diagnostics).toHaveLength(0);
  });

  it('should read the EN 16931 core guideline', () => {
    const xml = readFileSync(join(fixturesDir, 'cii-invoice-minimal.xml'), 'utf-8');
    const result = detectCiiDocument(xml);

    expect(result.guidelineId).toBe('urn:cen.eu:en16931:2017');
  });

  it('should reject empty content', () => {
    const result = detectCiiDocument('   ');

    expect(result.isCii).toBe(false);
    expect(result.diagnostics[0]?.code).toBe('CII-EMPTY-INPUT');
    expect(result.diagnostics[0]?.severity).toBe('error');
  });

  it('should reject non-XML content', () => {
    const result = detectCiiDocument('{"invoice": true}');

    expect(result.isCii).toBe(false);
    expect(result.diagnostics[0]?.code).toBe('CII-NOT-XML');
  });

  it('should reject a UBL invoice', () => {
    const xml = '<?xml version="1.0"?><Invoice xmlns="urn:oasis:names:specification:ubl:schema:xsd:Invoice-2"/>';
    const result = detectCiiDocument(xml);

    expect(result.isCii).toBe(false);
    expect(result.rootElement).toBe('Invoice');
    expect(result.diagnostics[0]?.code).toBe('CII-UNSUPPORTED-ROOT');
    expect(result.diagnostics[0]?.message).toBe("Unsupported root element 'Invoice'");
  });

  it('should skip comments before the root element', () => {
    const xml =
      '<?xml version="1.0"?>\n<!-- exported -->\n<rsm:CrossIndustryInvoice xmlns:rsm="urn:un:unece:uncefact:data:standard:CrossIndustryInvoice:100"/>';
    const result = detectCiiDocument(xml);

    expect(result.isCii).toBe(true);
    expect(result.guidelineId).toBeUndefined();
  });

  it('should skip processing instructions and a DOCTYPE before the root element', () => {
    const xml = [
      '<?xml version="1.0" encoding="UTF-8"?>',
      '<?xml-stylesheet type="text/xsl" href="view.xsl"?>',
      '<!-- exported -->',
      '<!DOCTYPE rsm:CrossIndustryInvoice [ <!ENTITY test "x"> ]>',
      '<?producer version="2"?>',
      `<rsm:CrossIndustryInvoice xmlns:rsm="${CII_NAMESPACES.RSM}"/>`,
    ].join('\n');
    const result = detectCiiDocument(xml);

    expect(result.isCii).toBe(true);
    expect(result.rootElement).toBe('rsm:CrossIndustryInvoice');
    expect(result.diagnostics).toEqual([]);
  });

  it('should warn on an unexpected root namespace', () => {
    const xml = '<CrossIndustryInvoice xmlns="urn:example:other"/>';
    const result = detectCiiDocument(xml);

    expect(result.isCii).toBe(true);
    expect(result.namespace).toBe('urn:example:other');
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]?.code).toBe('CII-UNEXPECTED-NAMESPACE');
    expect(result.diagnostics[0]?.severity).toBe('warning');
  });
});
