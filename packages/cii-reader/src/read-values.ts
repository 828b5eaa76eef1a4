/**
 * Readers for the CII unqualified/qualified data types (udt/qdt):
 * identifiers, texts, codes, amounts, quantities, date-times and indicators.
 */

import type {
  Amount,
  BinaryObject,
  CiiDateTime,
  CiiIndicator,
  Code,
  Identifier,
  Quantity,
  Text,
} from '@invoice-bridge/contracts';
import { assignDefined, isValidDecimalAmount, type DiagnosticSink } from '@invoice-bridge/shared';
import { attr, child, children, textOf, type XmlNode } from './xml-node.js';

/**
 * Per-read state shared by all readers
 */
export interface ReadContext {
  sink: DiagnosticSink;
}

export function readIdentifier(node: XmlNode | undefined): Identifier | undefined {
  if (!node) {
    return undefined;
  }
  const id: Identifier = { value: textOf(node) ?? '' };
  assignDefined(id, 'schemeId', attr(node, 'schemeID'));
  assignDefined(id, 'schemeName', attr(node, 'schemeName'));
  assignDefined(id, 'schemeAgencyId', attr(node, 'schemeAgencyID'));
  assignDefined(id, 'schemeAgencyName', attr(node, 'schemeAgencyName'));
  assignDefined(id, 'schemeVersionId', attr(node, 'schemeVersionID'));
  assignDefined(id, 'schemeDataUri', attr(node, 'schemeDataURI'));
  assignDefined(id, 'schemeUri', attr(node, 'schemeURI'));
  return id;
}

export function readText(node: XmlNode | undefined): Text | undefined {
  if (!node) {
    return undefined;
  }
  const text: Text = { value: textOf(node) ?? '' };
  assignDefined(text, 'languageId', attr(node, 'languageID'));
  assignDefined(text, 'languageLocaleId', attr(node, 'languageLocaleID'));
  return text;
}

export function readCode(node: XmlNode | undefined): Code | undefined {
  if (!node) {
    return undefined;
  }
  const code: Code = { value: textOf(node) ?? '' };
  assignDefined(code, 'listId', attr(node, 'listID'));
  assignDefined(code, 'listAgencyId', attr(node, 'listAgencyID'));
  assignDefined(code, 'listAgencyName', attr(node, 'listAgencyName'));
  assignDefined(code, 'listName', attr(node, 'listName'));
  assignDefined(code, 'listVersionId', attr(node, 'listVersionID'));
  assignDefined(code, 'name', attr(node, 'name'));
  assignDefined(code, 'languageId', attr(node, 'languageID'));
  assignDefined(code, 'listUri', attr(node, 'listURI'));
  assignDefined(code, 'listSchemeUri', attr(node, 'listSchemeURI'));
  return code;
}

/**
 * Read a decimal element value. Invalid decimals are reported and dropped;
 * empty elements are kept empty for the converter to treat as absent.
 */
export function readDecimal(node: XmlNode | undefined, element: string, ctx: ReadContext): string | undefined {
  const value = textOf(node)?.trim();
  if (value === undefined || value === '') {
    return value;
  }
  if (!isValidDecimalAmount(value)) {
    ctx.sink.error('CII-INVALID-DECIMAL', `The value '${value}' of element '${element}' is not a decimal number`, 'format', {
      context: { element, value },
    });
    return undefined;
  }
  return value;
}

export function readAmount(node: XmlNode | undefined, element: string, ctx: ReadContext): Amount | undefined {
  if (!node) {
    return undefined;
  }
  const value = readDecimal(node, element, ctx);
  if (value === undefined) {
    return undefined;
  }
  const amount: Amount = { value };
  assignDefined(amount, 'currencyId', attr(node, 'currencyID'));
  assignDefined(amount, 'currencyCodeListVersionId', attr(node, 'currencyCodeListVersionID'));
  return amount;
}

/**
 * All amounts of a repeating amount element
 */
export function readAmounts(parent: XmlNode | undefined, element: string, ctx: ReadContext): Amount[] {
  const amounts: Amount[] = [];
  for (const node of children(parent, element)) {
    const amount = readAmount(node, element, ctx);
    if (amount) {
      amounts.push(amount);
    }
  }
  return amounts;
}

export function readQuantity(node: XmlNode | undefined, element: string, ctx: ReadContext): Quantity | undefined {
  if (!node) {
    return undefined;
  }
  const value = readDecimal(node, element, ctx);
  if (value === undefined) {
    return undefined;
  }
  const quantity: Quantity = { value };
  assignDefined(quantity, 'unitCode', attr(node, 'unitCode'));
  assignDefined(quantity, 'unitCodeListId', attr(node, 'unitCodeListID'));
  assignDefined(quantity, 'unitCodeListAgencyId', attr(node, 'unitCodeListAgencyID'));
  assignDefined(quantity, 'unitCodeListAgencyName', attr(node, 'unitCodeListAgencyName'));
  return quantity;
}

export function readBinaryObject(node: XmlNode | undefined): BinaryObject | undefined {
  if (!node) {
    return undefined;
  }
  const binary: BinaryObject = { value: (textOf(node) ?? '').replace(/\s+/g, '') };
  assignDefined(binary, 'mimeCode', attr(node, 'mimeCode'));
  assignDefined(binary, 'filename', attr(node, 'filename'));
  return binary;
}

/**
 * Read a date-time container (e.g. ram:IssueDateTime) holding
 * udt:DateTimeString, udt:DateString or qdt:DateTimeString
 */
export function readDateTime(container: XmlNode | undefined): CiiDateTime | undefined {
  const node = child(container, 'DateTimeString') ?? child(container, 'DateString');
  if (!node) {
    return undefined;
  }
  const dateTime: CiiDateTime = { value: (textOf(node) ?? '').trim() };
  assignDefined(dateTime, 'format', attr(node, 'format'));
  return dateTime;
}

/**
 * Read an indicator container (e.g. ram:ChargeIndicator).
 * udt:Indicator is xs:boolean; content outside the boolean lexical space is
 * kept in the string form so the converter can report it.
 */
export function readIndicator(container: XmlNode | undefined): CiiIndicator | undefined {
  if (!container) {
    return undefined;
  }
  const indicator: CiiIndicator = {};

  const booleanValue = textOf(child(container, 'Indicator'))?.trim();
  if (booleanValue === 'true' || booleanValue === '1') {
    indicator.indicator = true;
  } else if (booleanValue === 'false' || booleanValue === '0') {
    indicator.indicator = false;
  } else if (booleanValue !== undefined) {
    indicator.indicatorString = booleanValue;
  }

  const stringNode = child(container, 'IndicatorString');
  if (stringNode && indicator.indicatorString === undefined) {
    indicator.indicatorString = textOf(stringNode) ?? '';
  }

  return indicator;
}

export function readTexts(parent: XmlNode | undefined, element: string): Text[] {
  const texts: Text[] = [];
  for (const node of children(parent, element)) {
    const text = readText(node);
    if (text) {
      texts.push(text);
    }
  }
  return texts;
}

export function readIdentifiers(parent: XmlNode | undefined, element: string): Identifier[] {
  const ids: Identifier[] = [];
  for (const node of children(parent, element)) {
    const id = readIdentifier(node);
    if (id) {
      ids.push(id);
    }
  }
  return ids;
}
