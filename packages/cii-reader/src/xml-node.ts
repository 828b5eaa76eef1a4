/**
 * Navigation helpers over the fast-xml-parser object tree.
 *
 * The parser is configured with namespace prefixes removed, attributes
 * prefixed with '@_' and tag values left unparsed, so every leaf is a
 * string. A text-only element is a plain string; an element with attributes
 * is an object whose text is under '#text'. These helpers hide that
 * difference: every element is returned as an XmlNode.
 */

export type XmlNode = Record<string, unknown>;

export const TEXT_KEY = '#text';
export const ATTRIBUTE_PREFIX = '@_';

function isRecord(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNode(value: unknown): XmlNode | undefined {
  if (isRecord(value)) {
    return value;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return { [TEXT_KEY]: String(value) };
  }
  return undefined;
}

/**
 * All child elements with the given local name, in document order
 */
export function children(node: XmlNode | undefined, name: string): XmlNode[] {
  if (!node) {
    return [];
  }
  const value = node[name];
  const values: unknown[] = Array.isArray(value) ? value : [value];
  const nodes: XmlNode[] = [];
  for (const item of values) {
    const child = toNode(item);
    if (child) {
      nodes.push(child);
    }
  }
  return nodes;
}

/**
 * First child element with the given local name
 */
export function child(node: XmlNode | undefined, name: string): XmlNode | undefined {
  return children(node, name)[0];
}

/**
 * Follow a chain of first children
 */
export function descend(node: XmlNode | undefined, ...names: string[]): XmlNode | undefined {
  let current = node;
  for (const name of names) {
    current = child(current, name);
  }
  return current;
}

/**
 * Text content of an element; '' for an empty element
 */
export function textOf(node: XmlNode | undefined): string | undefined {
  if (!node) {
    return undefined;
  }
  const value = node[TEXT_KEY];
  if (value === undefined || value === null) {
    return '';
  }
  return String(value);
}

/**
 * Attribute value by local name
 */
export function attr(node: XmlNode | undefined, name: string): string | undefined {
  if (!node) {
    return undefined;
  }
  const value = node[`${ATTRIBUTE_PREFIX}${name}`];
  if (value === undefined || value === null) {
    return undefined;
  }
  return String(value);
}
