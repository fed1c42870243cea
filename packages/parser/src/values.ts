/**
 * Navigation helpers over parsed XML.
 *
 * Absence is reported as null so callers can pick the default that applies.
 */

import type { DecimalAmount, ISODate } from '@invoice-bridge/contracts';
import { parseInvariantDecimal, parseDayMonthYear } from '@invoice-bridge/shared';
import type { XmlNode } from './types.js';

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Element present in the source. Empty elements (`<Dates/>`) parse as '' and
 * text-only elements as a string; both still count as present.
 */
function toNode(value: unknown): XmlNode | null {
  if (isXmlNode(value)) {
    return value;
  }
  if (typeof value === 'string') {
    return value.length > 0 ? { '#text': value } : {};
  }
  return null;
}

/**
 * First child element with the given local name
 */
export function child(node: XmlNode | null, name: string): XmlNode | null {
  if (!node) return null;

  const value = node[name];
  return toNode(Array.isArray(value) ? value[0] : value);
}

/**
 * All child elements with the given local name, in document order
 */
export function children(node: XmlNode | null, name: string): XmlNode[] {
  if (!node) return [];

  const value = node[name];
  const values: unknown[] = Array.isArray(value) ? value : [value];
  const nodes: XmlNode[] = [];
  for (const entry of values) {
    const childNode = toNode(entry);
    if (childNode) nodes.push(childNode);
  }
  return nodes;
}

/**
 * Walk a `/`-separated path of first children
 */
export function path(node: XmlNode | null, route: string): XmlNode | null {
  let current = node;
  for (const name of route.split('/')) {
    current = child(current, name);
  }
  return current;
}

/**
 * Raw attribute value, or null when the attribute is absent
 */
export function attr(node: XmlNode | null, name: string): string | null {
  if (!node) return null;

  const value = node[`@_${name}`];
  return typeof value === 'string' ? value : null;
}

/**
 * Attribute as a decimal string; absent or unparsable gives "0"
 */
export function decimalAttr(node: XmlNode | null, name: string): DecimalAmount {
  return parseInvariantDecimal(attr(node, name)) ?? '0';
}

/**
 * `dd/MM/yyyy` attribute as an ISO date, else the fallback
 */
export function dateAttr(node: XmlNode | null, name: string, fallback: ISODate): ISODate {
  return parseDayMonthYear(attr(node, name)) ?? fallback;
}
