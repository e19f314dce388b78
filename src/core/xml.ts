/**
 * XML parsing utilities
 *
 * Uses fast-xml-parser in preserveOrder mode so that body content keeps its
 * document order (paragraphs, tables and drawings interleave).
 */

import { XMLParser, type X2jOptions } from 'fast-xml-parser';

/**
 * Parser options for OOXML parts
 */
const PARSER_OPTIONS: Partial<X2jOptions> = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',

  textNodeName: '#text',
  cdataPropName: '#cdata',
  commentPropName: '#comment',

  preserveOrder: true,
  removeNSPrefix: false,

  // Values stay strings; parsers convert what they need
  parseTagValue: false,
  parseAttributeValue: false,

  // Whitespace inside w:t and t elements is content
  trimValues: false,

  processEntities: true,
  htmlEntities: false,
  allowBooleanAttributes: true,
};

const parser = new XMLParser(PARSER_OPTIONS);

/**
 * XML node representation from fast-xml-parser with preserveOrder: true
 *
 * Structure: { tagName: [...children], ':@': { '@_attrName': 'value' } }
 * Text nodes: { '#text': 'content' }
 */
export interface XmlNode {
  [tagName: string]: XmlNode[] | XmlAttributes | string | undefined;
  ':@'?: XmlAttributes;
  '#text'?: string;
}

/**
 * XML attributes object
 */
export interface XmlAttributes {
  [attrName: string]: string;
}

/**
 * Parse XML string to object representation
 */
export function parseXml(xml: string): XmlNode[] {
  return parser.parse(xml);
}

/**
 * Get the tag name of an XML node (first key that isn't :@ or #text)
 */
export function getTagName(node: XmlNode): string | null {
  for (const key of Object.keys(node)) {
    if (key !== ':@' && key !== '#text') {
      return key;
    }
  }
  return null;
}

/**
 * Get child nodes of an XML node
 */
export function getChildren(node: XmlNode): XmlNode[] {
  const tagName = getTagName(node);
  if (!tagName) return [];
  const children = node[tagName];
  return Array.isArray(children) ? children : [];
}

/**
 * Child elements with the given tag name
 */
export function getChildrenByTagName(node: XmlNode, tagName: string): XmlNode[] {
  return getChildren(node).filter((child) => getTagName(child) === tagName);
}

/**
 * First child element with the given tag name
 */
export function getChild(node: XmlNode, tagName: string): XmlNode | undefined {
  return getChildren(node).find((child) => getTagName(child) === tagName);
}

/**
 * First top-level element with the given tag name in a parsed part
 */
export function getRootElement(nodes: readonly XmlNode[], tagName: string): XmlNode | undefined {
  return nodes.find((node) => getTagName(node) === tagName);
}

/**
 * Get attributes of an XML node
 */
export function getAttributes(node: XmlNode): XmlAttributes {
  return node[':@'] ?? {};
}

/**
 * Get attribute value
 */
export function getAttribute(node: XmlNode, name: string): string | undefined {
  return getAttributes(node)[`@_${name}`];
}

/**
 * Get text content of an XML node (recursive)
 */
export function getTextContent(node: XmlNode): string {
  if (typeof node['#text'] === 'string') {
    return node['#text'];
  }

  let text = '';
  for (const child of getChildren(node)) {
    text += getTextContent(child);
  }
  return text;
}

/**
 * Find all descendant nodes matching a predicate
 */
export function findNodes(
  node: XmlNode,
  predicate: (n: XmlNode) => boolean
): XmlNode[] {
  const results: XmlNode[] = [];

  function walk(n: XmlNode) {
    if (predicate(n)) {
      results.push(n);
    }
    for (const child of getChildren(n)) {
      walk(child);
    }
  }

  walk(node);
  return results;
}

/**
 * Find all descendant nodes with a specific tag name
 */
export function findByTagName(node: XmlNode, tagName: string): XmlNode[] {
  return findNodes(node, (n) => getTagName(n) === tagName);
}
