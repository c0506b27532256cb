import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { CodecError } from './errors';
import type { WireNode, WireObject, XmlInput } from './types';

const ATTR_PREFIX = '@_';
const TEXT_NODE = '#text';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  textNodeName: TEXT_NODE,
  // scalar conversion belongs to the codecs, which know the target type
  parseTagValue: false,
  parseAttributeValue: false,
  // character data is kept as written; scalar conversions trim for themselves
  trimValues: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

const builder = new XMLBuilder({
  ignoreAttributes: true,
  format: false,
  suppressEmptyNode: false,
});

const utf8 = new TextDecoder('utf-8', { fatal: true });

export interface ParsedDocument {
  /** Local name of the single top-level element. */
  root: string;
  node: WireNode;
}

export function toText(input: XmlInput): string {
  return typeof input === 'string' ? input : utf8.decode(input);
}

/**
 * Validate and parse a document in one go. The tree is generic; typing it is
 * left to the record decoders.
 */
export function parseDocument(input: XmlInput): ParsedDocument {
  const xml = decodeInput(input);
  const result = XMLValidator.validate(xml);
  if (result !== true) {
    const { code, msg, line, col } = result.err;
    throw new CodecError('MALFORMED_XML', `${msg} (line ${line}, col ${col})`, undefined, { code, line, col });
  }
  const doc: unknown = parser.parse(xml);
  if (!isElement(doc)) throw new CodecError('MALFORMED_XML', 'document has no root element');
  // whitespace around the root element is kept as top-level text
  const roots = Object.keys(doc).filter((key) => key !== TEXT_NODE);
  if (roots.length !== 1) throw new CodecError('MALFORMED_XML', `expected one root element, found ${roots.length}`);
  const node = doc[roots[0]];
  // two same-named top-level elements come back as an array
  if (Array.isArray(node)) throw new CodecError('MALFORMED_XML', `expected one root element, found ${node.length}`);
  return { root: tagName(roots[0]), node };
}

function decodeInput(input: XmlInput): string {
  try {
    return toText(input);
  } catch (e) {
    if (e instanceof TypeError) throw new CodecError('MALFORMED_XML', `invalid UTF-8: ${e.message}`, undefined, e);
    throw e;
  }
}

// the parser stores a `__proto__` element under a prefixed key
function tagName(key: string): string {
  return key === '#__proto__' ? '__proto__' : key;
}

export function buildDocument(root: string, body: WireObject): string {
  const xml: string = builder.build({ [root]: body });
  return xml;
}

export function isElement(node: WireNode): node is Record<string, unknown> {
  return typeof node === 'object' && node !== null && !Array.isArray(node);
}

export function hasChild(node: WireNode, tag: string): boolean {
  return isElement(node) && node[tag] !== undefined;
}

/** First element named `tag`, or undefined when absent. */
export function childOf(node: WireNode, tag: string): WireNode {
  if (!isElement(node)) return undefined;
  const value = node[tag];
  return Array.isArray(value) ? value[0] : value;
}

/** Every element named `tag`, in document order. */
export function childrenOf(node: WireNode, tag: string): WireNode[] {
  if (!isElement(node)) return [];
  const value = node[tag];
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

export function textOf(node: WireNode): string {
  if (typeof node === 'string') return node;
  if (typeof node === 'number' || typeof node === 'boolean') return String(node);
  if (isElement(node)) {
    const text = node[TEXT_NODE];
    return text === undefined ? '' : String(text);
  }
  return '';
}

export function attrOf(node: WireNode, name: string): string | undefined {
  if (!isElement(node)) return undefined;
  const value = node[ATTR_PREFIX + name];
  return typeof value === 'string' ? value : undefined;
}

/** `<tag nil="nil"/>` marks an explicitly empty value. */
export function isNil(node: WireNode): boolean {
  const nil = attrOf(node, 'nil');
  return nil === 'nil' || nil === 'true';
}

export function joinPath(parent: string, tag: string): string {
  return parent ? `${parent}.${tag}` : tag;
}
