import { describe, it, expect } from 'vitest';
import { CodecError } from '../errors';
import { buildDocument, childOf, childrenOf, isNil, parseDocument, textOf } from '../xml';

function codeOf(fn: () => unknown): string | undefined {
  try { fn(); } catch (e) { return e instanceof CodecError ? e.code : 'not-a-codec-error'; }
  return undefined;
}

describe('parseDocument', () => {
  it('returns the root name and drops the declaration', () => {
    const doc = parseDocument('<?xml version="1.0" encoding="UTF-8"?>\n<subscription><uuid>abc</uuid></subscription>');
    expect(doc.root).toBe('subscription');
    expect(textOf(childOf(doc.node, 'uuid'))).toBe('abc');
  });

  it('decodes UTF-8 bytes', () => {
    const doc = parseDocument(new TextEncoder().encode('<account><first_name>Zoë</first_name></account>'));
    expect(textOf(childOf(doc.node, 'first_name'))).toBe('Zoë');
  });

  it('keeps text beside attributes', () => {
    const doc = parseDocument('<subscription><net_terms type="integer">0</net_terms></subscription>');
    expect(textOf(childOf(doc.node, 'net_terms'))).toBe('0');
  });

  it('keeps surrounding whitespace in text', () => {
    const doc = parseDocument('<a><po_number>  PO 1  </po_number></a>');
    expect(textOf(childOf(doc.node, 'po_number'))).toBe('  PO 1  ');
  });

  it('ignores whitespace around and between elements', () => {
    const doc = parseDocument('\n<subscription>\n  <uuid>abc</uuid>\n</subscription>\n');
    expect(doc.root).toBe('subscription');
    expect(textOf(childOf(doc.node, 'uuid'))).toBe('abc');
  });

  it('rejects bytes that are not UTF-8', () => {
    const encoder = new TextEncoder();
    const bytes = Uint8Array.from([
      ...encoder.encode('<account><first_name>'),
      0xff,
      0xfe,
      ...encoder.encode('</first_name></account>'),
    ]);
    expect(codeOf(() => parseDocument(bytes))).toBe('MALFORMED_XML');
  });

  it('reports a __proto__ root under its own name', () => {
    expect(parseDocument('<__proto__></__proto__>').root).toBe('__proto__');
  });

  it('rejects documents that are not well formed', () => {
    expect(codeOf(() => parseDocument('<a><b></a>'))).toBe('MALFORMED_XML');
    expect(codeOf(() => parseDocument('not xml'))).toBe('MALFORMED_XML');
    expect(codeOf(() => parseDocument('<a/><b/>'))).toBe('MALFORMED_XML');
  });
});

describe('node helpers', () => {
  it('treats a single child and repeated children alike', () => {
    const one = parseDocument('<list><item>1</item></list>');
    const two = parseDocument('<list><item>1</item><item>2</item></list>');
    expect(childrenOf(one.node, 'item').map(textOf)).toEqual(['1']);
    expect(childrenOf(two.node, 'item').map(textOf)).toEqual(['1', '2']);
    expect(childrenOf(two.node, 'missing')).toEqual([]);
  });

  it('recognises nil markers', () => {
    const doc = parseDocument('<subscription><canceled_at nil="nil"></canceled_at><state>active</state></subscription>');
    expect(isNil(childOf(doc.node, 'canceled_at'))).toBe(true);
    expect(isNil(childOf(doc.node, 'state'))).toBe(false);
  });
});

describe('buildDocument', () => {
  it('writes elements in key order and keeps empty elements', () => {
    expect(buildDocument('subscription', { plan_code: 'gold', account: {}, currency: '' }))
      .toBe('<subscription><plan_code>gold</plan_code><account></account><currency></currency></subscription>');
  });

  it('escapes text', () => {
    expect(buildDocument('account', { company_name: 'AT&T' })).toBe('<account><company_name>AT&amp;T</company_name></account>');
  });

  it('repeats list items under their wrapper', () => {
    expect(buildDocument('l', { items: { item: [{ n: '1' }, { n: '2' }] } }))
      .toBe('<l><items><item><n>1</n></item><item><n>2</n></item></items></l>');
  });
});
