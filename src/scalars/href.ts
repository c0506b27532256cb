import type { WireNode } from '../shared/types';
import { attrOf, isNil, textOf } from '../shared/xml';
import { toInt } from './convert';

/*
 * Link elements point at another resource, e.g.
 *   <account href="https://example.test/v2/accounts/1"/>
 * They resolve to the identifier and are never written back.
 */

function resolve(node: WireNode): string {
  if (node === undefined || isNil(node)) return '';
  const inline = textOf(node).trim();
  if (inline !== '') return inline;
  const href = attrOf(node, 'href');
  if (!href) return '';
  const segments = href.split(/[?#]/, 1)[0].split('/').filter((s) => s !== '');
  return segments.length > 0 ? unescapeSegment(segments[segments.length - 1]) : '';
}

// ids are percent-encoded in links but plain inline
function unescapeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (e) {
    if (e instanceof URIError) return segment;
    throw e;
  }
}

export function decodeHrefString(node: WireNode): string {
  return resolve(node);
}

export function decodeHrefInt(node: WireNode, path: string): number {
  const id = resolve(node);
  return id === '' ? 0 : toInt(id, path);
}
