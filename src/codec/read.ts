import { toBool, toFloat, toInt } from '../scalars/convert';
import type { WireNode } from '../shared/types';
import { childOf, isNil, joinPath, textOf } from '../shared/xml';

/*
 * Plain scalar readers. An absent, nil or empty element reads as the zero value;
 * present text that does not convert is a TYPE_MISMATCH carrying the path.
 */

function present(node: WireNode): string | undefined {
  if (node === undefined || isNil(node)) return undefined;
  const raw = textOf(node).trim();
  return raw === '' ? undefined : raw;
}

export function readText(parent: WireNode, tag: string): string {
  const node = childOf(parent, tag);
  if (node === undefined || isNil(node)) return '';
  return textOf(node);
}

export function readInt(parent: WireNode, tag: string, path: string): number {
  const raw = present(childOf(parent, tag));
  return raw === undefined ? 0 : toInt(raw, joinPath(path, tag));
}

export function readFloat(parent: WireNode, tag: string, path: string): number {
  const raw = present(childOf(parent, tag));
  return raw === undefined ? 0 : toFloat(raw, joinPath(path, tag));
}

export function readBool(parent: WireNode, tag: string, path: string): boolean {
  const raw = present(childOf(parent, tag));
  return raw === undefined ? false : toBool(raw, joinPath(path, tag));
}
