import type { WireNode } from '../shared/types';
import { isNil, textOf } from '../shared/xml';
import { formatDateTime, toBool, toDateTime, toInt } from './convert';

/**
 * A scalar that tells "never set" apart from "set to the zero value".
 * Encoders write the element iff `isSet`, which is what partial updates rely on:
 * an unset field means "leave unchanged", a set zero means "set to zero".
 */
export abstract class Nullable<T> {
  readonly value: T;
  readonly isSet: boolean;

  constructor(value: T, isSet: boolean) {
    this.value = value;
    this.isSet = isSet;
  }

  /** Wire text of `value`. */
  abstract text(): string;

  protected abstract jsonValue(): string | number | boolean;

  toJSON(): string | number | boolean | null {
    return this.isSet ? this.jsonValue() : null;
  }

  toString(): string {
    return this.isSet ? this.text() : 'null';
  }
}

export class NullInt extends Nullable<number> {
  static unset(): NullInt {
    return new NullInt(0, false);
  }

  text(): string {
    return String(this.value);
  }

  protected jsonValue(): number {
    return this.value;
  }
}

export class NullBool extends Nullable<boolean> {
  static unset(): NullBool {
    return new NullBool(false, false);
  }

  text(): string {
    return this.value ? 'true' : 'false';
  }

  protected jsonValue(): boolean {
    return this.value;
  }
}

export class NullTime extends Nullable<Date> {
  static unset(): NullTime {
    return new NullTime(new Date(0), false);
  }

  text(): string {
    return formatDateTime(this.value);
  }

  protected jsonValue(): string {
    return this.text();
  }
}

export function newInt(value: number): NullInt {
  return new NullInt(value, true);
}

export function newBool(value: boolean): NullBool {
  return new NullBool(value, true);
}

export function newTime(value: Date): NullTime {
  return new NullTime(value, true);
}

export function decodeNullInt(node: WireNode, path: string): NullInt {
  if (node === undefined || isNil(node)) return NullInt.unset();
  const text = textOf(node);
  if (text.trim() === '') return newInt(0);
  return newInt(toInt(text, path));
}

export function decodeNullBool(node: WireNode, path: string): NullBool {
  if (node === undefined || isNil(node)) return NullBool.unset();
  const text = textOf(node);
  if (text.trim() === '') return newBool(false);
  return newBool(toBool(text, path));
}

// an empty timestamp has no zero value worth reporting, so it stays unset
export function decodeNullTime(node: WireNode, path: string): NullTime {
  if (node === undefined || isNil(node)) return NullTime.unset();
  const text = textOf(node);
  if (text.trim() === '') return NullTime.unset();
  return newTime(toDateTime(text, path));
}
