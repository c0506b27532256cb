import type { Nullable } from '../scalars/nullable';
import type { WireObject } from '../shared/types';

/*
 * Selective emission. Plain scalars are skipped at their zero value unless the
 * field is marked `always`; nullable scalars are written iff set. A plain
 * boolean therefore cannot express "false" on the wire; fields that need that
 * must use NullBool.
 */

export interface EmitOptions {
  /** Write the element even when the value is the zero value. */
  always?: boolean;
}

export function text(out: WireObject, tag: string, value: string, opts?: EmitOptions): void {
  if (value !== '' || opts?.always) out[tag] = value;
}

export function int(out: WireObject, tag: string, value: number, opts?: EmitOptions): void {
  if (value !== 0 || opts?.always) out[tag] = String(value);
}

export function float(out: WireObject, tag: string, value: number, opts?: EmitOptions): void {
  if (value !== 0 || opts?.always) out[tag] = String(value);
}

export function bool(out: WireObject, tag: string, value: boolean, opts?: EmitOptions): void {
  if (value || opts?.always) out[tag] = value ? 'true' : 'false';
}

export function nullable(out: WireObject, tag: string, value: Nullable<unknown>): void {
  if (value.isSet) out[tag] = value.text();
}

/** Nested record; an empty body is skipped unless `always`. */
export function nested(out: WireObject, tag: string, body: WireObject | undefined, opts?: EmitOptions): void {
  if (body === undefined) {
    if (opts?.always) out[tag] = {};
    return;
  }
  if (Object.keys(body).length > 0 || opts?.always) out[tag] = body;
}

/**
 * `<wrapper><item/>...</wrapper>`. An undefined list writes nothing; a defined
 * empty list writes an empty wrapper, which the remote API reads as "remove all".
 */
export function list(out: WireObject, wrapper: string, item: string, bodies: WireObject[] | undefined): void {
  if (bodies === undefined) return;
  out[wrapper] = { [item]: bodies };
}
