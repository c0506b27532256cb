import type { WireNode, WireObject } from '../shared/types';

/** Reads one record type from its parsed element. */
export interface RecordDecoder<T> {
  /** Element name the record lives under. */
  readonly root: string;
  /** `path` is the dotted element path of `node`, used in error messages. */
  decode(node: WireNode, path: string): T;
}

/** Writes one record type. The returned object's key order is the element order. */
export interface RecordEncoder<T> {
  readonly root: string;
  encode(value: T): WireObject;
}

export interface RecordCodec<T> extends RecordDecoder<T>, RecordEncoder<T> {}

export function defineDecoder<T>(decoder: RecordDecoder<T>): RecordDecoder<T> {
  return decoder;
}

export function defineEncoder<T>(encoder: RecordEncoder<T>): RecordEncoder<T> {
  return encoder;
}

/**
 * Pair an encoder and a decoder for the same record type. The two directions
 * are declared separately because read and write shapes differ for several
 * records (links are read but never written, read-only fields are skipped).
 */
export function defineCodec<T>(codec: RecordCodec<T>): RecordCodec<T> {
  return codec;
}
