/**
 * Shapes shared by the XML layer and the record codecs.
 */

/** Anything a decoder may receive for an element: parsed text, an element object, or nothing. */
export type WireNode = unknown;

/** Value of one element in an outgoing document. */
export type WireValue = string | WireObject | WireObject[];

/**
 * Outgoing element body. Key insertion order is the element order on the wire,
 * so encoders must assign keys in declared field order.
 */
export interface WireObject {
  [tag: string]: WireValue;
}

/** Raw payload as handed over by the transport layer. */
export type XmlInput = string | Uint8Array;
