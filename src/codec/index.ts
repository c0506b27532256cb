import { CodecError } from '../shared/errors';
import type { XmlInput } from '../shared/types';
import { buildDocument, parseDocument } from '../shared/xml';
import type { RecordDecoder, RecordEncoder } from './types';

export * from './types';

/** Encode a record to a document rooted at the encoder's element. Never throws. */
export function marshal<T>(encoder: RecordEncoder<T>, value: T): string {
  return buildDocument(encoder.root, encoder.encode(value));
}

/**
 * Decode a whole document. The root element must match the decoder's root;
 * decoding either returns a full record or throws a CodecError.
 */
export function unmarshal<T>(decoder: RecordDecoder<T>, input: XmlInput): T {
  const doc = parseDocument(input);
  if (doc.root !== decoder.root) {
    throw new CodecError('UNEXPECTED_ROOT', `expected <${decoder.root}>, found <${doc.root}>`, doc.root);
  }
  return decoder.decode(doc.node, doc.root);
}
