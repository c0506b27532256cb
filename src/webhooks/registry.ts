import type { WireNode } from '../shared/types';

export type NotificationDecoder<T> = (node: WireNode, path: string) => T;

/** One decoder per notification name. */
export type DecoderTable<M> = { readonly [K in keyof M]: NotificationDecoder<M[K]> };

/** Tagged union over the names of `M`: exactly one `{ name, data }` pair per variant. */
export type Notification<M, K extends keyof M & string = keyof M & string> = {
  [P in K]: { readonly name: P; readonly data: M[P] };
}[K];

/**
 * Closed, immutable mapping from root tag to decoder. Lookups are exact and
 * case-sensitive. To support more notification types build a new registry:
 *
 * @example
 * const registry = createRegistry({ ...notificationDecoders, gift_card_notification: decodeGiftCard });
 */
export interface NotificationRegistry<M> {
  readonly names: readonly (keyof M & string)[];
  has(name: string): name is keyof M & string;
  hydrate<K extends keyof M & string>(name: K, node: WireNode): Notification<M, K>;
}

export function createRegistry<M>(decoders: DecoderTable<M>): NotificationRegistry<M> {
  const table: DecoderTable<M> = Object.freeze({ ...decoders });
  const has = (name: string): name is keyof M & string => Object.prototype.hasOwnProperty.call(table, name);
  return Object.freeze({
    names: Object.freeze(Object.keys(table).filter(has)),
    has,
    hydrate<K extends keyof M & string>(name: K, node: WireNode): Notification<M, K> {
      const decode = table[name];
      return { name, data: decode(node, name) };
    },
  });
}
