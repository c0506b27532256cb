import { z } from 'zod';
import { CodecError, UnknownNotificationError, toCodecError } from '../shared/errors';
import type { WireNode, XmlInput } from '../shared/types';
import { parseDocument } from '../shared/xml';
import { notificationDecoders, type NotificationMap } from './notifications';
import { createRegistry, type Notification, type NotificationRegistry } from './registry';

/** Built once; never mutated afterwards. */
export const defaultRegistry: NotificationRegistry<NotificationMap> = createRegistry(notificationDecoders);

/** A webhook body before it is typed: its root tag and the parsed element. */
export interface EventEnvelope {
  readonly eventName: string;
  readonly body: WireNode;
}

export type ParseResult<M> =
  | { ok: true; notification: Notification<M> }
  | { ok: false; error: CodecError };

/** Read the root tag. The body is parsed but not interpreted. */
export function sniff(input: XmlInput): EventEnvelope {
  const doc = parseDocument(input);
  return { eventName: doc.root, body: doc.node };
}

/**
 * Route an envelope through the registry and decode its body into the matching
 * variant. The variant is chosen by the tag name alone.
 */
export function hydrate<M>(registry: NotificationRegistry<M>, envelope: EventEnvelope): Notification<M> {
  const name = envelope.eventName;
  if (!registry.has(name)) throw new UnknownNotificationError(name);
  return registry.hydrate(name, envelope.body);
}

/**
 * Parse a webhook body into `{ name, data }`.
 *
 * @throws CodecError `MALFORMED_XML` for a body that is not XML,
 *   `TYPE_MISMATCH` when a field does not convert, and
 *   {@link UnknownNotificationError} when the root tag is not registered.
 */
export function parseNotification(input: XmlInput): Notification<NotificationMap>;
export function parseNotification<M>(input: XmlInput, registry: NotificationRegistry<M>): Notification<M>;
export function parseNotification<M>(input: XmlInput, registry?: NotificationRegistry<M>): Notification<M> | Notification<NotificationMap> {
  if (registry) return hydrate(registry, sniff(input));
  return hydrate(defaultRegistry, sniff(input));
}

/** Like {@link parseNotification}, but failures come back as values. */
export function safeParseNotification(input: XmlInput): ParseResult<NotificationMap>;
export function safeParseNotification<M>(input: XmlInput, registry: NotificationRegistry<M>): ParseResult<M>;
export function safeParseNotification<M>(input: XmlInput, registry?: NotificationRegistry<M>): ParseResult<M> | ParseResult<NotificationMap> {
  if (registry) return attempt(registry, input);
  return attempt(defaultRegistry, input);
}

function attempt<M>(registry: NotificationRegistry<M>, input: XmlInput): ParseResult<M> {
  try {
    return { ok: true, notification: hydrate(registry, sniff(input)) };
  } catch (e) {
    return { ok: false, error: toCodecError(e) };
  }
}

const parserOptionsSchema = z.object({
  debug: z.boolean().default(false),
  prefix: z.string().min(1).default('[billing-wire]'),
});

export type NotificationParserOptions = z.input<typeof parserOptionsSchema>;

export interface NotificationParser<M> {
  readonly registry: NotificationRegistry<M>;
  parse(input: XmlInput): Notification<M>;
  safeParse(input: XmlInput): ParseResult<M>;
}

/**
 * Bind a registry and logging options once, e.g. per webhook endpoint.
 * With `debug` on, every routed notification and every unknown tag is logged
 * through `console.debug`.
 */
export function createNotificationParser(options?: NotificationParserOptions): NotificationParser<NotificationMap>;
export function createNotificationParser<M>(options: NotificationParserOptions & { registry: NotificationRegistry<M> }): NotificationParser<M>;
export function createNotificationParser<M>(
  options?: NotificationParserOptions & { registry?: NotificationRegistry<M> },
): NotificationParser<M> | NotificationParser<NotificationMap> {
  const { debug, prefix } = parserOptionsSchema.parse({ debug: options?.debug, prefix: options?.prefix });
  const log = (message: string, meta?: Record<string, unknown>) => {
    if (debug) console.debug(prefix, message, meta ?? {});
  };
  if (options?.registry) return bindParser(options.registry, log);
  return bindParser(defaultRegistry, log);
}

function bindParser<M>(registry: NotificationRegistry<M>, log: (message: string, meta?: Record<string, unknown>) => void): NotificationParser<M> {
  const report = (result: ParseResult<M>): ParseResult<M> => {
    if (result.ok) log('notification', { name: result.notification.name });
    else if (result.error instanceof UnknownNotificationError) log('unknown notification', { name: result.error.notification });
    else log('parse failed', { code: result.error.code, path: result.error.path });
    return result;
  };
  return {
    registry,
    parse(input) {
      const result = report(attempt(registry, input));
      if (!result.ok) throw result.error;
      return result.notification;
    },
    safeParse(input) {
      return report(attempt(registry, input));
    },
  };
}
