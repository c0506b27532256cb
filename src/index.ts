/**
 * billing-wire: XML codec and webhook parser for a subscription-billing API.
 * @example
 * import { marshal, newSubscriptionEncoder, parseNotification } from "billing-wire";
 * const body = marshal(newSubscriptionEncoder, { planCode: "gold", account: { code: "123" }, currency: "USD" });
 * const { name, data } = parseNotification(webhookBody);
 */
export { CodecError, UnknownNotificationError, isUnknownNotification, toCodecError } from './shared/errors';
export type { CodecErrorCode } from './shared/errors';
export type { WireNode, WireObject, WireValue, XmlInput } from './shared/types';
export { marshal, unmarshal, defineCodec, defineDecoder, defineEncoder } from './codec';
export type { RecordCodec, RecordDecoder, RecordEncoder } from './codec';
export * from './scalars/nullable';
export { formatDateTime } from './scalars/convert';
export * from './records/account';
export * from './records/subscription';
export * from './records/transaction';
export * from './ordering';
export * as webhooks from './webhooks';
export { parseNotification, safeParseNotification, createNotificationParser, defaultRegistry } from './webhooks';
