import { describe, it, expect } from 'vitest';
import { CodecError, UnknownNotificationError, isUnknownNotification, toCodecError } from '../errors';

describe('errors', () => {
  it('passes codec errors through unchanged', () => {
    const err = new CodecError('TYPE_MISMATCH', 'bad', 'subscription.quantity');
    expect(toCodecError(err)).toBe(err);
  });

  it('wraps foreign errors', () => {
    const err = toCodecError(new Error('boom'));
    expect(err).toBeInstanceOf(CodecError);
    expect(err.code).toBe('MALFORMED_XML');
    expect(err.message).toBe('boom');
  });

  it('exposes the unknown notification name', () => {
    const err = new UnknownNotificationError('gift_card_notification');
    expect(err.code).toBe('UNKNOWN_NOTIFICATION');
    expect(err.notification).toBe('gift_card_notification');
    expect(err.message).toBe('unknown notification: gift_card_notification');
    expect(isUnknownNotification(err)).toBe(true);
    expect(isUnknownNotification(new CodecError('MALFORMED_XML', 'x'))).toBe(false);
  });
});
