import { describe, it, expect } from 'vitest';
import { CodecError } from '../../shared/errors';
import type { WireObject } from '../../shared/types';
import { parseDocument } from '../../shared/xml';
import { newBool, newInt, NullInt } from '../../scalars/nullable';
import { accountCodec } from '../../records/account';
import * as emit from '../emit';
import { readBool, readFloat, readInt, readText } from '../read';
import { marshal, unmarshal } from '..';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected a throw');
}

describe('emit', () => {
  it('skips zero values unless always', () => {
    const out: WireObject = {};
    emit.text(out, 'po_number', '');
    emit.int(out, 'quantity', 0);
    emit.float(out, 'tax_rate', 0);
    emit.bool(out, 'bulk', false);
    expect(out).toEqual({});

    emit.text(out, 'currency', '', { always: true });
    emit.int(out, 'unit_amount_in_cents', 0, { always: true });
    emit.bool(out, 'test', false, { always: true });
    expect(out).toEqual({ currency: '', unit_amount_in_cents: '0', test: 'false' });
  });

  it('writes nullables iff set', () => {
    const out: WireObject = {};
    emit.nullable(out, 'net_terms', newInt(0));
    emit.nullable(out, 'voidable', newBool(false));
    emit.nullable(out, 'quantity', NullInt.unset());
    expect(out).toEqual({ net_terms: '0', voidable: 'false' });
  });

  it('keeps insertion order', () => {
    const out: WireObject = {};
    emit.text(out, 'b', 'x');
    emit.text(out, 'a', 'y');
    expect(Object.keys(out)).toEqual(['b', 'a']);
  });

  it('skips empty nested bodies unless always', () => {
    const out: WireObject = {};
    emit.nested(out, 'plan', {});
    emit.nested(out, 'details', undefined);
    expect(out).toEqual({});
    emit.nested(out, 'account', undefined, { always: true });
    emit.nested(out, 'plan', { plan_code: 'gold' });
    expect(out).toEqual({ account: {}, plan: { plan_code: 'gold' } });
  });

  it('writes a wrapper for defined lists only', () => {
    const out: WireObject = {};
    emit.list(out, 'subscription_add_ons', 'subscription_add_on', undefined);
    expect(out).toEqual({});
    emit.list(out, 'subscription_add_ons', 'subscription_add_on', []);
    expect(out).toEqual({ subscription_add_ons: { subscription_add_on: [] } });
  });
});

describe('read', () => {
  const { node } = parseDocument(
    '<r><name>gold</name><qty type="integer">3</qty><rate>0.5</rate><on>true</on><gone nil="nil"></gone><blank></blank><bad>3.5</bad></r>',
  );

  it('reads present values', () => {
    expect(readText(node, 'name')).toBe('gold');
    expect(readInt(node, 'qty', 'r')).toBe(3);
    expect(readFloat(node, 'rate', 'r')).toBe(0.5);
    expect(readBool(node, 'on', 'r')).toBe(true);
  });

  it('reads absent, nil and empty elements as zero values', () => {
    expect(readText(node, 'missing')).toBe('');
    expect(readText(node, 'gone')).toBe('');
    expect(readInt(node, 'gone', 'r')).toBe(0);
    expect(readInt(node, 'blank', 'r')).toBe(0);
    expect(readBool(node, 'missing', 'r')).toBe(false);
  });

  it('reports the element path on conversion failure', () => {
    const err = thrown(() => readInt(node, 'bad', 'r'));
    expect(err).toBeInstanceOf(CodecError);
    expect(err).toMatchObject({ code: 'TYPE_MISMATCH', path: 'r.bad', message: 'r.bad: expected integer, got "3.5"' });
  });
});

describe('marshal / unmarshal', () => {
  it('writes a document rooted at the encoder element', () => {
    const xml = marshal(accountCodec, {
      code: '1',
      username: '',
      email: 'verena@example.com',
      firstName: 'Verena',
      lastName: 'Example',
      companyName: '',
      billingInfo: { token: 'tok-1' },
    });
    expect(xml).toBe(
      '<account><account_code>1</account_code><email>verena@example.com</email><first_name>Verena</first_name><last_name>Example</last_name><billing_info><token_id>tok-1</token_id></billing_info></account>',
    );
  });

  it('reads a document back', () => {
    const account = unmarshal(accountCodec, '<?xml version="1.0" encoding="UTF-8"?><account><account_code>1</account_code><company_name>Acme</company_name></account>');
    expect(account).toEqual({ code: '1', username: '', email: '', firstName: '', lastName: '', companyName: 'Acme' });
  });

  it('accepts bytes', () => {
    const account = unmarshal(accountCodec, new TextEncoder().encode('<account><first_name>Zoë</first_name></account>'));
    expect(account.firstName).toBe('Zoë');
  });

  it('rejects a document with another root', () => {
    const err = thrown(() => unmarshal(accountCodec, '<subscription><uuid>abc</uuid></subscription>'));
    expect(err).toBeInstanceOf(CodecError);
    expect(err).toMatchObject({ code: 'UNEXPECTED_ROOT', path: 'subscription' });
  });

  it('rejects input that is not XML', () => {
    expect(thrown(() => unmarshal(accountCodec, 'account_code=1'))).toMatchObject({ code: 'MALFORMED_XML' });
  });
});
