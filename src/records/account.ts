import { defineCodec } from '../codec/types';
import * as emit from '../codec/emit';
import { readText } from '../codec/read';
import type { WireNode, WireObject } from '../shared/types';
import { childOf, hasChild } from '../shared/xml';

export interface BillingInfo {
  /** Token from the hosted payment form. */
  token: string;
}

/** Account as embedded in subscription and transaction payloads. */
export interface Account {
  code: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  companyName: string;
  billingInfo?: BillingInfo;
}

export function emptyAccount(): Account {
  return { code: '', username: '', email: '', firstName: '', lastName: '', companyName: '' };
}

export function encodeAccount(a: Partial<Account>): WireObject {
  const out: WireObject = {};
  emit.text(out, 'account_code', a.code ?? '');
  emit.text(out, 'username', a.username ?? '');
  emit.text(out, 'email', a.email ?? '');
  emit.text(out, 'first_name', a.firstName ?? '');
  emit.text(out, 'last_name', a.lastName ?? '');
  emit.text(out, 'company_name', a.companyName ?? '');
  if (a.billingInfo) {
    const billing: WireObject = {};
    emit.text(billing, 'token_id', a.billingInfo.token);
    emit.nested(out, 'billing_info', billing);
  }
  return out;
}

export function decodeAccount(node: WireNode): Account {
  const account: Account = {
    code: readText(node, 'account_code'),
    username: readText(node, 'username'),
    email: readText(node, 'email'),
    firstName: readText(node, 'first_name'),
    lastName: readText(node, 'last_name'),
    companyName: readText(node, 'company_name'),
  };
  if (hasChild(node, 'billing_info')) {
    account.billingInfo = { token: readText(childOf(node, 'billing_info'), 'token_id') };
  }
  return account;
}

export const accountCodec = defineCodec<Account>({
  root: 'account',
  encode: encodeAccount,
  decode: (node) => decodeAccount(node),
});
