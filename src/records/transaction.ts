import { defineCodec, defineDecoder } from '../codec/types';
import * as emit from '../codec/emit';
import { readBool, readInt, readText } from '../codec/read';
import { decodeHrefInt, decodeHrefString } from '../scalars/href';
import { NullBool, NullTime, decodeNullBool, decodeNullTime } from '../scalars/nullable';
import type { WireNode, WireObject } from '../shared/types';
import { attrOf, childOf, hasChild, isNil, joinPath, textOf } from '../shared/xml';
import { decodeAccount, emptyAccount, encodeAccount, type Account } from './account';

export const TransactionStatus = {
  Success: 'success',
  Failed: 'failed',
  Void: 'void',
} as const;

export type TransactionStatus = (typeof TransactionStatus)[keyof typeof TransactionStatus];

/**
 * Gateway error normalised by the billing service.
 */
export interface TransactionError {
  errorCode: string;
  errorCategory: string;
  merchantMessage: string;
  customerMessage: string;
  gatewayErrorCode: string;
}

/** Shape shared by the CVV and AVS checks: `<cvv_result code="M">Match</cvv_result>`. */
export interface TransactionResult {
  code: string;
  message: string;
}

export interface CVVResult {
  result: TransactionResult;
}

export interface AVSResult {
  result: TransactionResult;
}

export interface Transaction {
  /** Resolved from the `<invoice href>` link. Read only. */
  invoiceNumber: number;
  /** Resolved from the `<subscription href>` link. Read only. */
  subscriptionUUID: string;
  uuid: string;
  action: string;
  amountInCents: number;
  taxInCents: number;
  currency: string;
  status: string;
  description: string;
  /** Write only: stored on the invoice line item, never returned. */
  productCode: string;
  paymentMethod: string;
  reference: string;
  source: string;
  recurring: NullBool;
  test: boolean;
  voidable: NullBool;
  refundable: NullBool;
  ipAddress: string;
  transactionError?: TransactionError;
  cvvResult: CVVResult;
  avsResult: AVSResult;
  avsResultStreet: string;
  avsResultPostal: string;
  createdAt: NullTime;
  account: Account;
}

export function emptyTransaction(): Transaction {
  return {
    invoiceNumber: 0,
    subscriptionUUID: '',
    uuid: '',
    action: '',
    amountInCents: 0,
    taxInCents: 0,
    currency: '',
    status: '',
    description: '',
    productCode: '',
    paymentMethod: '',
    reference: '',
    source: '',
    recurring: NullBool.unset(),
    test: false,
    voidable: NullBool.unset(),
    refundable: NullBool.unset(),
    ipAddress: '',
    cvvResult: { result: { code: '', message: '' } },
    avsResult: { result: { code: '', message: '' } },
    avsResultStreet: '',
    avsResultPostal: '',
    createdAt: NullTime.unset(),
    account: emptyAccount(),
  };
}

export function cvvIsMatch(c: CVVResult): boolean {
  return c.result.code === 'M' || c.result.code === 'Y';
}

export function cvvIsNoMatch(c: CVVResult): boolean {
  return c.result.code === 'N';
}

export function cvvNotProcessed(c: CVVResult): boolean {
  return c.result.code === 'P';
}

/** The card should carry a CVV but none was indicated. */
export function cvvShouldHaveBeenPresent(c: CVVResult): boolean {
  return c.result.code === 'S';
}

export function cvvUnableToProcess(c: CVVResult): boolean {
  return c.result.code === 'U';
}

function decodeResult(node: WireNode): TransactionResult {
  if (node === undefined || isNil(node)) return { code: '', message: '' };
  return { code: attrOf(node, 'code') ?? '', message: textOf(node) };
}

export const transactionErrorDecoder = defineDecoder<TransactionError>({
  root: 'transaction_error',
  decode: (node) => ({
    errorCode: readText(node, 'error_code'),
    errorCategory: readText(node, 'error_category'),
    merchantMessage: readText(node, 'merchant_message'),
    customerMessage: readText(node, 'customer_message'),
    gatewayErrorCode: readText(node, 'gateway_error_code'),
  }),
});

export function decodeTransaction(node: WireNode, path = 'transaction'): Transaction {
  const transaction: Transaction = {
    invoiceNumber: decodeHrefInt(childOf(node, 'invoice'), joinPath(path, 'invoice')),
    subscriptionUUID: decodeHrefString(childOf(node, 'subscription')),
    uuid: readText(node, 'uuid'),
    action: readText(node, 'action'),
    amountInCents: readInt(node, 'amount_in_cents', path),
    taxInCents: readInt(node, 'tax_in_cents', path),
    currency: readText(node, 'currency'),
    status: readText(node, 'status'),
    description: readText(node, 'description'),
    productCode: '',
    paymentMethod: readText(node, 'payment_method'),
    reference: readText(node, 'reference'),
    source: readText(node, 'source'),
    recurring: decodeNullBool(childOf(node, 'recurring'), joinPath(path, 'recurring')),
    test: readBool(node, 'test', path),
    voidable: decodeNullBool(childOf(node, 'voidable'), joinPath(path, 'voidable')),
    refundable: decodeNullBool(childOf(node, 'refundable'), joinPath(path, 'refundable')),
    ipAddress: readText(node, 'ip_address'),
    cvvResult: { result: decodeResult(childOf(node, 'cvv_result')) },
    avsResult: { result: decodeResult(childOf(node, 'avs_result')) },
    avsResultStreet: readText(node, 'avs_result_street'),
    avsResultPostal: readText(node, 'avs_result_postal'),
    createdAt: decodeNullTime(childOf(node, 'created_at'), joinPath(path, 'created_at')),
    account: decodeAccount(childOf(childOf(node, 'details'), 'account')),
  };
  if (hasChild(node, 'transaction_error')) {
    transaction.transactionError = transactionErrorDecoder.decode(childOf(node, 'transaction_error'), joinPath(path, 'transaction_error'));
  }
  return transaction;
}

/**
 * Only the writable fields are sent. The account goes out as a direct
 * `<account>` child rather than under `<details>` as it is read.
 */
export function encodeTransaction(t: Transaction): WireObject {
  const out: WireObject = {};
  emit.text(out, 'action', t.action);
  emit.int(out, 'amount_in_cents', t.amountInCents, { always: true });
  emit.int(out, 'tax_in_cents', t.taxInCents);
  emit.text(out, 'currency', t.currency, { always: true });
  emit.text(out, 'status', t.status);
  emit.text(out, 'description', t.description);
  emit.text(out, 'product_code', t.productCode);
  emit.text(out, 'payment_method', t.paymentMethod);
  emit.text(out, 'reference', t.reference);
  emit.text(out, 'source', t.source);
  emit.nullable(out, 'recurring', t.recurring);
  emit.bool(out, 'test', t.test);
  emit.nullable(out, 'voidable', t.voidable);
  emit.nullable(out, 'refundable', t.refundable);
  emit.text(out, 'ip_address', t.ipAddress);
  emit.nested(out, 'account', encodeAccount(t.account), { always: true });
  return out;
}

export const transactionCodec = defineCodec<Transaction>({
  root: 'transaction',
  encode: encodeTransaction,
  decode: decodeTransaction,
});
