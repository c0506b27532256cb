import { readInt, readText } from '../codec/read';
import { NullBool, NullInt, NullTime, decodeNullBool, decodeNullInt, decodeNullTime } from '../scalars/nullable';
import type { WireNode } from '../shared/types';
import { childOf, joinPath } from '../shared/xml';

/*
 * Webhook payloads carry their own, flatter versions of accounts, invoices and
 * transactions. Subscriptions are the exception and reuse the API record.
 */

export interface WebhookAccount {
  code: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  companyName: string;
  phone: string;
}

export interface WebhookTransaction {
  uuid: string;
  invoiceNumber: number;
  subscriptionUUID: string;
  action: string;
  amountInCents: number;
  status: string;
  message: string;
  gatewayErrorCodes: string;
  failureType: string;
  reference: string;
  source: string;
  test: NullBool;
  voidable: NullBool;
  refundable: NullBool;
}

export interface WebhookInvoice {
  subscriptionUUID: string;
  uuid: string;
  state: string;
  invoiceNumberPrefix: string;
  invoiceNumber: number;
  poNumber: string;
  vatNumber: string;
  totalInCents: number;
  currency: string;
  createdAt: NullTime;
  closedAt: NullTime;
  netTerms: NullInt;
  collectionMethod: string;
}

export interface ShippingAddress {
  id: number;
  nickname: string;
  firstName: string;
  lastName: string;
  companyName: string;
  vatNumber: string;
  street1: string;
  street2: string;
  city: string;
  state: string;
  zip: string;
  country: string;
  email: string;
  phone: string;
}

export function decodeWebhookAccount(node: WireNode): WebhookAccount {
  return {
    code: readText(node, 'account_code'),
    username: readText(node, 'username'),
    email: readText(node, 'email'),
    firstName: readText(node, 'first_name'),
    lastName: readText(node, 'last_name'),
    companyName: readText(node, 'company_name'),
    phone: readText(node, 'phone'),
  };
}

export function decodeWebhookTransaction(node: WireNode, path: string): WebhookTransaction {
  return {
    uuid: readText(node, 'id'),
    invoiceNumber: readInt(node, 'invoice_number', path),
    subscriptionUUID: readText(node, 'subscription_id'),
    action: readText(node, 'action'),
    amountInCents: readInt(node, 'amount_in_cents', path),
    status: readText(node, 'status'),
    message: readText(node, 'message'),
    gatewayErrorCodes: readText(node, 'gateway_error_codes'),
    failureType: readText(node, 'failure_type'),
    reference: readText(node, 'reference'),
    source: readText(node, 'source'),
    test: decodeNullBool(childOf(node, 'test'), joinPath(path, 'test')),
    voidable: decodeNullBool(childOf(node, 'voidable'), joinPath(path, 'voidable')),
    refundable: decodeNullBool(childOf(node, 'refundable'), joinPath(path, 'refundable')),
  };
}

export function decodeWebhookInvoice(node: WireNode, path: string): WebhookInvoice {
  return {
    subscriptionUUID: readText(node, 'subscription_id'),
    uuid: readText(node, 'uuid'),
    state: readText(node, 'state'),
    invoiceNumberPrefix: readText(node, 'invoice_number_prefix'),
    invoiceNumber: readInt(node, 'invoice_number', path),
    poNumber: readText(node, 'po_number'),
    vatNumber: readText(node, 'vat_number'),
    totalInCents: readInt(node, 'total_in_cents', path),
    currency: readText(node, 'currency'),
    createdAt: decodeNullTime(childOf(node, 'date'), joinPath(path, 'date')),
    closedAt: decodeNullTime(childOf(node, 'closed_at'), joinPath(path, 'closed_at')),
    netTerms: decodeNullInt(childOf(node, 'net_terms'), joinPath(path, 'net_terms')),
    collectionMethod: readText(node, 'collection_method'),
  };
}

export function decodeShippingAddress(node: WireNode, path: string): ShippingAddress {
  return {
    id: readInt(node, 'id', path),
    nickname: readText(node, 'nickname'),
    firstName: readText(node, 'first_name'),
    lastName: readText(node, 'last_name'),
    companyName: readText(node, 'company_name'),
    vatNumber: readText(node, 'vat_number'),
    street1: readText(node, 'street1'),
    street2: readText(node, 'street2'),
    city: readText(node, 'city'),
    state: readText(node, 'state'),
    zip: readText(node, 'zip'),
    country: readText(node, 'country'),
    email: readText(node, 'email'),
    phone: readText(node, 'phone'),
  };
}
