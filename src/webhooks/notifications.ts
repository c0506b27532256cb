import { decodeSubscription, type Subscription } from '../records/subscription';
import type { WireNode } from '../shared/types';
import { childOf, joinPath } from '../shared/xml';
import type { DecoderTable } from './registry';
import {
  decodeShippingAddress,
  decodeWebhookAccount,
  decodeWebhookInvoice,
  decodeWebhookTransaction,
  type ShippingAddress,
  type WebhookAccount,
  type WebhookInvoice,
  type WebhookTransaction,
} from './records';

export interface AccountNotification {
  account: WebhookAccount;
}

export interface SubscriptionNotification {
  account: WebhookAccount;
  subscription: Subscription;
}

export interface InvoiceNotification {
  account: WebhookAccount;
  invoice: WebhookInvoice;
}

export interface PaymentNotification {
  account: WebhookAccount;
  transaction: WebhookTransaction;
}

export interface ShippingAddressNotification {
  account: WebhookAccount;
  shippingAddress: ShippingAddress;
}

export interface DunningEventNotification {
  account: WebhookAccount;
  invoice: WebhookInvoice;
  subscription: Subscription;
  transaction: WebhookTransaction;
}

/** Payload shape of every notification the default registry knows. */
export interface NotificationMap {
  new_account_notification: AccountNotification;
  updated_account_notification: AccountNotification;
  billing_info_updated_notification: AccountNotification;
  reactivated_account_notification: AccountNotification;
  new_subscription_notification: SubscriptionNotification;
  updated_subscription_notification: SubscriptionNotification;
  renewed_subscription_notification: SubscriptionNotification;
  expired_subscription_notification: SubscriptionNotification;
  canceled_subscription_notification: SubscriptionNotification;
  new_invoice_notification: InvoiceNotification;
  past_due_invoice_notification: InvoiceNotification;
  closed_invoice_notification: InvoiceNotification;
  processing_invoice_notification: InvoiceNotification;
  new_shipping_address_notification: ShippingAddressNotification;
  updated_shipping_address_notification: ShippingAddressNotification;
  deleted_shipping_address_notification: ShippingAddressNotification;
  successful_payment_notification: PaymentNotification;
  failed_payment_notification: PaymentNotification;
  void_payment_notification: PaymentNotification;
  successful_refund_notification: PaymentNotification;
  new_dunning_event_notification: DunningEventNotification;
}

// sub-records missing from a payload decode as empty records

function account(node: WireNode): WebhookAccount {
  return decodeWebhookAccount(childOf(node, 'account'));
}

function subscription(node: WireNode, path: string): Subscription {
  return decodeSubscription(childOf(node, 'subscription'), joinPath(path, 'subscription'));
}

function invoice(node: WireNode, path: string): WebhookInvoice {
  return decodeWebhookInvoice(childOf(node, 'invoice'), joinPath(path, 'invoice'));
}

function transaction(node: WireNode, path: string): WebhookTransaction {
  return decodeWebhookTransaction(childOf(node, 'transaction'), joinPath(path, 'transaction'));
}

function shippingAddress(node: WireNode, path: string): ShippingAddress {
  return decodeShippingAddress(childOf(node, 'shipping_address'), joinPath(path, 'shipping_address'));
}

export function decodeAccountNotification(node: WireNode): AccountNotification {
  return { account: account(node) };
}

export function decodeSubscriptionNotification(node: WireNode, path: string): SubscriptionNotification {
  return { account: account(node), subscription: subscription(node, path) };
}

export function decodeInvoiceNotification(node: WireNode, path: string): InvoiceNotification {
  return { account: account(node), invoice: invoice(node, path) };
}

export function decodePaymentNotification(node: WireNode, path: string): PaymentNotification {
  return { account: account(node), transaction: transaction(node, path) };
}

export function decodeShippingAddressNotification(node: WireNode, path: string): ShippingAddressNotification {
  return { account: account(node), shippingAddress: shippingAddress(node, path) };
}

export function decodeDunningEventNotification(node: WireNode, path: string): DunningEventNotification {
  return {
    account: account(node),
    invoice: invoice(node, path),
    subscription: subscription(node, path),
    transaction: transaction(node, path),
  };
}

export const notificationDecoders: DecoderTable<NotificationMap> = Object.freeze({
  new_account_notification: decodeAccountNotification,
  updated_account_notification: decodeAccountNotification,
  billing_info_updated_notification: decodeAccountNotification,
  // the service's own router knows this payload only as the misspelled
  // `reactivated_subcription_notification`, which is not registered here
  reactivated_account_notification: decodeAccountNotification,
  new_subscription_notification: decodeSubscriptionNotification,
  updated_subscription_notification: decodeSubscriptionNotification,
  renewed_subscription_notification: decodeSubscriptionNotification,
  expired_subscription_notification: decodeSubscriptionNotification,
  canceled_subscription_notification: decodeSubscriptionNotification,
  new_invoice_notification: decodeInvoiceNotification,
  past_due_invoice_notification: decodeInvoiceNotification,
  closed_invoice_notification: decodeInvoiceNotification,
  processing_invoice_notification: decodeInvoiceNotification,
  new_shipping_address_notification: decodeShippingAddressNotification,
  updated_shipping_address_notification: decodeShippingAddressNotification,
  deleted_shipping_address_notification: decodeShippingAddressNotification,
  successful_payment_notification: decodePaymentNotification,
  failed_payment_notification: decodePaymentNotification,
  void_payment_notification: decodePaymentNotification,
  successful_refund_notification: decodePaymentNotification,
  new_dunning_event_notification: decodeDunningEventNotification,
});
