/** Root tags of the webhook notifications the service sends. */
export const NotificationName = {
  // account
  NewAccount: 'new_account_notification',
  UpdatedAccount: 'updated_account_notification',
  BillingInfoUpdated: 'billing_info_updated_notification',
  ReactivatedAccount: 'reactivated_account_notification',

  // subscription
  NewSubscription: 'new_subscription_notification',
  UpdatedSubscription: 'updated_subscription_notification',
  RenewedSubscription: 'renewed_subscription_notification',
  ExpiredSubscription: 'expired_subscription_notification',
  CanceledSubscription: 'canceled_subscription_notification',

  // invoice
  NewInvoice: 'new_invoice_notification',
  PastDueInvoice: 'past_due_invoice_notification',
  ClosedInvoice: 'closed_invoice_notification',
  ProcessingInvoice: 'processing_invoice_notification',

  // shipping address
  NewShippingAddress: 'new_shipping_address_notification',
  UpdatedShippingAddress: 'updated_shipping_address_notification',
  DeletedShippingAddress: 'deleted_shipping_address_notification',

  // payment
  SuccessfulPayment: 'successful_payment_notification',
  FailedPayment: 'failed_payment_notification',
  VoidPayment: 'void_payment_notification',
  SuccessfulRefund: 'successful_refund_notification',

  // dunning
  NewDunningEvent: 'new_dunning_event_notification',
} as const;

export type NotificationName = (typeof NotificationName)[keyof typeof NotificationName];

export const TransactionFailureType = {
  Declined: 'declined',
  Duplicate: 'duplicate_transaction',
} as const;
