import { defineCodec, defineDecoder, defineEncoder } from '../codec/types';
import * as emit from '../codec/emit';
import { readFloat, readInt, readText } from '../codec/read';
import { decodeHrefInt, decodeHrefString } from '../scalars/href';
import { NullInt, NullTime, decodeNullInt, decodeNullTime } from '../scalars/nullable';
import { CodecError } from '../shared/errors';
import type { WireNode, WireObject, XmlInput } from '../shared/types';
import { childOf, childrenOf, hasChild, joinPath, parseDocument } from '../shared/xml';
import { encodeAccount, type Account } from './account';
import { transactionCodec, type Transaction } from './transaction';

export const SubscriptionState = {
  /** Valid for the current time, including subscriptions in a trial period. */
  Active: 'active',
  /** Valid for the current time but will not renew because a cancelation was requested. */
  Canceled: 'canceled',
  /** Expired and no longer valid. */
  Expired: 'expired',
  /** Will start in the future. */
  Future: 'future',
  /** Active or canceled and in a trial period. */
  InTrial: 'in_trial',
  /** Every subscription that is not expired. */
  Live: 'live',
  /** Active or canceled with a past-due invoice. */
  PastDue: 'past_due',
} as const;

export type SubscriptionState = (typeof SubscriptionState)[keyof typeof SubscriptionState];

/** Strip the dashes some callers put in subscription UUIDs. */
export function sanitizeUUID(id: string): string {
  return id.replace(/-/g, '').trim();
}

export interface NestedPlan {
  code: string;
  name: string;
}

export interface SubscriptionAddOn {
  type: string;
  code: string;
  unitAmountInCents: number;
  quantity: number;
}

/** Changes to the subscription that take effect on the next renewal. */
export interface PendingSubscription {
  plan: NestedPlan;
  quantity: number;
  unitAmountInCents: number;
  subscriptionAddOns: SubscriptionAddOn[];
}

export interface Subscription {
  plan: NestedPlan;
  /** Resolved from the `<account href>` link. Read only. */
  accountCode: string;
  /** Resolved from the `<invoice href>` link. Read only. */
  invoiceNumber: number;
  uuid: string;
  state: string;
  unitAmountInCents: number;
  currency: string;
  quantity: number;
  totalAmountInCents: number;
  activatedAt: NullTime;
  canceledAt: NullTime;
  expiresAt: NullTime;
  currentPeriodStartedAt: NullTime;
  currentPeriodEndsAt: NullTime;
  trialStartedAt: NullTime;
  trialEndsAt: NullTime;
  taxInCents: number;
  taxType: string;
  taxRegion: string;
  taxRate: number;
  poNumber: string;
  netTerms: NullInt;
  subscriptionAddOns: SubscriptionAddOn[];
  pendingSubscription?: PendingSubscription;
}

export function emptySubscription(): Subscription {
  return {
    plan: { code: '', name: '' },
    accountCode: '',
    invoiceNumber: 0,
    uuid: '',
    state: '',
    unitAmountInCents: 0,
    currency: '',
    quantity: 0,
    totalAmountInCents: 0,
    activatedAt: NullTime.unset(),
    canceledAt: NullTime.unset(),
    expiresAt: NullTime.unset(),
    currentPeriodStartedAt: NullTime.unset(),
    currentPeriodEndsAt: NullTime.unset(),
    trialStartedAt: NullTime.unset(),
    trialEndsAt: NullTime.unset(),
    taxInCents: 0,
    taxType: '',
    taxRegion: '',
    taxRate: 0,
    poNumber: '',
    netTerms: NullInt.unset(),
    subscriptionAddOns: [],
  };
}

/** Fields accepted when creating a subscription. Unset fields are not sent. */
export interface NewSubscription {
  planCode?: string;
  account?: Partial<Account>;
  subscriptionAddOns?: Partial<SubscriptionAddOn>[];
  couponCode?: string;
  unitAmountInCents?: number;
  currency?: string;
  quantity?: number;
  trialEndsAt?: NullTime;
  startsAt?: NullTime;
  totalBillingCycles?: number;
  firstRenewalDate?: NullTime;
  collectionMethod?: string;
  netTerms?: NullInt;
  poNumber?: string;
  bulk?: boolean;
  termsAndConditions?: string;
  customerNotes?: string;
  vatReverseChargeNotes?: string;
  bankAccountAuthorizedAt?: NullTime;
}

/**
 * Fields accepted when updating a subscription. The remote side treats some
 * omitted fields as "reset to default" (net terms drop to 0), so build updates
 * from an existing subscription with {@link makeUpdate} and modify the result.
 */
export interface UpdateSubscription {
  timeframe?: string;
  planCode?: string;
  quantity?: number;
  unitAmountInCents?: number;
  collectionMethod?: string;
  netTerms?: NullInt;
  poNumber?: string;
  subscriptionAddOns?: Partial<SubscriptionAddOn>[];
}

export interface SubscriptionNotes {
  termsAndConditions?: string;
  customerNotes?: string;
  vatReverseChargeNotes?: string;
}

/** A create call answers with the subscription, or with the failed transaction on a 422. */
export interface NewSubscriptionResponse {
  subscription?: Subscription;
  transaction?: Transaction;
}

/**
 * Start an update that keeps the values the remote side would otherwise reset.
 * Apply your changes to the returned object before sending it.
 */
export function makeUpdate(s: Subscription): UpdateSubscription {
  return {
    netTerms: s.netTerms,
    subscriptionAddOns: s.subscriptionAddOns.map((a) => ({ ...a })),
  };
}

function decodePlan(node: WireNode): NestedPlan {
  return { code: readText(node, 'plan_code'), name: readText(node, 'name') };
}

function encodePlan(out: WireObject, plan: NestedPlan): void {
  const body: WireObject = {};
  emit.text(body, 'plan_code', plan.code);
  emit.text(body, 'name', plan.name);
  emit.nested(out, 'plan', body);
}

function decodeAddOn(node: WireNode, path: string): SubscriptionAddOn {
  return {
    type: readText(node, 'add_on_type'),
    code: readText(node, 'add_on_code'),
    unitAmountInCents: readInt(node, 'unit_amount_in_cents', path),
    quantity: readInt(node, 'quantity', path),
  };
}

function decodeAddOns(parent: WireNode, path: string): SubscriptionAddOn[] {
  const wrapperPath = joinPath(path, 'subscription_add_ons');
  return childrenOf(childOf(parent, 'subscription_add_ons'), 'subscription_add_on')
    .map((node, i) => decodeAddOn(node, `${wrapperPath}.subscription_add_on[${i}]`));
}

function encodeAddOn(a: Partial<SubscriptionAddOn>): WireObject {
  const out: WireObject = {};
  emit.text(out, 'add_on_type', a.type ?? '');
  emit.text(out, 'add_on_code', a.code ?? '', { always: true });
  emit.int(out, 'unit_amount_in_cents', a.unitAmountInCents ?? 0, { always: true });
  emit.int(out, 'quantity', a.quantity ?? 0);
  return out;
}

function encodeAddOns(out: WireObject, addOns: Partial<SubscriptionAddOn>[] | undefined): void {
  emit.list(out, 'subscription_add_ons', 'subscription_add_on', addOns?.map(encodeAddOn));
}

function decodePending(node: WireNode, path: string): PendingSubscription {
  return {
    plan: decodePlan(childOf(node, 'plan')),
    quantity: readInt(node, 'quantity', path),
    unitAmountInCents: readInt(node, 'unit_amount_in_cents', path),
    subscriptionAddOns: decodeAddOns(node, path),
  };
}

function encodePending(p: PendingSubscription): WireObject {
  const out: WireObject = {};
  encodePlan(out, p.plan);
  emit.int(out, 'quantity', p.quantity);
  emit.int(out, 'unit_amount_in_cents', p.unitAmountInCents);
  if (p.subscriptionAddOns.length > 0) encodeAddOns(out, p.subscriptionAddOns);
  return out;
}

export function decodeSubscription(node: WireNode, path = 'subscription'): Subscription {
  const at = (tag: string) => decodeNullTime(childOf(node, tag), joinPath(path, tag));
  const subscription: Subscription = {
    plan: decodePlan(childOf(node, 'plan')),
    accountCode: decodeHrefString(childOf(node, 'account')),
    invoiceNumber: decodeHrefInt(childOf(node, 'invoice'), joinPath(path, 'invoice')),
    uuid: readText(node, 'uuid'),
    state: readText(node, 'state'),
    unitAmountInCents: readInt(node, 'unit_amount_in_cents', path),
    currency: readText(node, 'currency'),
    quantity: readInt(node, 'quantity', path),
    totalAmountInCents: readInt(node, 'total_amount_in_cents', path),
    activatedAt: at('activated_at'),
    canceledAt: at('canceled_at'),
    expiresAt: at('expires_at'),
    currentPeriodStartedAt: at('current_period_started_at'),
    currentPeriodEndsAt: at('current_period_ends_at'),
    trialStartedAt: at('trial_started_at'),
    trialEndsAt: at('trial_ends_at'),
    taxInCents: readInt(node, 'tax_in_cents', path),
    taxType: readText(node, 'tax_type'),
    taxRegion: readText(node, 'tax_region'),
    taxRate: readFloat(node, 'tax_rate', path),
    poNumber: readText(node, 'po_number'),
    netTerms: decodeNullInt(childOf(node, 'net_terms'), joinPath(path, 'net_terms')),
    subscriptionAddOns: decodeAddOns(node, path),
  };
  if (hasChild(node, 'pending_subscription')) {
    subscription.pendingSubscription = decodePending(childOf(node, 'pending_subscription'), joinPath(path, 'pending_subscription'));
  }
  return subscription;
}

// accountCode and invoiceNumber are links on the wire and are not written back
export function encodeSubscription(s: Subscription): WireObject {
  const out: WireObject = {};
  encodePlan(out, s.plan);
  emit.text(out, 'uuid', s.uuid);
  emit.text(out, 'state', s.state);
  emit.int(out, 'unit_amount_in_cents', s.unitAmountInCents);
  emit.text(out, 'currency', s.currency);
  emit.int(out, 'quantity', s.quantity);
  emit.int(out, 'total_amount_in_cents', s.totalAmountInCents);
  emit.nullable(out, 'activated_at', s.activatedAt);
  emit.nullable(out, 'canceled_at', s.canceledAt);
  emit.nullable(out, 'expires_at', s.expiresAt);
  emit.nullable(out, 'current_period_started_at', s.currentPeriodStartedAt);
  emit.nullable(out, 'current_period_ends_at', s.currentPeriodEndsAt);
  emit.nullable(out, 'trial_started_at', s.trialStartedAt);
  emit.nullable(out, 'trial_ends_at', s.trialEndsAt);
  emit.int(out, 'tax_in_cents', s.taxInCents);
  emit.text(out, 'tax_type', s.taxType);
  emit.text(out, 'tax_region', s.taxRegion);
  emit.float(out, 'tax_rate', s.taxRate);
  emit.text(out, 'po_number', s.poNumber);
  emit.nullable(out, 'net_terms', s.netTerms);
  if (s.subscriptionAddOns.length > 0) encodeAddOns(out, s.subscriptionAddOns);
  if (s.pendingSubscription) emit.nested(out, 'pending_subscription', encodePending(s.pendingSubscription), { always: true });
  return out;
}

export function encodeNewSubscription(s: NewSubscription): WireObject {
  const out: WireObject = {};
  emit.text(out, 'plan_code', s.planCode ?? '', { always: true });
  emit.nested(out, 'account', encodeAccount(s.account ?? {}), { always: true });
  encodeAddOns(out, s.subscriptionAddOns);
  emit.text(out, 'coupon_code', s.couponCode ?? '');
  emit.int(out, 'unit_amount_in_cents', s.unitAmountInCents ?? 0);
  // required by the remote API even when empty
  emit.text(out, 'currency', s.currency ?? '', { always: true });
  emit.int(out, 'quantity', s.quantity ?? 0);
  emit.nullable(out, 'trial_ends_at', s.trialEndsAt ?? NullTime.unset());
  emit.nullable(out, 'starts_at', s.startsAt ?? NullTime.unset());
  emit.int(out, 'total_billing_cycles', s.totalBillingCycles ?? 0);
  emit.nullable(out, 'first_renewal_date', s.firstRenewalDate ?? NullTime.unset());
  emit.text(out, 'collection_method', s.collectionMethod ?? '');
  emit.nullable(out, 'net_terms', s.netTerms ?? NullInt.unset());
  emit.text(out, 'po_number', s.poNumber ?? '');
  // false is the remote default, so omitting it is harmless here
  emit.bool(out, 'bulk', s.bulk ?? false);
  emit.text(out, 'terms_and_conditions', s.termsAndConditions ?? '');
  emit.text(out, 'customer_notes', s.customerNotes ?? '');
  emit.text(out, 'vat_reverse_charge_notes', s.vatReverseChargeNotes ?? '');
  emit.nullable(out, 'bank_account_authorized_at', s.bankAccountAuthorizedAt ?? NullTime.unset());
  return out;
}

export function encodeUpdateSubscription(u: UpdateSubscription): WireObject {
  const out: WireObject = {};
  emit.text(out, 'timeframe', u.timeframe ?? '');
  emit.text(out, 'plan_code', u.planCode ?? '');
  emit.int(out, 'quantity', u.quantity ?? 0);
  emit.int(out, 'unit_amount_in_cents', u.unitAmountInCents ?? 0);
  emit.text(out, 'collection_method', u.collectionMethod ?? '');
  emit.nullable(out, 'net_terms', u.netTerms ?? NullInt.unset());
  emit.text(out, 'po_number', u.poNumber ?? '');
  encodeAddOns(out, u.subscriptionAddOns);
  return out;
}

export function encodeSubscriptionNotes(n: SubscriptionNotes): WireObject {
  const out: WireObject = {};
  emit.text(out, 'terms_and_conditions', n.termsAndConditions ?? '');
  emit.text(out, 'customer_notes', n.customerNotes ?? '');
  emit.text(out, 'vat_reverse_charge_notes', n.vatReverseChargeNotes ?? '');
  return out;
}

export const subscriptionCodec = defineCodec<Subscription>({
  root: 'subscription',
  encode: encodeSubscription,
  decode: decodeSubscription,
});

export const newSubscriptionEncoder = defineEncoder<NewSubscription>({
  root: 'subscription',
  encode: encodeNewSubscription,
});

export const updateSubscriptionEncoder = defineEncoder<UpdateSubscription>({
  root: 'subscription',
  encode: encodeUpdateSubscription,
});

export const subscriptionNotesEncoder = defineEncoder<SubscriptionNotes>({
  root: 'subscription',
  encode: encodeSubscriptionNotes,
});

export const newSubscriptionResponseDecoder = defineDecoder<NewSubscriptionResponse>({
  root: 'subscription',
  decode: (node, path) => ({ subscription: decodeSubscription(node, path) }),
});

/** Decode the body of a create call, which is either `<subscription>` or `<errors>`. */
export function decodeNewSubscriptionResponse(input: XmlInput): NewSubscriptionResponse {
  const doc = parseDocument(input);
  if (doc.root === 'subscription') return newSubscriptionResponseDecoder.decode(doc.node, doc.root);
  if (doc.root === 'errors') {
    if (!hasChild(doc.node, 'transaction')) return {};
    return { transaction: transactionCodec.decode(childOf(doc.node, 'transaction'), 'errors.transaction') };
  }
  throw new CodecError('UNEXPECTED_ROOT', `expected <subscription> or <errors>, found <${doc.root}>`, doc.root);
}
