/**
 * Transaction factory and the input checks every adapter runs before calling out.
 */

import type {
  DetailKey,
  InstrumentInput,
  OrderRef,
  PaymentMethodType,
  ProviderKind,
  Transaction,
  TransactionDetails,
  TransactionType,
} from '../types/transaction';
import { DetailKeys } from '../types/transaction';
import { ValidationError } from './errors';
import { compareAmounts, normalizeCurrency } from './money';

export interface CreateTransactionParams {
  type: TransactionType;
  provider: ProviderKind;
  paymentMethod: PaymentMethodType;
  amount: number;
  currency: string;
  details: Partial<Record<DetailKey, string | undefined>>;
}

/** New frozen transaction; blank detail values are dropped. */
export function createTransaction(params: CreateTransactionParams): Transaction {
  const details: Partial<Record<DetailKey, string>> = {};
  for (const key of Object.values(DetailKeys)) {
    const value = params.details[key];
    if (value !== undefined && value !== '') details[key] = value;
  }
  return Object.freeze({
    amount: params.amount,
    currency: normalizeCurrency(params.currency),
    timestamp: new Date().toISOString(),
    type: params.type,
    paymentMethod: params.paymentMethod,
    provider: params.provider,
    details: Object.freeze(details),
  });
}

export function readDetail(details: TransactionDetails, key: DetailKey): string | undefined {
  const value = details[key]?.trim();
  return value ? value : undefined;
}

/** The identifier a later step needs, or a ValidationError naming the missing key. */
export function requireDetail(prior: Transaction, key: DetailKey): string {
  const value = readDetail(prior.details, key);
  if (!value) {
    throw new ValidationError('missing_detail', `${prior.type} transaction has no ${key} in its details`, {
      field: key,
    });
  }
  return value;
}

export function assertPaymentMethod(
  provider: ProviderKind,
  supported: readonly PaymentMethodType[],
  paymentMethod: PaymentMethodType
): void {
  if (!supported.includes(paymentMethod)) {
    throw new ValidationError('payment_method_unsupported', `${provider} does not accept ${paymentMethod} payments`, {
      field: 'paymentMethod',
    });
  }
}

export function requireToken(instrument: InstrumentInput | undefined): string {
  const token = instrument?.kind === 'token' ? instrument.token.trim() : '';
  if (!token) {
    throw new ValidationError('token_required', 'A payment token is required for this operation', { field: 'token' });
  }
  return token;
}

export function requireRedirectToken(instrument: InstrumentInput | undefined): { token: string; payerId?: string } {
  const token = instrument?.kind === 'redirect' ? instrument.redirectToken.trim() : '';
  if (!token || instrument?.kind !== 'redirect') {
    throw new ValidationError('redirect_token_required', 'The wallet checkout token from initialization is required', {
      field: 'redirectToken',
    });
  }
  const payerId = instrument.payerId?.trim();
  return payerId ? { token, payerId } : { token };
}

function assertSameCurrency(order: OrderRef, prior: Transaction): void {
  if (normalizeCurrency(order.currency) !== prior.currency) {
    throw new ValidationError(
      'currency_mismatch',
      `Order currency ${order.currency} does not match transaction currency ${prior.currency}`,
      { field: 'currency' }
    );
  }
}

export function assertCapturable(order: OrderRef, prior: Transaction): void {
  if (prior.type !== 'AUTHORIZE') {
    throw new ValidationError('transaction_not_capturable', `Cannot capture a ${prior.type} transaction`);
  }
  assertSameCurrency(order, prior);
}

/**
 * Amount a refund moves. A full refund returns the settled amount of the prior
 * transaction; a partial refund uses the requested amount, which must be
 * positive and not above the settled amount.
 */
export function resolveRefundAmount(partial: boolean, order: OrderRef, prior: Transaction, amount: number): number {
  if (prior.type !== 'CAPTURE' && prior.type !== 'AUTHORIZE_CAPTURE') {
    throw new ValidationError('transaction_not_refundable', `Cannot refund a ${prior.type} transaction`);
  }
  assertSameCurrency(order, prior);
  if (!partial) return prior.amount;
  if (!Number.isFinite(amount) || amount <= 0) {
    throw new ValidationError('refund_amount_invalid', 'Partial refund amount must be greater than zero', {
      field: 'amount',
    });
  }
  if (compareAmounts(amount, prior.amount, prior.currency) > 0) {
    throw new ValidationError(
      'refund_amount_exceeds_settled',
      `Refund of ${amount} exceeds the settled amount ${prior.amount}`,
      { field: 'amount' }
    );
  }
  return amount;
}
