/**
 * Transaction record and the value types shared by every gateway operation.
 */

export const PROVIDER_KINDS = ['BRAINTREE', 'STRIPE', 'PAYPAL_EXPRESS', 'PAYPAL_REST'] as const;

export type ProviderKind = (typeof PROVIDER_KINDS)[number];

export const TRANSACTION_TYPES = ['INIT', 'AUTHORIZE', 'CAPTURE', 'AUTHORIZE_CAPTURE', 'REFUND'] as const;

export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export const PAYMENT_METHOD_TYPES = ['CARD', 'WALLET'] as const;

export type PaymentMethodType = (typeof PAYMENT_METHOD_TYPES)[number];

/**
 * Keys written into `Transaction.details`. A later lifecycle step reads the
 * identifiers an earlier step stored here, so both sides use these names.
 */
export const DetailKeys = {
  /** Braintree client token for the drop-in UI (INIT). */
  CLIENT_TOKEN: 'CLIENT_TOKEN',
  /** Wallet checkout token the buyer approves (PayPal INIT). */
  REDIRECT_TOKEN: 'REDIRECT_TOKEN',
  REDIRECT_URL: 'REDIRECT_URL',
  PAYER_ID: 'PAYER_ID',
  /** Provider authorization reference; read by CAPTURE. */
  AUTHORIZATION_ID: 'AUTHORIZATION_ID',
  /** Provider settlement reference; read by REFUND. */
  GATEWAY_TRANSACTION_ID: 'GATEWAY_TRANSACTION_ID',
  REFUND_ID: 'REFUND_ID',
  CORRELATION_ID: 'CORRELATION_ID',
  PROCESSOR_STATUS: 'PROCESSOR_STATUS',
} as const;

export type DetailKey = (typeof DetailKeys)[keyof typeof DetailKeys];

export type TransactionDetails = Readonly<Partial<Record<DetailKey, string>>>;

export interface Transaction {
  readonly amount: number;
  readonly currency: string;
  /** ISO-8601 completion time. */
  readonly timestamp: string;
  readonly type: TransactionType;
  readonly paymentMethod: PaymentMethodType;
  readonly provider: ProviderKind;
  readonly details: TransactionDetails;
}

export interface Money {
  amount: number;
  currency: string;
}

export interface OrderRef {
  id: string;
  total: number;
  currency: string;
}

/** Card nonce / payment-method token, or the wallet token returned by INIT. */
export type InstrumentInput =
  | { kind: 'token'; token: string }
  | { kind: 'redirect'; redirectToken: string; payerId?: string };
