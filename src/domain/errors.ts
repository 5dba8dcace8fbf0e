/**
 * Payment error taxonomy. Every adapter failure surfaces as one of these.
 */

import type { ProviderKind } from '../types/transaction';
import { logger } from '../lib/logger';

export type PaymentErrorKind =
  | 'CONFIGURATION'
  | 'VALIDATION'
  | 'DECLINE'
  | 'TRANSIENT'
  | 'PROTOCOL'
  | 'NOT_SUPPORTED';

export type DeclineCategory =
  | 'DECLINED'
  | 'INSUFFICIENT_FUNDS'
  | 'INVALID_NUMBER'
  | 'INVALID_CVC'
  | 'INVALID_EXPIRY'
  | 'EXPIRED'
  | 'INVALID_ZIP'
  | 'AUTHENTICATION_REQUIRED';

export type TransientCode = 'timeout' | 'network' | 'unavailable' | 'authentication' | 'rate_limited';

export interface PaymentErrorBody {
  kind: PaymentErrorKind;
  code: string;
  messageKey: string;
  message: string;
  fields?: string[];
  field?: string;
  category?: DeclineCategory;
  providerCode?: string;
}

export abstract class PaymentError extends Error {
  abstract readonly kind: PaymentErrorKind;
  readonly retryable: boolean = false;

  constructor(
    readonly code: string,
    readonly messageKey: string,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): PaymentErrorBody {
    return { kind: this.kind, code: this.code, messageKey: this.messageKey, message: this.message };
  }
}

/** Required configuration missing or malformed; raised before any network call. */
export class ConfigurationError extends PaymentError {
  readonly kind = 'CONFIGURATION';

  constructor(
    readonly fields: string[],
    provider?: ProviderKind
  ) {
    super(
      'configuration_invalid',
      'payment.error.configuration',
      `${provider ?? 'Gateway'} configuration is missing or has invalid values for: ${fields.join(', ')}`
    );
  }

  toJSON(): PaymentErrorBody {
    return { ...super.toJSON(), fields: [...this.fields] };
  }
}

export class ValidationError extends PaymentError {
  readonly kind = 'VALIDATION';
  readonly field?: string;

  constructor(code: string, message: string, options: { field?: string; messageKey?: string } = {}) {
    super(code, options.messageKey ?? `payment.error.validation.${code}`, message);
    this.field = options.field;
  }

  toJSON(): PaymentErrorBody {
    return this.field ? { ...super.toJSON(), field: this.field } : super.toJSON();
  }
}

/** The provider refused the payment. Never retried automatically. */
export class DeclineError extends PaymentError {
  readonly kind = 'DECLINE';

  constructor(
    readonly providerCode: string,
    readonly category: DeclineCategory,
    message: string
  ) {
    super('payment_declined', `payment.decline.${category.toLowerCase()}`, message);
  }

  toJSON(): PaymentErrorBody {
    return { ...super.toJSON(), category: this.category, providerCode: this.providerCode };
  }
}

/** The provider could not be reached or refused our credentials; safe to retry. */
export class TransientError extends PaymentError {
  readonly kind = 'TRANSIENT';
  readonly retryable = true;

  constructor(
    code: TransientCode,
    message: string,
    readonly provider?: ProviderKind
  ) {
    super(code, 'payment.error.unavailable', message);
  }
}

export class ProtocolError extends PaymentError {
  readonly kind = 'PROTOCOL';

  constructor(
    message: string,
    readonly provider: ProviderKind,
    readonly operation: string,
    readonly context: Record<string, unknown> = {}
  ) {
    super('unexpected_response', 'payment.error.protocol', message);
  }
}

export class NotSupportedError extends PaymentError {
  readonly kind = 'NOT_SUPPORTED';

  constructor(
    readonly provider: ProviderKind,
    readonly operation: string
  ) {
    super('operation_not_supported', 'payment.error.not_supported', `${provider} does not support ${operation}`);
  }
}

/** Build a ProtocolError and log it with its diagnostic context. */
export function protocolError(
  provider: ProviderKind,
  operation: string,
  message: string,
  context: Record<string, unknown> = {}
): ProtocolError {
  logger.error('Unexpected provider response', { provider, operation, reason: message, ...context });
  return new ProtocolError(message, provider, operation, context);
}

export function isPaymentError(err: unknown): err is PaymentError {
  return err instanceof PaymentError;
}
